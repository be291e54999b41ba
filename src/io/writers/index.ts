export { CIFWriter } from './cifWriter';
export { TOPASWriter } from './topasWriter';
export type { StructureWriter } from './structureWriter';
