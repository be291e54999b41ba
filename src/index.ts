export { GeometryUnsupportedError, InvalidInputError } from './errors';
export { Lattice, Site, Structure } from './models';
export type { LatticeParameters, SiteJSON, StructureJSON } from './models';
export { CyclicSequence } from './stacking/cyclicSequence';
export { build } from './stacking/stackBuilder';
export type { BuildOptions, StackEntry } from './stacking/stackBuilder';
export { applyUniqueLabels, uniqueLabels } from './stacking/labels';
export {
  COLUMNS,
  PRISTINE_POLYTYPES,
  birnessiteLattice,
  birnessiteLayers,
  columnTriple,
  columnVector,
  findPolytype,
  pristinePolytype,
  voidLayer,
} from './stacking/polytypes';
export type {
  BirnessiteLayers,
  Column,
  ColumnTriple,
  LayerOptions,
  LayerSymmetry,
  PolytypeDefinition,
  PolytypeInput,
  PolytypeOptions,
} from './stacking/polytypes';
export { CIFWriter, TOPASWriter } from './io/writers';
export type { StructureWriter } from './io/writers';
export { FileManager } from './io/fileManager';
export { loadRecipe, parseRecipe } from './io/recipe';
export type { StackRecipe } from './io/recipe';
export type { Vector3 } from './utils/geometryUtils';
