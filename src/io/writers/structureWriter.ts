import type { Structure } from '../../models/structure';

/**
 * Writer interface for different file formats
 */
export interface StructureWriter {
  readonly extension: string;
  serialize(structure: Structure): string;
}
