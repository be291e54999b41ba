/**
 * Export all data models for easy importing
 */

export { Lattice } from './lattice';
export type { LatticeParameters } from './lattice';
export { Site } from './site';
export type { SiteJSON } from './site';
export { Structure } from './structure';
export type { StructureJSON } from './structure';
