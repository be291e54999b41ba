import { InvalidInputError } from '../errors';
import { Lattice } from '../models/lattice';
import { Site } from '../models/site';
import { Structure } from '../models/structure';
import type { Vector3 } from '../utils/geometryUtils';
import type { StackEntry } from './stackBuilder';

/**
 * Close-packing columns A, B, C in fractions of a C-centred cell with
 * a = sqrt(3) b. The z component counts one layer height.
 */
export type Column = 'A' | 'B' | 'C';

export const COLUMNS: Readonly<Record<Column, Readonly<Vector3>>> = {
  A: [0, 0, 1],
  B: [-1 / 3, 0, 1],
  C: [-2 / 3, 0, 1],
};

export type LayerSymmetry = 'hexagonal' | 'orthorhombic';

export interface LayerOptions {
  /** In-plane b (hexagonal a_h), angstroms */
  b?: number;
  /** Height of one close-packed sheet, angstroms */
  c?: number;
  cationOccupancy?: number;
  anion?: string;
  cation?: string;
}

export interface PolytypeOptions extends LayerOptions {
  /** Basal spacing of one anion-cation-anion block plus interlayer */
  basalSpacing?: number;
}

export interface BirnessiteLayers {
  anion: Structure;
  cation: Structure;
}

export type ColumnTriple = 'abc' | 'bca' | 'cab' | 'cba' | 'bac' | 'acb';

export interface PolytypeDefinition {
  hexagonal: string;
  orthorhombic: string;
  stacking: string;
  triples: ColumnTriple[];
}

export interface PolytypeInput {
  name: string;
  symmetry: LayerSymmetry;
  sequence: StackEntry[];
  interlayerVectors: Vector3[];
  blockPeriod: number;
  nBlocks: number;
}

const DEFAULT_B = 2.85;
const DEFAULT_C = 1.0;
const DEFAULT_BASAL_SPACING = 7.1;
const ORTHORHOMBIC_STRETCH = 1.05;

/**
 * Pristine (vacancy-free) stackings of anion-cation-anion sheets.
 * `-` marks an octahedral interlayer, `=` a prismatic one.
 */
export const PRISTINE_POLYTYPES: readonly PolytypeDefinition[] = [
  { hexagonal: '1H', orthorhombic: '1O', stacking: 'AbC – AbC', triples: ['abc'] },
  { hexagonal: '2H1', orthorhombic: '2O1', stacking: 'AbC = CbA = AbC', triples: ['abc', 'cba'] },
  { hexagonal: '2H2', orthorhombic: '2O2', stacking: 'AbC – AcB – AbC', triples: ['abc', 'acb'] },
  { hexagonal: '3R1', orthorhombic: '1M1', stacking: 'AbC = CaB = BcA = AbC', triples: ['abc', 'cab', 'bca'] },
  { hexagonal: '3R2', orthorhombic: '1M2', stacking: 'AbC – BcA – CaB – AbC', triples: ['abc', 'bca', 'cab'] },
  { hexagonal: '3H1', orthorhombic: '3O1', stacking: 'AbC – AcB – AcB – AbC', triples: ['abc', 'acb', 'acb'] },
  { hexagonal: '3H2', orthorhombic: '3O2', stacking: 'AbC – AcB – CaB – AbC', triples: ['abc', 'acb', 'cab'] },
];

export function birnessiteLattice(symmetry: LayerSymmetry, options: LayerOptions = {}): Lattice {
  const b = options.b ?? DEFAULT_B;
  const c = options.c ?? DEFAULT_C;
  const a = Math.sqrt(3) * b * (symmetry === 'orthorhombic' ? ORTHORHOMBIC_STRETCH : 1);
  return new Lattice(a, b, c, 90, 90, 90);
}

/**
 * One anion sheet and one cation sheet, two sites each at (0,0,0) and
 * (1/2,1/2,0) of the C-centred cell.
 */
export function birnessiteLayers(symmetry: LayerSymmetry, options: LayerOptions = {}): BirnessiteLayers {
  const lattice = birnessiteLattice(symmetry, options);
  const sheet = (species: string, occupancy: number) =>
    new Structure(
      [new Site(species, occupancy, 0, 0, 0, 1, lattice), new Site(species, occupancy, 0.5, 0.5, 0, 1, lattice)],
      lattice,
      species
    );
  return {
    anion: sheet(options.anion ?? 'O', 1),
    cation: sheet(options.cation ?? 'Mn', options.cationOccupancy ?? 1),
  };
}

/**
 * anion-cation-anion sheets placed in the columns named by a triple,
 * e.g. 'abc' -> (anion, A), (cation, B), (anion, C)
 */
export function columnTriple(layers: BirnessiteLayers, triple: ColumnTriple): StackEntry[] {
  const [first, second, third] = Array.from(triple.toUpperCase()).map(toColumn);
  return [
    [layers.anion, columnVector(first)],
    [layers.cation, columnVector(second)],
    [layers.anion, columnVector(third)],
  ];
}

export function columnVector(column: Column): Vector3 {
  const [x, y, z] = COLUMNS[column];
  return [x, y, z];
}

function toColumn(letter: string): Column {
  if (letter === 'A' || letter === 'B' || letter === 'C') {
    return letter;
  }
  throw new InvalidInputError('column', `unknown close-packing column ${letter}`);
}

/**
 * An empty sheet that only contributes height to a stack
 */
export function voidLayer(lattice: Lattice, height: number): Structure {
  return new Structure([], lattice.with({ c: height }), 'void');
}

export function findPolytype(name: string): { definition: PolytypeDefinition; symmetry: LayerSymmetry } {
  for (const definition of PRISTINE_POLYTYPES) {
    if (definition.hexagonal === name) {
      return { definition, symmetry: 'hexagonal' };
    }
    if (definition.orthorhombic === name) {
      return { definition, symmetry: 'orthorhombic' };
    }
  }
  const known = PRISTINE_POLYTYPES.flatMap((p) => [p.hexagonal, p.orthorhombic]).join(', ');
  throw new InvalidInputError('polytype', `unknown polytype ${name}; expected one of ${known}`);
}

/**
 * Build inputs for one of the pristine polytypes, one block per triple.
 */
export function pristinePolytype(name: string, options: PolytypeOptions = {}): PolytypeInput {
  const { definition, symmetry } = findPolytype(name);
  const layers = birnessiteLayers(symmetry, options);
  const blockPeriod = 3;
  const gap = (options.basalSpacing ?? DEFAULT_BASAL_SPACING) - blockPeriod * layers.anion.c;
  return {
    name,
    symmetry,
    sequence: definition.triples.flatMap((triple) => columnTriple(layers, triple)),
    interlayerVectors: [[0, 0, gap]],
    blockPeriod,
    nBlocks: definition.triples.length,
  };
}
