import { GeometryUnsupportedError, InvalidInputError } from '../errors';
import { Lattice } from '../models/lattice';
import type { Site } from '../models/site';
import { Structure } from '../models/structure';
import {
  type Vector3,
  addVectors,
  isLateral,
  isVector3,
  normalizeFractional,
  zeroVector,
} from '../utils/geometryUtils';
import { CyclicSequence } from './cyclicSequence';

/**
 * A layer and the column vector placing it: x/y in fractions of the
 * layer's a/b, z as a multiple of the layer's c.
 */
export type StackEntry = [Structure, Vector3];

export interface BuildOptions {
  /** Name of the assembled structure */
  name?: string;
  /** Lattice supplying a, b and angles when the sequence is empty */
  template?: Lattice;
  /** Also shift sites by the accumulated x/y of the interlayer vectors */
  lateralOrigin?: boolean;
}

function validateCount(argument: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidInputError(argument, `expected a non-negative integer, got ${String(value)}`);
  }
}

function validateSequence(sequence: readonly StackEntry[]): void {
  if (!Array.isArray(sequence)) {
    throw new InvalidInputError('sequence', 'expected an array of [layer, vector] pairs');
  }
  const first = sequence[0];
  sequence.forEach((entry, idx) => {
    if (!Array.isArray(entry) || entry.length !== 2) {
      throw new InvalidInputError(`sequence[${idx}]`, 'expected a [layer, vector] pair');
    }
    const [layer, vector] = entry;
    if (!(layer instanceof Structure)) {
      throw new InvalidInputError(`sequence[${idx}] layer`, 'expected a Structure');
    }
    if (!isVector3(vector)) {
      throw new InvalidInputError(`sequence[${idx}] vector`, 'expected three finite numbers');
    }
    // fx/fy end up measured against the last layer's a/b
    if (layer.a !== first[0].a || layer.b !== first[0].b) {
      throw new InvalidInputError(
        `sequence[${idx}] layer`,
        `in-plane lengths a=${layer.a}, b=${layer.b} differ from the first layer (a=${first[0].a}, b=${first[0].b})`
      );
    }
    if (layer.gamma !== 90 && isLateral(vector)) {
      throw new GeometryUnsupportedError(
        `sequence[${idx}]`,
        `lateral column vector on a layer with gamma=${layer.gamma}; only gamma=90 offsets are supported`
      );
    }
  });
}

// Lateral interlayer components only move sites under lateralOrigin
function validateInterlayerVectors(
  vectors: readonly Vector3[],
  sequence: readonly StackEntry[],
  lateralOrigin: boolean
): void {
  if (!Array.isArray(vectors)) {
    throw new InvalidInputError('interlayerVectors', 'expected an array of vectors');
  }
  const skewed = sequence.find(([layer]) => layer.gamma !== 90);
  vectors.forEach((vector, idx) => {
    if (!isVector3(vector)) {
      throw new InvalidInputError(`interlayerVectors[${idx}]`, 'expected three finite numbers');
    }
    if (lateralOrigin && skewed && isLateral(vector)) {
      throw new GeometryUnsupportedError(
        `interlayerVectors[${idx}]`,
        `lateral offset combined with a layer with gamma=${skewed[0].gamma}; only gamma=90 offsets are supported`
      );
    }
  });
}

/**
 * Stack layers into a single structure.
 *
 * The sequence is cycled for `blockPeriod * nBlocks` steps. Each step copies
 * the layer's sites to the current stack height and then raises the height
 * by `vector.z * layer.c`. After every completed block the next interlayer
 * vector (absolute units, cycled) is added to the running origin.
 *
 * The assembled lattice takes a, b and the angles of the last layer placed,
 * and c equal to the total stack height. Fractional x and y are wrapped into
 * [0, 1); z is left as placed.
 *
 * Only scalar (gamma = 90) in-plane geometry is modelled. All layers must
 * share the same a and b.
 */
export function build(
  sequence: readonly StackEntry[],
  interlayerVectors: readonly Vector3[] | null | undefined,
  blockPeriod: number,
  nBlocks: number,
  options: BuildOptions = {}
): Structure {
  validateSequence(sequence);
  validateCount('blockPeriod', blockPeriod);
  validateCount('nBlocks', nBlocks);
  const vectors = interlayerVectors && interlayerVectors.length > 0 ? interlayerVectors : [zeroVector()];
  validateInterlayerVectors(vectors, sequence, options.lateralOrigin === true);

  const name = options.name ?? 'stack';
  const steps = blockPeriod * nBlocks;
  if (sequence.length === 0 || steps === 0) {
    const template = sequence.length > 0 ? sequence[0][0].lattice : options.template ?? new Lattice();
    return new Structure([], template.with({ c: 0 }), name);
  }

  const layers = new CyclicSequence(sequence, 'sequence');
  const offsets = new CyclicSequence(vectors, 'interlayerVectors');
  let origin = zeroVector();
  const placed: Array<{ site: Site; position: Vector3 }> = [];
  let last = sequence[0][0];

  for (let idx = 0; idx < steps; idx++) {
    const [layer, vector] = layers.next();
    last = layer;

    for (const source of layer) {
      const position: Vector3 = [source.x + vector[0] * layer.a, source.y + vector[1] * layer.b, origin[2]];
      if (options.lateralOrigin) {
        position[0] += origin[0];
        position[1] += origin[1];
      }
      placed.push({ site: source.clone(), position });
    }

    if (idx !== 0 && (idx + 1) % blockPeriod === 0) {
      origin = addVectors(origin, offsets.next());
    }

    origin[2] += vector[2] * layer.c;
  }

  if (origin[2] < 0) {
    throw new InvalidInputError('interlayerVectors', `accumulated stack height ${origin[2]} is negative`);
  }
  const lattice = last.lattice.with({ c: origin[2] });
  for (const { site, position } of placed) {
    site.associate(lattice);
    site.setPosition(...position);
    site.fx = normalizeFractional(site.fx);
    site.fy = normalizeFractional(site.fy);
  }

  return new Structure(
    placed.map(({ site }) => site),
    lattice,
    name
  );
}
