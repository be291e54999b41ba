import * as fs from 'fs';
import { InvalidInputError } from '../errors';
import { Lattice } from '../models/lattice';
import { Site } from '../models/site';
import { Structure } from '../models/structure';
import { columnVector } from '../stacking/polytypes';
import type { BuildOptions, StackEntry } from '../stacking/stackBuilder';
import { isVector3, type Vector3 } from '../utils/geometryUtils';

/**
 * A stacking recipe as read from JSON:
 *
 *   lattices  named lattice parameters (a, b, c, alpha, beta, gamma)
 *   layers    named layers: { lattice, sites } or { from, occupancy },
 *             with an optional height overriding c
 *   columns   named column vectors (A, B, C predefined)
 *   sequence  [layer, column name or vector] pairs
 */
export interface StackRecipe {
  name: string;
  sequence: StackEntry[];
  interlayerVectors: Vector3[];
  blockPeriod: number;
  nBlocks: number;
  options: BuildOptions;
  formats: string[];
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireObject(value: unknown, key: string): JsonObject {
  if (!isObject(value)) {
    throw new InvalidInputError(key, 'expected an object');
  }
  return value;
}

function readNumber(obj: JsonObject, key: string, where: string, fallback?: number): number {
  const value = obj[key];
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidInputError(`${where}.${key}`, `expected a finite number, got ${JSON.stringify(value)}`);
  }
  return value;
}

function readString(obj: JsonObject, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || !value.trim()) {
    throw new InvalidInputError(`${where}.${key}`, 'expected a non-empty string');
  }
  return value;
}

function readVector(value: unknown, where: string): Vector3 {
  if (!isVector3(value)) {
    throw new InvalidInputError(where, 'expected three finite numbers');
  }
  return [value[0], value[1], value[2]];
}

function parseLattices(value: unknown): Map<string, Lattice> {
  const lattices = new Map<string, Lattice>();
  for (const [key, entry] of Object.entries(requireObject(value, 'recipe.lattices'))) {
    const where = `recipe.lattices.${key}`;
    const params = requireObject(entry, where);
    lattices.set(
      key,
      new Lattice(
        readNumber(params, 'a', where),
        readNumber(params, 'b', where),
        readNumber(params, 'c', where),
        readNumber(params, 'alpha', where, 90),
        readNumber(params, 'beta', where, 90),
        readNumber(params, 'gamma', where, 90)
      )
    );
  }
  return lattices;
}

function parseSites(value: unknown, lattice: Lattice, where: string): Site[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new InvalidInputError(`${where}.sites`, 'expected an array');
  }
  const entries: unknown[] = value;
  return entries.map((entry, idx) => {
    const at = `${where}.sites[${idx}]`;
    const site = requireObject(entry, at);
    return new Site(
      readString(site, 'species', at),
      readNumber(site, 'occupancy', at, 1),
      readNumber(site, 'fx', at),
      readNumber(site, 'fy', at),
      readNumber(site, 'fz', at, 0),
      readNumber(site, 'biso', at, 1),
      lattice
    );
  });
}

// Layers may derive from layers listed before them
function parseLayers(value: unknown, lattices: Map<string, Lattice>): Map<string, Structure> {
  const layers = new Map<string, Structure>();
  for (const [key, entry] of Object.entries(requireObject(value, 'recipe.layers'))) {
    const where = `recipe.layers.${key}`;
    const definition = requireObject(entry, where);
    let layer: Structure;

    if (definition.from !== undefined) {
      const base = layers.get(readString(definition, 'from', where));
      if (!base) {
        throw new InvalidInputError(`${where}.from`, `layer ${String(definition.from)} is not defined before ${key}`);
      }
      layer = base.clone();
      layer.name = key;
    } else {
      const lattice = lattices.get(readString(definition, 'lattice', where));
      if (!lattice) {
        throw new InvalidInputError(`${where}.lattice`, `unknown lattice ${String(definition.lattice)}`);
      }
      layer = new Structure(parseSites(definition.sites, lattice, where), lattice, key);
    }

    if (definition.occupancy !== undefined) {
      layer = layer.withOccupancy(readNumber(definition, 'occupancy', where));
    }
    if (definition.height !== undefined) {
      layer.updateLattice({ c: readNumber(definition, 'height', where) });
    }
    layers.set(key, layer);
  }
  return layers;
}

// A, B and C default to the close-packing columns
function parseColumns(value: unknown): Map<string, Vector3> {
  const columns = new Map<string, Vector3>(
    (['A', 'B', 'C'] as const).map((column): [string, Vector3] => [column, columnVector(column)])
  );
  if (value === undefined) {
    return columns;
  }
  for (const [key, entry] of Object.entries(requireObject(value, 'recipe.columns'))) {
    columns.set(key, readVector(entry, `recipe.columns.${key}`));
  }
  return columns;
}

function parseSequence(
  value: unknown,
  layers: Map<string, Structure>,
  columns: Map<string, Vector3>
): StackEntry[] {
  if (!Array.isArray(value)) {
    throw new InvalidInputError('recipe.sequence', 'expected an array of [layer, column] pairs');
  }
  const entries: unknown[] = value;
  return entries.map((entry, idx): StackEntry => {
    const where = `recipe.sequence[${idx}]`;
    if (!Array.isArray(entry) || entry.length !== 2) {
      throw new InvalidInputError(where, 'expected a [layer, column] pair');
    }
    const pair: unknown[] = entry;
    const [layerName, column] = pair;
    const layer = typeof layerName === 'string' ? layers.get(layerName) : undefined;
    if (!layer) {
      throw new InvalidInputError(where, `unknown layer ${JSON.stringify(layerName)}`);
    }
    if (typeof column === 'string') {
      const vector = columns.get(column);
      if (!vector) {
        throw new InvalidInputError(where, `unknown column ${column}`);
      }
      return [layer, vector];
    }
    return [layer, readVector(column, where)];
  });
}

function parseFormats(value: unknown): string[] {
  if (value === undefined) {
    return ['cif'];
  }
  if (!Array.isArray(value)) {
    throw new InvalidInputError('recipe.formats', 'expected an array of format names');
  }
  const formats: unknown[] = value;
  return formats.map((format, idx) => {
    if (typeof format !== 'string') {
      throw new InvalidInputError(`recipe.formats[${idx}]`, 'expected a format name');
    }
    return format;
  });
}

/**
 * Parse and resolve a JSON stacking recipe
 */
export function parseRecipe(content: string, fallbackName: string = 'stack'): StackRecipe {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new InvalidInputError('recipe', `not valid JSON (${error instanceof Error ? error.message : String(error)})`);
  }
  const recipe = requireObject(raw, 'recipe');

  const lattices = parseLattices(recipe.lattices);
  const layers = parseLayers(recipe.layers, lattices);
  const columns = parseColumns(recipe.columns);
  const sequence = parseSequence(recipe.sequence, layers, columns);

  let interlayerVectors: Vector3[] = [];
  if (recipe.interlayerVectors !== undefined && recipe.interlayerVectors !== null) {
    if (!Array.isArray(recipe.interlayerVectors)) {
      throw new InvalidInputError('recipe.interlayerVectors', 'expected an array of vectors');
    }
    const vectors: unknown[] = recipe.interlayerVectors;
    interlayerVectors = vectors.map((vector, idx) =>
      readVector(vector, `recipe.interlayerVectors[${idx}]`)
    );
  }

  const name = typeof recipe.name === 'string' && recipe.name.trim() ? recipe.name : fallbackName;
  const blockPeriod = readNumber(recipe, 'blockPeriod', 'recipe', sequence.length);
  const nBlocks = readNumber(recipe, 'nBlocks', 'recipe', 1);
  if (recipe.lateralOrigin !== undefined && typeof recipe.lateralOrigin !== 'boolean') {
    throw new InvalidInputError('recipe.lateralOrigin', 'expected true or false');
  }

  return {
    name,
    sequence,
    interlayerVectors,
    blockPeriod,
    nBlocks,
    options: { name, lateralOrigin: recipe.lateralOrigin === true },
    formats: parseFormats(recipe.formats),
  };
}

export function loadRecipe(filePath: string): StackRecipe {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new Error(`Failed to read recipe ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  const baseName = filePath.split(/[/\\]/).pop() || 'stack';
  return parseRecipe(content, baseName.replace(/\.json$/i, ''));
}
