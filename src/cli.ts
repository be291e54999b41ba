#!/usr/bin/env node
/**
 * closepack-stack - close-packed layer stacking
 * Command line entry point
 */

import * as path from 'path';
import { FileManager } from './io/fileManager';
import { loadRecipe } from './io/recipe';
import { PRISTINE_POLYTYPES, pristinePolytype } from './stacking/polytypes';
import { build } from './stacking/stackBuilder';

const USAGE = [
  'Usage:',
  '  closepack-stack build <recipe.json> [outBase]',
  '  closepack-stack polytype <name> [outBase] [--str]',
  '  closepack-stack list',
].join('\n');

function buildRecipe(recipePath: string, outBase?: string): string[] {
  const recipe = loadRecipe(recipePath);
  console.log(
    `Building ${recipe.name}: ${recipe.sequence.length} layers, blockPeriod=${recipe.blockPeriod}, nBlocks=${recipe.nBlocks}`
  );
  const structure = build(
    recipe.sequence,
    recipe.interlayerVectors,
    recipe.blockPeriod,
    recipe.nBlocks,
    recipe.options
  );
  const base = outBase ?? path.join(path.dirname(recipePath), recipe.name);
  return FileManager.writeStructure(structure, base, recipe.formats);
}

function buildPolytype(name: string, outBase: string | undefined, formats: string[]): string[] {
  const input = pristinePolytype(name);
  console.log(`Building ${input.symmetry} polytype ${name}: nBlocks=${input.nBlocks}`);
  const structure = build(input.sequence, input.interlayerVectors, input.blockPeriod, input.nBlocks, {
    name,
  });
  return FileManager.writeStructure(structure, outBase ?? name, formats);
}

function listPolytypes(): void {
  console.log('hexagonal  orthorhombic  stacking');
  for (const polytype of PRISTINE_POLYTYPES) {
    console.log(`${polytype.hexagonal.padEnd(11)}${polytype.orthorhombic.padEnd(14)}${polytype.stacking}`);
  }
}

export function run(argv: string[]): number {
  const flags = argv.filter((arg) => arg.startsWith('--'));
  const [command, ...args] = argv.filter((arg) => !arg.startsWith('--'));
  const formats = flags.includes('--str') ? ['cif', 'str'] : ['cif'];

  try {
    switch (command) {
      case 'build':
        if (!args[0]) {
          break;
        }
        buildRecipe(args[0], args[1]);
        return 0;
      case 'polytype':
        if (!args[0]) {
          break;
        }
        buildPolytype(args[0], args[1], formats);
        return 0;
      case 'list':
        listPolytypes();
        return 0;
      default:
        break;
    }
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  console.error(USAGE);
  return 1;
}

if (require.main === module) {
  process.exitCode = run(process.argv.slice(2));
}
