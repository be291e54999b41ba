import * as assert from 'assert';
import { InvalidInputError } from '../errors';
import { Lattice } from '../models/lattice';
import {
	COLUMNS,
	PRISTINE_POLYTYPES,
	birnessiteLattice,
	birnessiteLayers,
	columnTriple,
	findPolytype,
	pristinePolytype,
	voidLayer,
} from '../stacking/polytypes';
import { build } from '../stacking/stackBuilder';

function close(actual: number, expected: number, tolerance = 1e-9): void {
	assert.ok(Math.abs(actual - expected) < tolerance, `expected ${actual} to be close to ${expected}`);
}

suite('Polytypes', () => {
	test('hexagonal layers have a = sqrt(3) b, orthorhombic ones are stretched', () => {
		const hexagonal = birnessiteLattice('hexagonal');
		const orthorhombic = birnessiteLattice('orthorhombic');
		assert.strictEqual(hexagonal.b, 2.85);
		assert.strictEqual(hexagonal.c, 1);
		assert.strictEqual(hexagonal.a, Math.sqrt(3) * 2.85);
		close(orthorhombic.a, 1.05 * Math.sqrt(3) * 2.85);
	});

	test('layers carry two sites and an optional cation occupancy', () => {
		const layers = birnessiteLayers('hexagonal', { cationOccupancy: 0.8333 });
		assert.deepStrictEqual(layers.anion.sites.map((site) => site.species), ['O', 'O']);
		assert.deepStrictEqual(layers.cation.sites.map((site) => site.occupancy), [0.8333, 0.8333]);
		assert.deepStrictEqual(layers.cation.sites[1].getFractional(), [0.5, 0.5, 0]);
	});

	test('a column triple places anion, cation, anion sheets', () => {
		const layers = birnessiteLayers('hexagonal');
		const entries = columnTriple(layers, 'cab');
		assert.deepStrictEqual(entries.map(([layer]) => layer), [layers.anion, layers.cation, layers.anion]);
		assert.deepStrictEqual(entries.map(([, vector]) => vector), [COLUMNS.C, COLUMNS.A, COLUMNS.B]);
	});

	test('finds polytypes by either name', () => {
		const { definition, symmetry } = findPolytype('1M1');
		assert.strictEqual(symmetry, 'orthorhombic');
		assert.strictEqual(definition.hexagonal, '3R1');
		assert.strictEqual(findPolytype('2H2').symmetry, 'hexagonal');
		assert.throws(() => findPolytype('9Z'), InvalidInputError);
		assert.strictEqual(PRISTINE_POLYTYPES.length, 7);
	});

	test('1H builds one block at a 7.1 angstrom basal spacing', () => {
		const input = pristinePolytype('1H');
		assert.strictEqual(input.sequence.length, 3);
		assert.strictEqual(input.blockPeriod, 3);
		assert.strictEqual(input.nBlocks, 1);
		close(input.interlayerVectors[0][2], 4.1);

		const structure = build(input.sequence, input.interlayerVectors, input.blockPeriod, input.nBlocks);
		assert.strictEqual(structure.sites.length, 6);
		close(structure.c, 7.1);
		assert.deepStrictEqual(structure.sites.map((site) => site.species), ['O', 'O', 'Mn', 'Mn', 'O', 'O']);
		close(structure.sites[2].fx, 2 / 3);
		close(structure.sites[3].fx, 1 / 6);
		close(structure.sites[2].fz, 1 / 7.1);
		close(structure.sites[4].fz, 2 / 7.1);
	});

	test('3R1 stacks three blocks', () => {
		const input = pristinePolytype('3R1');
		const structure = build(input.sequence, input.interlayerVectors, input.blockPeriod, input.nBlocks);
		assert.strictEqual(structure.sites.length, 18);
		close(structure.c, 21.3);
	});

	test('orthorhombic polytypes use stretched layers', () => {
		const input = pristinePolytype('2O1', { basalSpacing: 7.2 });
		assert.strictEqual(input.symmetry, 'orthorhombic');
		const structure = build(input.sequence, input.interlayerVectors, input.blockPeriod, input.nBlocks);
		close(structure.a, 1.05 * Math.sqrt(3) * 2.85);
		close(structure.c, 14.4);
	});

	test('a void layer only adds height', () => {
		const lattice = new Lattice(2, 2, 1, 90, 90, 90);
		const gap = voidLayer(lattice, 0.1);
		assert.strictEqual(gap.sites.length, 0);
		assert.strictEqual(gap.c, 0.1);
		assert.strictEqual(lattice.c, 1);
	});
});
