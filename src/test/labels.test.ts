import * as assert from 'assert';
import { Lattice, Site, Structure, applyUniqueLabels, uniqueLabels } from '../index';

suite('Labels', () => {
	const lattice = new Lattice(2, 2, 2, 90, 90, 90);
	const species = ['O', 'Mn', 'O', 'Mn', 'O'];

	function makeStructure(): Structure {
		return new Structure(
			species.map((element, idx) => new Site(element, 1, idx / 10, 0, 0, 1, lattice)),
			lattice
		);
	}

	test('numbers each species in traversal order', () => {
		assert.deepStrictEqual(uniqueLabels(makeStructure()), ['O1', 'Mn1', 'O2', 'Mn2', 'O3']);
	});

	test('uniqueLabels leaves the sites alone', () => {
		const structure = makeStructure();
		uniqueLabels(structure);
		assert.deepStrictEqual(structure.sites.map((site) => site.name), species);
	});

	test('applyUniqueLabels renames sites only', () => {
		const structure = makeStructure();
		applyUniqueLabels(structure);
		assert.deepStrictEqual(structure.sites.map((site) => site.name), ['O1', 'Mn1', 'O2', 'Mn2', 'O3']);
		assert.deepStrictEqual(structure.sites.map((site) => site.species), species);
		assert.strictEqual(structure.sites[4].fx, 0.4);
	});
});
