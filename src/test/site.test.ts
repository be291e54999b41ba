import * as assert from 'assert';
import { InvalidInputError } from '../errors';
import { Lattice } from '../models/lattice';
import { Site } from '../models/site';

suite('Site', () => {
	const lattice = new Lattice(4.93, 2.85, 1.5, 90, 90, 90);

	test('absolute coordinates follow fractional ones', () => {
		const site = new Site('Mn', 1, 0.25, 0.1, 1 / 3, 1, lattice);
		assert.strictEqual(site.x, 0.25 * 4.93);
		assert.strictEqual(site.y, 0.1 * 2.85);
		assert.strictEqual(site.z, (1 / 3) * 1.5);
		assert.strictEqual(site.name, 'Mn');
	});

	test('setting fractional coordinates recomputes absolute ones', () => {
		const site = new Site('O', 1, 0, 0, 0, 1, lattice);
		site.fx = 0.5;
		site.fy = 0.25;
		site.fz = 0.75;
		assert.deepStrictEqual(site.getPosition(), [0.5 * 4.93, 0.25 * 2.85, 0.75 * 1.5]);
	});

	test('setting absolute coordinates recomputes fractional ones', () => {
		const site = new Site('O', 1, 0, 0, 0, 1, lattice);
		site.setPosition(1, 2, 0.75);
		assert.strictEqual(site.fx, 1 / 4.93);
		assert.strictEqual(site.fy, 2 / 2.85);
		assert.strictEqual(site.fz, 0.5);
	});

	test('associating a new lattice keeps fractional coordinates', () => {
		const site = new Site('O', 1, 0.5, 0.5, 0.5, 1, lattice);
		const wider = new Lattice(10, 4, 3, 90, 90, 90);
		site.associate(wider);
		assert.strictEqual(site.lattice, wider);
		assert.deepStrictEqual(site.getFractional(), [0.5, 0.5, 0.5]);
		assert.deepStrictEqual(site.getPosition(), [5, 2, 1.5]);
		assert.strictEqual(site.c, 3);
	});

	test('clone is independent, lattice included', () => {
		const site = new Site('Mn', 0.8333, 0.1, 0.2, 0.3, 0.5, lattice);
		site.name = 'Mn7';
		const cloned = site.clone();
		assert.ok(cloned.lattice !== site.lattice);
		assert.ok(cloned.lattice.equals(site.lattice));
		assert.strictEqual(cloned.name, 'Mn7');
		assert.strictEqual(cloned.occupancy, 0.8333);
		assert.strictEqual(cloned.biso, 0.5);

		cloned.fx = 0.9;
		assert.strictEqual(site.fx, 0.1);
	});

	test('does not validate occupancy or coordinate range', () => {
		const site = new Site('O', 1.7, 1.3, -0.4, 2, 1, lattice);
		assert.strictEqual(site.occupancy, 1.7);
		assert.deepStrictEqual(site.getFractional(), [1.3, -0.4, 2]);
	});

	test('pins z and fz to zero on a lattice without height', () => {
		const flat = new Lattice(1, 1, 0);
		const site = new Site('O', 1, 0, 0, 0, 1, flat);
		site.z = 2;
		assert.strictEqual(site.z, 0);
		assert.strictEqual(site.fz, 0);
		assert.strictEqual(site.z, site.fz * site.c);
	});

	test('rejects a missing lattice', () => {
		assert.throws(() => Reflect.construct(Site, ['O', 1, 0, 0, 0, 1, null]), InvalidInputError);
	});

	test('rejects an empty species or a non-finite coordinate', () => {
		assert.throws(() => new Site(' ', 1, 0, 0, 0, 1, lattice), /site species/);
		assert.throws(() => new Site('O', 1, Number.NaN, 0, 0, 1, lattice), /site fx/);
	});
});
