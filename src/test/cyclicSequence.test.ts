import * as assert from 'assert';
import { InvalidInputError } from '../errors';
import { CyclicSequence } from '../stacking/cyclicSequence';

suite('CyclicSequence', () => {
	test('wraps to the first item after the last', () => {
		const cycle = new CyclicSequence(['a', 'b', 'c']);
		const drawn: string[] = [];
		for (let i = 0; i < 7; i++) {
			drawn.push(cycle.next());
		}
		assert.deepStrictEqual(drawn, ['a', 'b', 'c', 'a', 'b', 'c', 'a']);
	});

	test('step N + k yields the item of step k', () => {
		const items = [10, 20, 30, 40];
		const cycle = new CyclicSequence(items);
		const drawn: number[] = [];
		for (let i = 0; i < 3 * items.length; i++) {
			drawn.push(cycle.next());
		}
		for (let k = 0; k < 2 * items.length; k++) {
			assert.strictEqual(drawn[items.length + k], drawn[k]);
		}
	});

	test('index stays within bounds', () => {
		const cycle = new CyclicSequence([1, 2]);
		const seen: number[] = [];
		for (let i = 0; i < 5; i++) {
			seen.push(cycle.index);
			cycle.advance();
		}
		assert.deepStrictEqual(seen, [0, 1, 0, 1, 0]);
		assert.strictEqual(cycle.length, 2);
	});

	test('current does not move and reset restarts', () => {
		const cycle = new CyclicSequence(['x', 'y']);
		assert.strictEqual(cycle.current(), 'x');
		assert.strictEqual(cycle.current(), 'x');
		cycle.advance();
		assert.strictEqual(cycle.current(), 'y');
		cycle.reset();
		assert.strictEqual(cycle.next(), 'x');
	});

	test('rejects an empty list', () => {
		assert.throws(() => new CyclicSequence([], 'layers'), (error: unknown) => {
			return error instanceof InvalidInputError && error.argument === 'layers';
		});
	});
});
