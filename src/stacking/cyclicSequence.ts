import { InvalidInputError } from '../errors';

/**
 * Endless cursor over a finite list; wraps back to the first item after
 * the last one.
 */
export class CyclicSequence<T> {
  private readonly items: readonly T[];
  private _index = 0;

  constructor(items: readonly T[], label: string = 'sequence') {
    if (items.length === 0) {
      throw new InvalidInputError(label, 'a cyclic sequence needs at least one item');
    }
    this.items = items;
  }

  get index(): number {
    return this._index;
  }

  get length(): number {
    return this.items.length;
  }

  current(): T {
    return this.items[this._index];
  }

  advance(): void {
    this._index = (this._index + 1) % this.items.length;
  }

  /**
   * Current item, then move on
   */
  next(): T {
    const item = this.current();
    this.advance();
    return item;
  }

  reset(): void {
    this._index = 0;
  }
}
