import { InvalidInputError } from '../errors';

export interface LatticeParameters {
  a: number;
  b: number;
  c: number;
  alpha: number;
  beta: number;
  gamma: number;
}

/**
 * Represents a crystallographic unit cell by its six scalar parameters.
 * Instances are immutable; use `with` to derive a variant.
 */
export class Lattice implements LatticeParameters {
  readonly a: number; // angstroms
  readonly b: number;
  readonly c: number;
  readonly alpha: number; // degrees
  readonly beta: number;
  readonly gamma: number;

  constructor(
    a: number = 1.0,
    b: number = 1.0,
    c: number = 1.0,
    alpha: number = 90.0,
    beta: number = 90.0,
    gamma: number = 90.0
  ) {
    Lattice.validate({ a, b, c, alpha, beta, gamma });
    this.a = a;
    this.b = b;
    this.c = c;
    this.alpha = alpha;
    this.beta = beta;
    this.gamma = gamma;
  }

  static fromParameters(params: Partial<LatticeParameters>): Lattice {
    return new Lattice(params.a, params.b, params.c, params.alpha, params.beta, params.gamma);
  }

  private static validate(params: LatticeParameters): void {
    for (const [key, value] of Object.entries(params)) {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new InvalidInputError(`lattice parameter ${key}`, `expected a finite number, got ${String(value)}`);
      }
    }
    if (params.a <= 0) {
      throw new InvalidInputError('lattice parameter a', `must be positive, got ${params.a}`);
    }
    if (params.b <= 0) {
      throw new InvalidInputError('lattice parameter b', `must be positive, got ${params.b}`);
    }
    if (params.c < 0) {
      throw new InvalidInputError('lattice parameter c', `must not be negative, got ${params.c}`);
    }
    for (const key of ['alpha', 'beta', 'gamma'] as const) {
      const angle = params[key];
      if (angle <= 0 || angle >= 180) {
        throw new InvalidInputError(`lattice parameter ${key}`, `must lie in (0, 180) degrees, got ${angle}`);
      }
    }
  }

  /**
   * Get lattice parameters
   */
  getParameters(): [number, number, number, number, number, number] {
    return [this.a, this.b, this.c, this.alpha, this.beta, this.gamma];
  }

  getLengths(): [number, number, number] {
    return [this.a, this.b, this.c];
  }

  getAngles(): [number, number, number] {
    return [this.alpha, this.beta, this.gamma];
  }

  /**
   * Get volume in cubic angstroms
   */
  getVolume(): number {
    const cosAlpha = Math.cos((this.alpha * Math.PI) / 180);
    const cosBeta = Math.cos((this.beta * Math.PI) / 180);
    const cosGamma = Math.cos((this.gamma * Math.PI) / 180);

    return (
      this.a *
      this.b *
      this.c *
      Math.sqrt(
        1 -
          cosAlpha * cosAlpha -
          cosBeta * cosBeta -
          cosGamma * cosGamma +
          2 * cosAlpha * cosBeta * cosGamma
      )
    );
  }

  /**
   * New lattice with some parameters replaced
   */
  with(changes: Partial<LatticeParameters>): Lattice {
    return Lattice.fromParameters({ ...this.toJSON(), ...changes });
  }

  equals(other: Lattice): boolean {
    return this.hashKey() === other.hashKey();
  }

  hashKey(): string {
    return this.getParameters().join('|');
  }

  /**
   * Clone this lattice
   */
  clone(): Lattice {
    return new Lattice(this.a, this.b, this.c, this.alpha, this.beta, this.gamma);
  }

  toString(): string {
    return `Lattice <a=${this.a}, b=${this.b}, c=${this.c}, alpha=${this.alpha}, beta=${this.beta}, gamma=${this.gamma}>`;
  }

  /**
   * Convert to JSON
   */
  toJSON(): LatticeParameters {
    return {
      a: this.a,
      b: this.b,
      c: this.c,
      alpha: this.alpha,
      beta: this.beta,
      gamma: this.gamma,
    };
  }
}
