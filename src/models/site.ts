import { InvalidInputError } from '../errors';
import type { Vector3 } from '../utils/geometryUtils';
import { Lattice } from './lattice';

export interface SiteJSON {
  name: string;
  species: string;
  occupancy: number;
  biso: number;
  fractional: Vector3;
  position: Vector3;
}

function requireFinite(argument: string, value: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidInputError(argument, `expected a finite number, got ${String(value)}`);
  }
  return value;
}

/**
 * Represents a single atomic site bound to a lattice.
 *
 * Fractional and absolute coordinates are kept in step through the
 * lengths of the associated lattice: x = fx * a, y = fy * b, z = fz * c.
 */
export class Site {
  name: string;
  species: string;
  occupancy: number;
  biso: number;
  private _lattice: Lattice;
  private _fx: number;
  private _fy: number;
  private _fz: number;
  private _x = 0;
  private _y = 0;
  private _z = 0;

  constructor(
    species: string,
    occupancy: number,
    fx: number,
    fy: number,
    fz: number,
    biso: number,
    lattice: Lattice
  ) {
    if (typeof species !== 'string' || species.trim() === '') {
      throw new InvalidInputError('site species', 'expected a non-empty element label');
    }
    if (!(lattice instanceof Lattice)) {
      throw new InvalidInputError(`lattice of site ${species}`, 'a Lattice instance is required');
    }
    this.species = species;
    this.name = species;
    this.occupancy = requireFinite('site occupancy', occupancy);
    this.biso = requireFinite('site biso', biso);
    this._fx = requireFinite('site fx', fx);
    this._fy = requireFinite('site fy', fy);
    this._fz = requireFinite('site fz', fz);
    this._lattice = lattice;
    this.recomputeFromLattice();
  }

  get lattice(): Lattice {
    return this._lattice;
  }

  get a(): number {
    return this._lattice.a;
  }

  get b(): number {
    return this._lattice.b;
  }

  get c(): number {
    return this._lattice.c;
  }

  get fx(): number {
    return this._fx;
  }

  set fx(value: number) {
    this._fx = value;
    this._x = value * this._lattice.a;
  }

  get fy(): number {
    return this._fy;
  }

  set fy(value: number) {
    this._fy = value;
    this._y = value * this._lattice.b;
  }

  get fz(): number {
    return this._fz;
  }

  set fz(value: number) {
    this._fz = value;
    this._z = value * this._lattice.c;
  }

  get x(): number {
    return this._x;
  }

  set x(value: number) {
    this._x = value;
    this._fx = value / this._lattice.a;
  }

  get y(): number {
    return this._y;
  }

  set y(value: number) {
    this._y = value;
    this._fy = value / this._lattice.b;
  }

  get z(): number {
    return this._z;
  }

  // A degenerate c = 0 has no fractional height; fz is pinned to 0.
  // A cell without height holds every site at z = 0
  set z(value: number) {
    if (this._lattice.c === 0) {
      this._z = 0;
      this._fz = 0;
      return;
    }
    this._z = value;
    this._fz = value / this._lattice.c;
  }

  /**
   * Bind this site to another lattice. Fractional coordinates are kept;
   * absolute coordinates follow the new lattice lengths.
   */
  associate(lattice: Lattice): void {
    if (!(lattice instanceof Lattice)) {
      throw new InvalidInputError(`lattice of site ${this.name}`, 'a Lattice instance is required');
    }
    this._lattice = lattice;
    this.recomputeFromLattice();
  }

  recomputeFromLattice(): void {
    this._x = this._fx * this._lattice.a;
    this._y = this._fy * this._lattice.b;
    this._z = this._fz * this._lattice.c;
  }

  /**
   * Get absolute position as array
   */
  getPosition(): Vector3 {
    return [this._x, this._y, this._z];
  }

  /**
   * Set absolute position
   */
  setPosition(x: number, y: number, z: number): void {
    this.x = x;
    this.y = y;
    this.z = z;
  }

  getFractional(): Vector3 {
    return [this._fx, this._fy, this._fz];
  }

  setFractional(fx: number, fy: number, fz: number): void {
    this.fx = fx;
    this.fy = fy;
    this.fz = fz;
  }

  /**
   * Clone this site, lattice included
   */
  clone(): Site {
    const cloned = new Site(
      this.species,
      this.occupancy,
      this._fx,
      this._fy,
      this._fz,
      this.biso,
      this._lattice.clone()
    );
    cloned.name = this.name;
    return cloned;
  }

  toString(): string {
    return `Site <${this.name} occ=${this.occupancy} fx=${this._fx}, fy=${this._fy}, fz=${this._fz}>`;
  }

  /**
   * Convert to JSON
   */
  toJSON(): SiteJSON {
    return {
      name: this.name,
      species: this.species,
      occupancy: this.occupancy,
      biso: this.biso,
      fractional: this.getFractional(),
      position: this.getPosition(),
    };
  }
}
