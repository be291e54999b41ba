import { InvalidInputError } from '../errors';
import { Lattice } from './lattice';
import type { LatticeParameters } from './lattice';
import { Site } from './site';
import type { SiteJSON } from './site';

export interface StructureJSON {
  name: string;
  lattice: LatticeParameters;
  sites: SiteJSON[];
}

/**
 * An ordered collection of sites sharing one lattice instance.
 *
 * The structure owns the lattice: every site references the same object,
 * and `setLattice` is the single place a lattice change is pushed to the
 * sites.
 */
export class Structure implements Iterable<Site> {
  name: string;
  private _sites: Site[];
  private _lattice: Lattice;

  constructor(sites: Iterable<Site> = [], lattice: Lattice, name: string = 'Untitled') {
    if (!(lattice instanceof Lattice)) {
      throw new InvalidInputError('structure lattice', 'a Lattice instance is required');
    }
    this.name = name;
    this._sites = Array.from(sites);
    this._sites.forEach((site, idx) => {
      if (!(site instanceof Site)) {
        throw new InvalidInputError(`structure site ${idx}`, 'expected a Site instance');
      }
    });
    this._lattice = lattice;
    this.propagateLattice();
  }

  get lattice(): Lattice {
    return this._lattice;
  }

  get sites(): readonly Site[] {
    return this._sites;
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

  get alpha(): number {
    return this._lattice.alpha;
  }

  get beta(): number {
    return this._lattice.beta;
  }

  get gamma(): number {
    return this._lattice.gamma;
  }

  /**
   * Replace the lattice and re-associate every site, even when the new
   * lattice equals the old one by value.
   */
  setLattice(lattice: Lattice): void {
    if (!(lattice instanceof Lattice)) {
      throw new InvalidInputError('structure lattice', 'a Lattice instance is required');
    }
    this._lattice = lattice;
    this.propagateLattice();
  }

  updateLattice(changes: Partial<LatticeParameters>): void {
    this.setLattice(this._lattice.with(changes));
  }

  /**
   * Add a site to the structure
   */
  addSite(site: Site): void {
    site.associate(this._lattice);
    this._sites.push(site);
  }

  *[Symbol.iterator](): Iterator<Site> {
    for (const site of this._sites) {
      yield site;
    }
  }

  /**
   * Clone this structure with a fresh lattice shared by fresh sites
   */
  clone(): Structure {
    return new Structure(
      this._sites.map((site) => site.clone()),
      this._lattice.clone(),
      this.name
    );
  }

  /**
   * Clone with every site set to the given occupancy
   */
  withOccupancy(occupancy: number): Structure {
    const cloned = this.clone();
    for (const site of cloned) {
      site.occupancy = occupancy;
    }
    return cloned;
  }

  private propagateLattice(): void {
    for (const site of this._sites) {
      site.associate(this._lattice);
    }
  }

  toString(): string {
    return ['Structure <', `   ${this._lattice.toString()}`, ...this._sites.map((site) => `   ${site.toString()}`), '>'].join('\n');
  }

  /**
   * Convert to JSON
   */
  toJSON(): StructureJSON {
    return {
      name: this.name,
      lattice: this._lattice.toJSON(),
      sites: this._sites.map((s) => s.toJSON()),
    };
  }
}
