import type { Site } from '../models/site';
import type { Structure } from '../models/structure';

/**
 * Number sites per species in traversal order: O1, Mn1, O2, ...
 * TOPAS needs unique site labels.
 */
export function uniqueLabels(sites: Iterable<Site>): string[] {
  const counts = new Map<string, number>();
  const labels: string[] = [];
  for (const site of sites) {
    const n = (counts.get(site.species) ?? 0) + 1;
    counts.set(site.species, n);
    labels.push(`${site.species}${n}`);
  }
  return labels;
}

export function applyUniqueLabels(structure: Structure): void {
  const labels = uniqueLabels(structure);
  structure.sites.forEach((site, idx) => {
    site.name = labels[idx];
  });
}
