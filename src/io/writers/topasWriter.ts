import type { Structure } from '../../models/structure';
import { uniqueLabels } from '../../stacking/labels';
import type { StructureWriter } from './structureWriter';

/**
 * TOPAS structure (.str) writer, P1 only
 */
export class TOPASWriter implements StructureWriter {
  readonly extension = 'str';

  serialize(structure: Structure): string {
    const cell = structure.lattice;
    const lines: string[] = [];
    lines.push('str');
    lines.push(`    phase_name "${structure.name.replace(/"/g, "'")}"`);
    lines.push(`    a  ${cell.a.toFixed(6)}`);
    lines.push(`    b  ${cell.b.toFixed(6)}`);
    lines.push(`    c  ${cell.c.toFixed(6)}`);
    lines.push(`    al ${cell.alpha.toFixed(6)}`);
    lines.push(`    be ${cell.beta.toFixed(6)}`);
    lines.push(`    ga ${cell.gamma.toFixed(6)}`);
    lines.push('    space_group "P1"');

    const labels = uniqueLabels(structure);
    structure.sites.forEach((site, idx) => {
      lines.push(
        `    site ${labels[idx]} x ${site.fx.toFixed(10)} y ${site.fy.toFixed(10)} z ${site.fz.toFixed(10)} occ ${site.species} ${site.occupancy} beq ${site.biso}`
      );
    });

    return lines.join('\n') + '\n';
  }
}
