import type { Structure } from '../../models/structure';
import { uniqueLabels } from '../../stacking/labels';
import type { StructureWriter } from './structureWriter';

/**
 * CIF writer, P1 only
 * Crystallographic Information File
 */
export class CIFWriter implements StructureWriter {
  readonly extension = 'cif';

  serialize(structure: Structure): string {
    const lines: string[] = [];
    lines.push(`data_${this.blockName(structure.name)}`);
    lines.push('');
    lines.push("_audit_creation_method       'closepack-stack'");
    lines.push('');

    // Write unit cell
    const cell = structure.lattice;
    lines.push(`_cell_length_a    ${cell.a.toFixed(6)}`);
    lines.push(`_cell_length_b    ${cell.b.toFixed(6)}`);
    lines.push(`_cell_length_c    ${cell.c.toFixed(6)}`);
    lines.push(`_cell_angle_alpha ${cell.alpha.toFixed(6)}`);
    lines.push(`_cell_angle_beta  ${cell.beta.toFixed(6)}`);
    lines.push(`_cell_angle_gamma ${cell.gamma.toFixed(6)}`);
    lines.push('');
    lines.push('_space_group_name_H-M_alt    "P 1"');
    lines.push('_space_group_IT_number       1');
    lines.push('');
    lines.push('loop_');
    lines.push('  _space_group_symop_operation_xyz');
    lines.push("  'x, y, z'");
    lines.push('');

    // Write sites
    lines.push('loop_');
    lines.push('_atom_site_label');
    lines.push('_atom_site_type_symbol');
    lines.push('_atom_site_occupancy');
    lines.push('_atom_site_fract_x');
    lines.push('_atom_site_fract_y');
    lines.push('_atom_site_fract_z');
    lines.push('_atom_site_B_iso_or_equiv');

    const labels = uniqueLabels(structure);
    structure.sites.forEach((site, idx) => {
      lines.push(
        [
          labels[idx],
          site.species,
          String(site.occupancy),
          site.fx.toFixed(10),
          site.fy.toFixed(10),
          site.fz.toFixed(10),
          String(site.biso),
        ].join('  ')
      );
    });

    return lines.join('\n') + '\n';
  }

  // CIF data block names cannot contain whitespace
  private blockName(name: string): string {
    const cleaned = name.trim().replace(/\s+/g, '_');
    return cleaned || 'structure';
  }
}
