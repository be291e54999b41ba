import * as fs from 'fs';
import * as path from 'path';
import type { Structure } from '../models/structure';
import { CIFWriter, TOPASWriter, type StructureWriter } from './writers';

/**
 * File extension to writer mapping
 */
const WRITER_MAP: Record<string, StructureWriter> = {
  cif: new CIFWriter(),
  str: new TOPASWriter(),
};

/**
 * Manage structure file output
 */
export class FileManager {
  private static readonly DEFAULT_NAME = 'closepack-stack';

  /**
   * Save structure to file content
   */
  static saveStructure(
    structure: Structure,
    format: string
  ): string {
    const ext = this.resolveFormat(format);
    const writer = WRITER_MAP[ext];

    if (!writer) {
      throw new Error(`Unsupported export format: ${ext}`);
    }

    return writer.serialize(structure);
  }

  /**
   * Write one file per format next to `basePath` and return the written
   * paths. A trailing writer extension on `basePath` is replaced.
   */
  static writeStructure(
    structure: Structure,
    basePath: string,
    formats: string[] = ['cif']
  ): string[] {
    this.ensureStructureName(structure, basePath);
    const resolved = path.resolve(basePath);
    const dir = path.dirname(resolved);
    const baseName = this.stripFormatExtension(path.basename(resolved));
    const written: string[] = [];

    for (const format of formats) {
      const ext = this.resolveFormat(format);
      const content = this.saveStructure(structure, ext);
      const target = path.join(dir, `${baseName}.${ext}`);
      try {
        fs.mkdirSync(dir, { recursive: true });
        fs.writeFileSync(target, content, 'utf8');
      } catch (error) {
        throw new Error(`Failed to write ${target}: ${error instanceof Error ? error.message : String(error)}`);
      }
      console.log(`Wrote ${target} (${structure.sites.length} sites)`);
      written.push(target);
    }

    return written;
  }

  static ensureStructureName(structure: Structure, filePath?: string) {
    const current = (structure.name || '').trim();
    if (current) {
      return;
    }

    const baseName = filePath ? this.stripFormatExtension(path.basename(filePath)) : '';
    structure.name = baseName || this.DEFAULT_NAME;
  }

  /**
   * Get supported formats
   */
  static getSupportedFormats(): string[] {
    return Object.keys(WRITER_MAP);
  }

  /**
   * Resolve a format string or file path into a supported format
   */
  static resolveFormat(input: string, fallback: string = 'cif'): string {
    const trimmed = (input || '').trim();
    if (!trimmed) {
      return fallback;
    }
    const lowered = trimmed.toLowerCase();
    if (WRITER_MAP[lowered]) {
      return lowered;
    }
    const ext = this.getFileExtension(lowered);
    if (ext) {
      return ext;
    }
    return lowered;
  }

  // Dots in names such as d7.1 are kept
  private static stripFormatExtension(fileName: string): string {
    const ext = path.extname(fileName);
    if (ext && WRITER_MAP[ext.slice(1).toLowerCase()]) {
      return fileName.slice(0, -ext.length);
    }
    return fileName;
  }

  /**
   * Get file extension
   */
  private static getFileExtension(filePath: string): string {
    const baseName = filePath.split(/[/\\]/).pop() || '';
    const parts = baseName.split('.');
    if (parts.length > 1) {
      return parts[parts.length - 1];
    }
    return '';
  }
}
