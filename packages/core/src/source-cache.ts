/**
 * Run-scoped read-through cache of source text and scan results.
 *
 * Several validators re-scan overlapping files, so each file is read and
 * scanned at most once per run. The cache is created by the gate run, passed
 * explicitly to whatever needs it, and dropped when the run ends; nothing is
 * kept between runs.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { createSourceFile, scanDeclarations, type Declaration, type SourceFile } from './scanner/index.js';

export type ReadText = (absolutePath: string) => string;

export interface SourceCacheStats {
  reads: number;
  scans: number;
}

const readUtf8: ReadText = (absolutePath) => fs.readFileSync(absolutePath, 'utf-8');

export class SourceCache {
  private readonly files = new Map<string, SourceFile>();
  private readonly scans = new Map<string, Declaration[]>();
  private readonly stats: SourceCacheStats = { reads: 0, scans: 0 };

  /**
   * @param root - workspace root that relative paths are resolved against
   * @param readText - file reader; tests substitute an in-memory one
   */
  constructor(
    private readonly root: string,
    private readonly readText: ReadText = readUtf8,
  ) {}

  /** Source text plus its comment-stripped lines, read once. */
  get(relPath: string): SourceFile {
    const cached = this.files.get(relPath);
    if (cached) return cached;
    const text = this.readText(path.join(this.root, relPath));
    this.stats.reads++;
    const file = createSourceFile(relPath, text);
    this.files.set(relPath, file);
    return file;
  }

  /** Declarations recovered from a file, scanned once. */
  declarations(relPath: string): Declaration[] {
    const cached = this.scans.get(relPath);
    if (cached) return cached;
    const decls = scanDeclarations(this.get(relPath));
    this.stats.scans++;
    this.scans.set(relPath, decls);
    return decls;
  }

  getStats(): SourceCacheStats {
    return { ...this.stats };
  }
}
