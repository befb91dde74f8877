/**
 * Inputs shared by the policy validators and small location helpers.
 */

import type { ClassificationAssignment } from '../classification.js';
import type { GateConfig } from '../config.js';
import { formatFieldPath, type PolicySet } from '../policy/loader.js';
import type { SymbolResolver } from '../resolver.js';
import type { SourceCache } from '../source-cache.js';
import type { Workspace } from '../workspace.js';

/** What a structural ban check reads. */
export interface ScanContext {
  workspace: Workspace;
  cache: SourceCache;
  config: GateConfig;
}

export interface CoreBanContext extends ScanContext {
  classification: ClassificationAssignment;
}

/** What a policy cross-check reads. */
export interface PolicyContext {
  policies: PolicySet;
  resolver: SymbolResolver;
}

/** `ifa/authority_boundary_map.toml:entries[0].constructor_paths[1]` */
export function fieldLocation(docPath: string, segments: ReadonlyArray<string | number>): string {
  return `${docPath}:${formatFieldPath(segments)}`;
}

export function sourceLocation(file: string, line: number): string {
  return line > 0 ? `${file}:${line}` : file;
}

/** Type text with whitespace removed, for shape comparisons. */
export function compactType(text: string): string {
  return text.replace(/\s+/g, '');
}
