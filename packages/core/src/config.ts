/**
 * Gate configuration.
 *
 * Optional `.archgate/config.json` at the workspace root, validated with zod
 * and merged onto the defaults. Every key is optional.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const SYMBOL_MATCH_MODES = ['scoped', 'legacy'] as const;

export type SymbolMatchMode = typeof SYMBOL_MATCH_MODES[number];

export function isSymbolMatchMode(value: string): value is SymbolMatchMode {
  return SYMBOL_MATCH_MODES.some(mode => mode === value);
}

export interface GateConfig {
  /** Directory holding the six policy documents, relative to the root. */
  policyDir: string;
  /** Root manifest listing the workspace members. */
  manifest: string;
  /** Source root inside each module directory. */
  sourceRoot: string;
  sourceExtensions: string[];
  /** Any one of these must exist in each module directory. */
  readmeNames: string[];
  /** Globs (workspace-relative) of source files the gate never reads. */
  exclude: string[];
  /** Module names or member directories whose files are engine-scoped. */
  engineModules: string[];
  /** Regex source matched against bool field names in engine-scoped files. */
  warnedFieldPattern: string;
  bannedVariantNames: string[];
  /**
   * How `Type::method` and wildcard references resolve:
   * - 'scoped': the method must belong to an impl/trait block of `Type`
   * - 'legacy': any whole-word (or prefix) match anywhere in the search scope
   */
  symbolMatch: SymbolMatchMode;
}

export const DEFAULT_GATE_CONFIG: GateConfig = {
  policyDir: 'ifa',
  manifest: 'Cargo.toml',
  sourceRoot: 'src',
  sourceExtensions: ['.rs'],
  readmeNames: ['README.md'],
  exclude: [],
  engineModules: ['engine'],
  warnedFieldPattern: 'warned',
  bannedVariantNames: ['Unknown', 'Other', 'Placeholder', 'Todo', 'Tbd', 'Unspecified', 'Misc', 'Dummy'],
  symbolMatch: 'scoped',
};

const relativeDir = z.string().trim().min(1)
  .refine(p => !path.isAbsolute(p) && !p.split(/[\\/]/).includes('..'), 'must be a workspace-relative path');

const GateConfigSchema = z.object({
  policyDir: relativeDir,
  manifest: relativeDir,
  sourceRoot: relativeDir,
  sourceExtensions: z.array(z.string().regex(/^\.[A-Za-z0-9]+$/, 'must look like ".rs"')).min(1),
  readmeNames: z.array(z.string().min(1)).min(1),
  exclude: z.array(z.string().min(1)),
  engineModules: z.array(z.string().min(1)),
  warnedFieldPattern: z.string().min(1).refine(isValidRegex, 'must be a valid regular expression'),
  bannedVariantNames: z.array(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be an identifier')),
  symbolMatch: z.enum(SYMBOL_MATCH_MODES),
}).partial().strict();

export type GateConfigOverrides = z.infer<typeof GateConfigSchema>;

function isValidRegex(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

export function getConfigPath(root: string): string {
  return path.join(root, '.archgate', 'config.json');
}

/**
 * Merge overrides onto the defaults, validating them first.
 * `location` names the source of the overrides in diagnostics.
 */
export function resolveGateConfig(overrides: unknown, location = 'config'): GateConfig {
  const parsed = GateConfigSchema.safeParse(overrides ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue.path.join('.');
    const what = issue.code === 'unrecognized_keys' ? issue.message : `key '${key}' ${issue.message}`;
    throw new ConfigError(location, what);
  }
  const data = parsed.data;
  const d = DEFAULT_GATE_CONFIG;
  return {
    policyDir: data.policyDir ?? d.policyDir,
    manifest: data.manifest ?? d.manifest,
    sourceRoot: data.sourceRoot ?? d.sourceRoot,
    sourceExtensions: data.sourceExtensions ?? d.sourceExtensions,
    readmeNames: data.readmeNames ?? d.readmeNames,
    exclude: data.exclude ?? d.exclude,
    engineModules: data.engineModules ?? d.engineModules,
    warnedFieldPattern: data.warnedFieldPattern ?? d.warnedFieldPattern,
    bannedVariantNames: data.bannedVariantNames ?? d.bannedVariantNames,
    symbolMatch: data.symbolMatch ?? d.symbolMatch,
  };
}

/**
 * Load `.archgate/config.json` from the workspace root. A missing file means
 * defaults; an unreadable or malformed one is a ConfigError.
 */
export function loadGateConfig(root: string, cliOverrides: GateConfigOverrides = {}): GateConfig {
  const configPath = getConfigPath(root);
  const display = path.relative(root, configPath).split(path.sep).join('/');

  let fileOverrides: unknown = {};
  if (fs.existsSync(configPath)) {
    let raw: string;
    try {
      raw = fs.readFileSync(configPath, 'utf-8');
    } catch (err) {
      throw new ConfigError(display, `cannot be read: ${err instanceof Error ? err.message : String(err)}`);
    }
    try {
      fileOverrides = JSON.parse(raw);
    } catch (err) {
      throw new ConfigError(display, `is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (!fileOverrides || typeof fileOverrides !== 'object' || Array.isArray(fileOverrides)) {
      throw new ConfigError(display, 'top-level value must be an object');
    }
  }

  const fromFile = resolveGateConfig(fileOverrides, display);
  return resolveGateConfig({ ...fromFile, ...cliOverrides }, 'command line');
}
