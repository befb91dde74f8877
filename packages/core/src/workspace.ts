/**
 * Workspace model: modules and their source files.
 *
 * Modules come from the root manifest's `[workspace] members`. Health
 * problems (missing member directories, README-equivalents, source roots,
 * or empty source roots) are collected across every module and reported
 * together; manifest problems fail immediately.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { minimatch } from 'minimatch';
import { z } from 'zod';
import type { GateConfig } from './config.js';
import { ConfigError, WorkspaceHealthError } from './errors.js';
import { formatFieldPath } from './policy/loader.js';
import { describeParseError, type ParseToml } from './policy/toml.js';

export interface WorkspaceModule {
  /** Name used as the first segment of symbol paths. */
  name: string;
  /** Member directory, workspace-relative ('' for the root). */
  dir: string;
  /** Source root, workspace-relative. */
  sourceRoot: string;
  /** Source files, workspace-relative and sorted. */
  files: string[];
}

export interface Workspace {
  root: string;
  modules: WorkspaceModule[];
  /** Every source file of every module, sorted. */
  files: string[];
}

export interface LoadWorkspaceOptions {
  root: string;
  config: GateConfig;
  parseToml: ParseToml;
}

const RootManifestSchema = z.object({
  workspace: z.object({
    members: z.array(z.string().trim().min(1, 'must be a non-empty string'), {
      required_error: 'is missing',
      invalid_type_error: 'must be a list of strings',
    }).min(1, 'must be a non-empty list'),
    exclude: z.array(z.string(), { invalid_type_error: 'must be a list of strings' }).optional(),
  }, { required_error: 'is missing', invalid_type_error: 'must be a table' }),
});

const MemberManifestSchema = z.object({
  package: z.object({ name: z.string().trim().min(1) }).optional(),
});

/** Directories never descended into while listing sources. */
const SKIP_DIRS = new Set(['target', 'node_modules', '.git']);

const GLOB_CHARS_RE = /[*?[\]{}]/;

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

function normalizeMember(member: string): string {
  const trimmed = member.trim().replace(/\\/g, '/').replace(/\/+$/, '').replace(/^\.\//, '');
  return trimmed === '.' ? '' : trimmed;
}

/** Crate names use `-`; symbol paths use `_`. */
export function moduleNameFor(rawName: string): string {
  return rawName.replace(/-/g, '_');
}

function readToml(root: string, relPath: string, parseToml: ParseToml): unknown {
  const raw = fs.readFileSync(path.join(root, relPath), 'utf-8');
  try {
    return parseToml(raw);
  } catch (err) {
    throw new ConfigError(relPath, `is not valid TOML: ${describeParseError(err)}`);
  }
}

function listDirs(root: string, base: string, levels: number): string[] {
  const out: string[] = [];
  const abs = path.join(root, base);
  if (levels <= 0 || !fs.existsSync(abs)) return out;
  const entries = fs.readdirSync(abs, { withFileTypes: true })
    .filter(e => e.isDirectory() && !SKIP_DIRS.has(e.name))
    .sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const rel = base ? `${base}/${entry.name}` : entry.name;
    out.push(rel, ...listDirs(root, rel, levels - 1));
  }
  return out;
}

/**
 * Expand `crates/*`-style members against the directories that exist.
 * Plain members are kept as written; their existence is a health check.
 */
export function expandMembers(root: string, members: string[], exclude: string[] = []): string[] {
  const expanded: string[] = [];
  const excluded = exclude.map(normalizeMember);

  for (const raw of members) {
    const member = normalizeMember(raw);
    if (!GLOB_CHARS_RE.test(member)) {
      expanded.push(member);
      continue;
    }
    const segments = member.split('/');
    const firstGlob = segments.findIndex(s => GLOB_CHARS_RE.test(s));
    const base = segments.slice(0, firstGlob).join('/');
    const levels = member.includes('**') ? 8 : segments.length - firstGlob;
    for (const dir of listDirs(root, base, levels)) {
      if (minimatch(dir, member)) expanded.push(dir);
    }
  }

  const seen = new Set<string>();
  return expanded.filter(dir => {
    if (seen.has(dir)) return false;
    seen.add(dir);
    return !excluded.some(ex => dir === ex || minimatch(dir, ex));
  });
}

/**
 * Recursively list source files under `dir` (workspace-relative), sorted.
 */
export function listSourceFiles(root: string, dir: string, config: Pick<GateConfig, 'sourceExtensions' | 'exclude'>): string[] {
  const files: string[] = [];

  const walk = (rel: string) => {
    const entries = fs.readdirSync(path.join(root, rel), { withFileTypes: true })
      .sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const childRel = `${rel}/${entry.name}`;
      if (entry.isDirectory()) {
        if (!SKIP_DIRS.has(entry.name)) walk(childRel);
      } else if (entry.isFile()) {
        if (!config.sourceExtensions.includes(path.extname(entry.name))) continue;
        if (config.exclude.some(pattern => minimatch(childRel, pattern, { dot: true }))) continue;
        files.push(childRel);
      }
    }
  };

  walk(dir);
  return files;
}

function isDirectory(absolute: string): boolean {
  return fs.existsSync(absolute) && fs.statSync(absolute).isDirectory();
}

export function loadWorkspace(opts: LoadWorkspaceOptions): Workspace {
  const { root, config, parseToml } = opts;
  const manifestPath = toPosix(config.manifest);

  if (!fs.existsSync(path.join(root, manifestPath))) {
    throw new ConfigError(manifestPath, 'root manifest is absent');
  }
  const parsed = RootManifestSchema.safeParse(readToml(root, manifestPath, parseToml));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(manifestPath, `field '${formatFieldPath(issue.path)}' ${issue.message}`);
  }

  const memberDirs = expandMembers(root, parsed.data.workspace.members, parsed.data.workspace.exclude);
  if (memberDirs.length === 0) {
    throw new ConfigError(manifestPath, "field 'workspace.members' matches no directories");
  }

  const modules: WorkspaceModule[] = [];
  const problems: string[] = [];
  const nameOwners = new Map<string, string>();

  for (const dir of memberDirs) {
    const label = dir || '.';
    if (!isDirectory(path.join(root, dir))) {
      problems.push(`${label}: member directory is missing`);
      continue;
    }

    let name = moduleNameFor(path.basename(dir ? dir : path.resolve(root)));
    const memberManifest = path.posix.join(dir, 'Cargo.toml');
    if (fs.existsSync(path.join(root, memberManifest))) {
      const member = MemberManifestSchema.safeParse(readToml(root, memberManifest, parseToml));
      if (!member.success) {
        throw new ConfigError(memberManifest, "field 'package.name' must be a non-empty string");
      }
      if (member.data.package) name = moduleNameFor(member.data.package.name);
    }

    const owner = nameOwners.get(name);
    if (owner !== undefined) {
      throw new ConfigError(manifestPath, `members '${owner || '.'}' and '${label}' share module name '${name}'`);
    }
    nameOwners.set(name, dir);

    if (!config.readmeNames.some(readme => fs.existsSync(path.join(root, dir, readme)))) {
      problems.push(`${label}: missing ${config.readmeNames.join(' or ')}`);
    }

    const sourceRoot = path.posix.join(dir, toPosix(config.sourceRoot));
    let files: string[] = [];
    if (!isDirectory(path.join(root, sourceRoot))) {
      problems.push(`${label}: source root '${sourceRoot}' is missing`);
    } else {
      files = listSourceFiles(root, sourceRoot, config);
      if (files.length === 0) {
        problems.push(`${label}: source root '${sourceRoot}' has no ${config.sourceExtensions.join('/')} files`);
      }
    }

    modules.push({ name, dir, sourceRoot, files });
  }

  if (problems.length > 0) {
    throw new WorkspaceHealthError(problems);
  }

  const files = modules.flatMap(m => m.files).sort();
  return { root, modules, files };
}

export function findModule(workspace: Workspace, name: string): WorkspaceModule | undefined {
  return workspace.modules.find(m => m.name === name);
}

export function moduleOfFile(workspace: Workspace, file: string): WorkspaceModule | undefined {
  return workspace.modules.find(m => m.files.includes(file));
}

export function isEngineModule(module: WorkspaceModule, config: Pick<GateConfig, 'engineModules'>): boolean {
  return config.engineModules.includes(module.name) || config.engineModules.includes(module.dir);
}
