/**
 * Gate error taxonomy.
 *
 * Every failure the gate can report is a `GateError` subclass. Inputs are
 * static files, so none of these are retried: the orchestrator stops at the
 * first one and the CLI renders it as a single diagnostic line.
 */

export type GateErrorKind =
  | 'schema'
  | 'config'
  | 'workspace-health'
  | 'classification'
  | 'unknown-module'
  | 'unresolved-symbol'
  | 'ban-violation'
  | 'visibility-exceedance'
  | 'consistency'
  | 'prerequisite';

export abstract class GateError extends Error {
  abstract readonly kind: GateErrorKind;
  /** Document + field path, or `file:line`. */
  readonly location: string;

  constructor(location: string, message: string) {
    super(message);
    this.location = location;
  }

  /** One-line rendering used on the error stream. */
  diagnostic(): string {
    return this.location ? `${this.location}: ${this.message}` : this.message;
  }
}

export class SchemaError extends GateError {
  readonly kind = 'schema';
  readonly field: string | null;

  constructor(documentPath: string, field: string | null, message: string) {
    super(documentPath, field ? `field '${field}' ${message}` : message);
    this.name = 'SchemaError';
    this.field = field;
  }
}

export class ConfigError extends GateError {
  readonly kind = 'config';

  constructor(location: string, message: string) {
    super(location, message);
    this.name = 'ConfigError';
  }
}

/** Batched: carries every problem found while enumerating the workspace. */
export class WorkspaceHealthError extends GateError {
  readonly kind = 'workspace-health';
  readonly problems: string[];

  constructor(problems: string[]) {
    super('workspace', `${problems.length} problem${problems.length === 1 ? '' : 's'}: ${problems.join('; ')}`);
    this.name = 'WorkspaceHealthError';
    this.problems = problems;
  }
}

export type ClassificationFailure = 'ambiguous' | 'no-rule' | 'dead-rule';

export class ClassificationError extends GateError {
  readonly kind = 'classification';
  readonly reason: ClassificationFailure;

  constructor(reason: ClassificationFailure, location: string, message: string) {
    super(location, message);
    this.name = 'ClassificationError';
    this.reason = reason;
  }
}

export class UnknownModuleError extends GateError {
  readonly kind = 'unknown-module';
  readonly symbolPath: string;

  constructor(location: string, symbolPath: string, moduleName: string) {
    super(location, `'${symbolPath}' names unknown module '${moduleName}'`);
    this.name = 'UnknownModuleError';
    this.symbolPath = symbolPath;
  }
}

export class UnresolvedSymbolError extends GateError {
  readonly kind = 'unresolved-symbol';
  readonly symbolPath: string;

  constructor(location: string, symbolPath: string, detail?: string) {
    super(location, `'${symbolPath}' does not resolve${detail ? ` (${detail})` : ''}`);
    this.name = 'UnresolvedSymbolError';
    this.symbolPath = symbolPath;
  }
}

export class BanViolationError extends GateError {
  readonly kind = 'ban-violation';
  readonly rule: string;

  constructor(rule: string, location: string, message: string) {
    super(location, `[${rule}] ${message}`);
    this.name = 'BanViolationError';
    this.rule = rule;
  }
}

export class VisibilityExceedanceError extends GateError {
  readonly kind = 'visibility-exceedance';

  constructor(location: string, message: string) {
    super(location, message);
    this.name = 'VisibilityExceedanceError';
  }
}

export class ConsistencyError extends GateError {
  readonly kind = 'consistency';

  constructor(location: string, message: string) {
    super(location, message);
    this.name = 'ConsistencyError';
  }
}

/** A runtime prerequisite (the TOML parser) could not be loaded. */
export class PrerequisiteError extends GateError {
  readonly kind = 'prerequisite';

  constructor(message: string) {
    super('', message);
    this.name = 'PrerequisiteError';
  }
}

export function isGateError(error: unknown): error is GateError {
  return error instanceof GateError;
}
