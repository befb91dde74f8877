/**
 * @archgate/core
 *
 * Architecture conformance gate for multi-module Rust workspaces:
 *
 * - Policy loader (six TOML documents, zod-validated)
 * - Workspace model and run-scoped source cache
 * - Structural scanner and symbol resolver
 * - Classification resolver and policy validators
 * - Gate orchestrator
 */

export * from './errors.js';
export * from './logger.js';
export * from './config.js';
export * from './visibility.js';

// Scanning
export * from './scanner/index.js';
export * from './source-cache.js';

// Policies
export * from './policy/index.js';

// Model and resolution
export * from './workspace.js';
export * from './classification.js';
export * from './resolver.js';

// Validation
export * as validators from './validators/index.js';
export { runGate, GATE_STAGES, SUCCESS_MESSAGE } from './gate.js';
export type { GateResult, GateStage, RunGateOptions, StageReport } from './gate.js';
