/**
 * Gate orchestrator: runs the stages in a fixed order and stops at the
 * first failure.
 *
 * Later stages presuppose earlier ones (core bans need the classification,
 * policy cross-checks need the workspace), so nothing after a failing stage
 * runs. Each run owns its SourceCache; no state survives the call.
 */

import { classifyFiles, filesClassifiedAs } from './classification.js';
import type { GateConfig } from './config.js';
import { isGateError, type GateError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { loadPolicySet } from './policy/loader.js';
import type { ParseToml } from './policy/toml.js';
import { SymbolResolver } from './resolver.js';
import { SourceCache, type ReadText } from './source-cache.js';
import {
  checkAuthorityBoundaryMap,
  checkConstructorVisibility,
  checkCoreBans,
  checkDryProofMap,
  checkEngineBans,
  checkInvariantRegistry,
  checkMoveSemantics,
  checkUnforgeability,
  summarizeParametricityRules,
} from './validators/index.js';
import { loadWorkspace } from './workspace.js';

export const GATE_STAGES = [
  'workspace',
  'policies',
  'classification',
  'core-bans',
  'engine-bans',
  'invariant-registry',
  'authority-boundary-map',
  'unforgeability',
  'constructor-visibility',
  'parametricity-rules',
  'move-semantics',
  'dry-proof-map',
] as const;

export type GateStage = typeof GATE_STAGES[number];

export interface StageReport {
  stage: GateStage;
  /** Short summary of what the stage covered. */
  detail: string;
}

export type GateResult =
  | { ok: true; stages: StageReport[] }
  | { ok: false; stage: GateStage; error: GateError; stages: StageReport[] };

export interface RunGateOptions {
  root: string;
  config: GateConfig;
  parseToml: ParseToml;
  logger?: Logger;
  /** Source reader for the run's cache; defaults to the filesystem. */
  readText?: ReadText;
}

export const SUCCESS_MESSAGE = 'architecture conformance check passed.';

function plural(n: number, noun: string, nouns = `${noun}s`): string {
  return `${n} ${n === 1 ? noun : nouns}`;
}

export function runGate(opts: RunGateOptions): GateResult {
  const { root, config, parseToml } = opts;
  const logger = opts.logger ?? silentLogger;
  const cache = new SourceCache(root, opts.readText);
  const stages: StageReport[] = [];
  let stage: GateStage = GATE_STAGES[0];

  const passed = (detail: string) => {
    stages.push({ stage, detail });
    logger.debug(`${stage}: ${detail}`);
  };

  try {
    const workspace = loadWorkspace({ root, config, parseToml });
    passed(`${plural(workspace.modules.length, 'module')}, ${plural(workspace.files.length, 'source file')}`);

    stage = 'policies';
    const policies = loadPolicySet({ root, policyDir: config.policyDir, parseToml });
    passed(`6 documents under ${config.policyDir}`);

    stage = 'classification';
    const classification = classifyFiles(policies.classificationMap, workspace.files);
    const coreCount = filesClassifiedAs(classification, 'core').length;
    passed(`${coreCount} core, ${classification.size - coreCount} boundary`);

    stage = 'core-bans';
    passed(`${plural(checkCoreBans({ workspace, cache, config, classification }), 'core file')} clean`);

    stage = 'engine-bans';
    passed(`${plural(checkEngineBans({ workspace, cache, config }), 'engine-scoped file')} clean`);

    const resolver = new SymbolResolver({
      workspace,
      cache,
      symbolMatch: config.symbolMatch,
      sourceExtensions: config.sourceExtensions,
    });
    const policyContext = { policies, resolver };

    stage = 'invariant-registry';
    passed(`${plural(checkInvariantRegistry(policyContext), 'invariant')} resolved`);

    stage = 'authority-boundary-map';
    passed(`${plural(checkAuthorityBoundaryMap(policyContext), 'entry', 'entries')} resolved`);

    stage = 'unforgeability';
    passed(`${plural(checkUnforgeability(policyContext), 'controlled aggregate')} sealed`);

    stage = 'constructor-visibility';
    passed(`${plural(checkConstructorVisibility(policyContext), 'constructor')} within ceiling`);

    stage = 'parametricity-rules';
    const parametricity = summarizeParametricityRules(policies.parametricityRules);
    passed(`${plural(parametricity.bannedPatterns, 'banned pattern')}, ${plural(parametricity.requiredDisclosures, 'required disclosure')}`);

    stage = 'move-semantics';
    passed(`${plural(checkMoveSemantics(policyContext), 'transition method')} consume self`);

    stage = 'dry-proof-map';
    passed(`${plural(checkDryProofMap(policyContext), 'proof')} mapped`);
  } catch (err) {
    if (!isGateError(err)) throw err;
    logger.debug(`${stage}: failed`, { kind: err.kind, location: err.location });
    return { ok: false, stage, error: err, stages };
  }

  const { reads, scans } = cache.getStats();
  logger.debug('source cache', { reads, scans });
  return { ok: true, stages };
}
