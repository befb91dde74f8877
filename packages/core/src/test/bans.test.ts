import { describe, it, expect } from 'vitest';
import * as path from 'node:path';
import type { ClassificationAssignment } from '../classification.js';
import type { GateConfig } from '../config.js';
import { BanViolationError } from '../errors.js';
import type { Classification } from '../policy/schemas.js';
import { SourceCache } from '../source-cache.js';
import { checkCoreBans } from '../validators/core-bans.js';
import { checkEngineBans } from '../validators/engine-bans.js';
import type { Workspace } from '../workspace.js';
import { testConfig, thrown } from './helpers.js';

const ROOT = '/ws';

interface FixtureFile {
  text: string;
  classification?: Classification;
}

/** One module per top-level directory of the file paths. */
function context(files: Record<string, FixtureFile>, config: GateConfig = testConfig()) {
  const paths = Object.keys(files).sort();
  const names = [...new Set(paths.map(p => p.split('/')[0]))];
  const workspace: Workspace = {
    root: ROOT,
    modules: names.map(name => ({
      name,
      dir: name,
      sourceRoot: `${name}/src`,
      files: paths.filter(p => p.startsWith(`${name}/`)),
    })),
    files: paths,
  };
  const classification: ClassificationAssignment = new Map(
    paths.map(p => [p, files[p].classification ?? 'core']),
  );
  const cache = new SourceCache(ROOT, (absolute) => {
    const rel = path.relative(ROOT, absolute).split(path.sep).join('/');
    return files[rel].text;
  });
  return { workspace, cache, config, classification };
}

function coreBan(text: string): unknown {
  return thrown(() => checkCoreBans(context({ 'app/src/lib.rs': { text } })));
}

describe('optional-wrapper', () => {
  const draft = 'pub struct Draft {\n    pub note: Option<String>,\n}\n';

  it('flags an optional field in a core file', () => {
    const err = coreBan(draft);
    expect(err).toBeInstanceOf(BanViolationError);
    expect(err).toMatchObject({
      rule: 'optional-wrapper',
      location: 'app/src/lib.rs:2',
      message: "[optional-wrapper] aggregate 'Draft' field 'note' wraps a value in Option",
    });
  });

  it('leaves the identical field in a boundary file alone', () => {
    const ctx = context({ 'app/src/lib.rs': { text: draft, classification: 'boundary' } });
    expect(checkCoreBans(ctx)).toBe(0);
  });

  it('covers slots, variant payloads and signatures', () => {
    expect(coreBan('pub struct Maybe(Option<u8>);')).toMatchObject({
      location: 'app/src/lib.rs:1',
      message: "[optional-wrapper] aggregate 'Maybe' slot '0' wraps a value in Option",
    });
    expect(coreBan('pub enum Reply {\n    Ack,\n    Data(Option<u8>),\n}')).toMatchObject({
      location: 'app/src/lib.rs:3',
      message: "[optional-wrapper] enumeration 'Reply' variant 'Data' wraps a value in Option",
    });
    expect(coreBan('pub fn find(id: u32) -> Option<u32> {\n    None\n}')).toMatchObject({
      location: 'app/src/lib.rs:1',
      message: "[optional-wrapper] function 'find' has Option in its signature",
    });
    expect(coreBan('pub struct Store;\n\nimpl Store {\n    pub fn get(&self, key: Option<&str>) -> u8 {\n        0\n    }\n}'))
      .toMatchObject({
        location: 'app/src/lib.rs:4',
        message: "[optional-wrapper] method 'Store::get' has Option in its signature",
      });
  });

  it('follows a field type across lines', () => {
    expect(coreBan('pub struct Hooks {\n    hook: Box<\n        Option<u8>,\n    >,\n}')).toMatchObject({
      location: 'app/src/lib.rs:2',
      message: "[optional-wrapper] aggregate 'Hooks' field 'hook' wraps a value in Option",
    });
  });

  it('checks methods of a one-line impl body', () => {
    expect(coreBan('pub struct Store;\nimpl Store { pub fn get(&self) -> Option<u8> { None } }')).toMatchObject({
      location: 'app/src/lib.rs:2',
      message: "[optional-wrapper] method 'Store::get' has Option in its signature",
    });
  });

  it('leaves interface method signatures to the duration rule', () => {
    const text = [
      'pub trait Lookup {',
      '    fn get(&self) -> Option<u8>;',
      '}',
      '',
      'pub struct Store;',
      '',
      'impl Lookup for Store {',
      '    fn get(&self) -> Option<u8> {',
      '        None',
      '    }',
      '}',
    ].join('\n');
    expect(checkCoreBans(context({ 'app/src/lib.rs': { text } }))).toBe(1);
  });
});

describe('optional-duration-return', () => {
  it('flags an interface method returning an optional duration', () => {
    expect(coreBan('pub trait Clock {\n    fn timeout(&self) -> Option<Duration>;\n}')).toMatchObject({
      rule: 'optional-duration-return',
      location: 'app/src/lib.rs:2',
      message: "[optional-duration-return] interface method 'Clock::timeout' returns Option<Duration>",
    });
    expect(coreBan('pub trait Clock {\n    fn timeout(&self) -> Option< std::time::Duration >;\n}'))
      .toMatchObject({ rule: 'optional-duration-return' });
    expect(coreBan('pub trait Clock { fn timeout(&self) -> Option<Duration>; }')).toMatchObject({
      rule: 'optional-duration-return',
      location: 'app/src/lib.rs:1',
    });
  });
});

describe('parallel-boolean', () => {
  it('flags a bool next to a field typed by an enumeration of the same module', () => {
    const ctx = context({
      'app/src/job.rs': { text: 'pub struct Job {\n    active: bool,\n    mode: Mode,\n}\n' },
      'app/src/mode.rs': { text: 'pub enum Mode { Fast, Slow }\n', classification: 'boundary' },
    });
    expect(thrown(() => checkCoreBans(ctx))).toMatchObject({
      rule: 'parallel-boolean',
      location: 'app/src/job.rs:1',
      message: "[parallel-boolean] aggregate 'Job' pairs bool 'active' with enumeration-typed 'mode' (Mode)",
    });
  });

  it('ignores enumerations declared in another module', () => {
    const ctx = context({
      'app/src/job.rs': { text: 'pub struct Job {\n    active: bool,\n    mode: Mode,\n}\n' },
      'other/src/mode.rs': { text: 'pub enum Mode { Fast, Slow }\n' },
    });
    expect(checkCoreBans(ctx)).toBe(2);
  });
});

describe('placeholder-variant', () => {
  const status = 'pub enum Status {\n    Ready,\n    Unknown,\n}\n';

  it('flags banned variant names', () => {
    expect(coreBan(status)).toMatchObject({
      rule: 'placeholder-variant',
      location: 'app/src/lib.rs:3',
      message: "[placeholder-variant] enumeration 'Status' declares placeholder variant 'Unknown'",
    });
  });

  it('keeps a variant split over lines as one variant', () => {
    const text = 'pub enum Event {\n    Started(\n        Other,\n    ),\n    Stopped,\n}\n';
    expect(checkCoreBans(context({ 'app/src/lib.rs': { text } }))).toBe(1);
  });

  it('takes the banned names from configuration', () => {
    const ctx = context({ 'app/src/lib.rs': { text: status } }, testConfig({ bannedVariantNames: ['Ready'] }));
    expect(thrown(() => checkCoreBans(ctx))).toMatchObject({ location: 'app/src/lib.rs:2' });
  });
});

describe('engine bans', () => {
  const reporter = 'pub struct Reporter {\n    already_warned: bool,\n    warned_count: u8,\n}\n';

  it('flags a warned-tracking bool in an engine-scoped module of any classification', () => {
    const ctx = context({ 'engine/src/report.rs': { text: reporter, classification: 'boundary' } });
    expect(thrown(() => checkEngineBans(ctx))).toMatchObject({
      rule: 'warned-flag',
      location: 'engine/src/report.rs:2',
      message: "[warned-flag] aggregate 'Reporter' tracks warnings in bool field 'already_warned'",
    });
  });

  it('only applies to engine-scoped modules', () => {
    expect(checkEngineBans(context({ 'app/src/report.rs': { text: reporter } }))).toBe(0);

    const ctx = context({ 'runtime/src/report.rs': { text: reporter } }, testConfig({ engineModules: ['runtime'] }));
    expect(thrown(() => checkEngineBans(ctx))).toMatchObject({ rule: 'warned-flag' });
  });

  it('ignores non-bool fields that match the pattern', () => {
    const ctx = context({ 'engine/src/report.rs': { text: 'pub struct Reporter {\n    warned_count: u8,\n}\n' } });
    expect(checkEngineBans(ctx)).toBe(1);
  });
});
