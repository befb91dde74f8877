import { describe, it, expect } from 'vitest';
import * as path from 'node:path';
import type { SymbolMatchMode } from '../config.js';
import { UnknownModuleError, UnresolvedSymbolError } from '../errors.js';
import { SymbolResolver, parseSymbolPath } from '../resolver.js';
import { SourceCache } from '../source-cache.js';
import type { Workspace, WorkspaceModule } from '../workspace.js';
import { thrown } from './helpers.js';

const ROOT = '/ws';
const LOC = 'ifa/authority_boundary_map.toml:entries[0]';

const SOURCES: Record<string, string> = {
  'widgets/src/lib.rs': [
    'pub mod ui;',
    '',
    'pub struct Widget {',
    '    id: u32,',
    '}',
    '',
    'impl Widget {',
    '    pub fn new(id: u32) -> Self {',
    '        Widget { id }',
    '    }',
    '',
    '    pub(super) fn render_header(&self) -> String {',
    '        String::new()',
    '    }',
    '}',
    '',
    'pub fn draw_widget(w: &Widget) {}',
    '',
    'pub const MAX_WIDGETS: usize = 8;',
  ].join('\n'),
  'widgets/src/ui/mod.rs': [
    'pub mod panel;',
    '',
    'pub struct Theme;',
  ].join('\n'),
  'widgets/src/ui/panel.rs': [
    'pub struct Panel {',
    '    pub title: String,',
    '}',
    '',
    'pub(crate) struct Frame(pub u8);',
    '',
    'pub trait Paint {',
    '    fn paint(&self);',
    '}',
    '',
    'impl Paint for Panel {',
    '    fn paint(&self) {}',
    '}',
    '',
    'impl Panel {',
    '    fn build() -> Panel {',
    '        Panel { title: String::new() }',
    '    }',
    '}',
    '',
    'fn make_panel() -> Panel {',
    '    Panel::build()',
    '}',
    '',
    'pub(crate) fn make_frame() -> Frame {',
    '    Frame(0)',
    '}',
  ].join('\n'),
  'tokens/src/lib.rs': [
    'pub enum Kind {',
    '    Plain,',
    '    Signed(u8),',
    '}',
  ].join('\n'),
  'tokens/src/codec/wire.rs': 'pub struct Packet;',
};

function module(name: string): WorkspaceModule {
  const files = Object.keys(SOURCES).filter(f => f.startsWith(`${name}/`)).sort();
  return { name, dir: name, sourceRoot: `${name}/src`, files };
}

function createResolver(symbolMatch: SymbolMatchMode = 'scoped'): { resolver: SymbolResolver; cache: SourceCache } {
  const modules = [module('tokens'), module('widgets')];
  const workspace: Workspace = { root: ROOT, modules, files: modules.flatMap(m => m.files).sort() };
  const cache = new SourceCache(ROOT, (absolute) => {
    const rel = path.relative(ROOT, absolute).split(path.sep).join('/');
    const text = SOURCES[rel];
    if (text === undefined) throw new Error(`no fixture for ${rel}`);
    return text;
  });
  const resolver = new SymbolResolver({ workspace, cache, symbolMatch, sourceExtensions: ['.rs'] });
  return { resolver, cache };
}

describe('parseSymbolPath', () => {
  it('splits file segments, type and member', () => {
    expect(parseSymbolPath('widgets::ui::panel::Panel::build', LOC)).toEqual({
      raw: 'widgets::ui::panel::Panel::build',
      module: 'widgets',
      fileSegments: ['ui', 'panel'],
      typeName: 'Panel',
      member: 'build',
      wildcard: false,
    });
  });

  it('reads a trailing * as a prefix wildcard', () => {
    expect(parseSymbolPath('widgets::Widget::render_*', LOC)).toMatchObject({
      typeName: 'Widget',
      member: 'render_',
      wildcard: true,
    });
  });

  it('reads a bare trailing * as every member of the type', () => {
    expect(parseSymbolPath('widgets::Widget::*', LOC)).toMatchObject({
      typeName: 'Widget',
      member: '',
      wildcard: true,
    });
    expect(thrown(() => parseSymbolPath('widgets::*', LOC))).toMatchObject({
      message: "'widgets::*' does not resolve (a bare '*' must follow a type name)",
    });
  });

  it('rejects malformed references', () => {
    expect(thrown(() => parseSymbolPath('widgets', LOC))).toMatchObject({
      location: LOC,
      message: "'widgets' does not resolve (expected module::…::symbol)",
    });
    expect(thrown(() => parseSymbolPath('widgets::*::new', LOC))).toBeInstanceOf(UnresolvedSymbolError);
    expect(thrown(() => parseSymbolPath('widgets::A::B::c', LOC))).toBeInstanceOf(UnresolvedSymbolError);
  });
});

describe('SymbolResolver (scoped)', () => {
  it('resolves Type::method through an inherent block', () => {
    const { resolver } = createResolver();
    expect(resolver.resolveSymbol('widgets::Widget::new', LOC)).toEqual({
      file: 'widgets/src/lib.rs',
      line: 8,
      text: 'pub fn new(id: u32) -> Self',
    });
  });

  it('matches wildcards against methods of the named type only', () => {
    const { resolver } = createResolver();
    expect(resolver.resolveSymbol('widgets::Widget::render_*', LOC).line).toBe(12);

    const err = thrown(() => resolver.resolveSymbol('widgets::Widget::draw_*', LOC));
    expect(err).toBeInstanceOf(UnresolvedSymbolError);
    expect(err).toMatchObject({ message: "'widgets::Widget::draw_*' does not resolve (no match in 3 files)" });
  });

  it('resolves Type::* against the methods and variants of the type', () => {
    const { resolver } = createResolver();
    expect(resolver.resolveSymbol('widgets::Widget::*', LOC)).toMatchObject({ file: 'widgets/src/lib.rs', line: 8 });
    expect(resolver.resolveSymbol('tokens::Kind::*', LOC)).toEqual({ file: 'tokens/src/lib.rs', line: 2, text: 'Plain' });
    expect(resolver.constructorVisibility('widgets::Widget::*', LOC).rung).toBe('public');
    expect(thrown(() => resolver.resolveSymbol('widgets::Theme::*', LOC))).toBeInstanceOf(UnresolvedSymbolError);
  });

  it('rejects an unknown first segment', () => {
    const { resolver } = createResolver();
    const err = thrown(() => resolver.resolveSymbol('gadgets::Widget', LOC));
    expect(err).toBeInstanceOf(UnknownModuleError);
    expect(err).toMatchObject({ location: LOC, message: "'gadgets::Widget' names unknown module 'gadgets'" });
  });

  it('narrows to the file named by leading lowercase segments', () => {
    const { resolver } = createResolver();
    expect(resolver.resolveSymbol('widgets::ui::panel::Panel', LOC)).toEqual({
      file: 'widgets/src/ui/panel.rs',
      line: 1,
      text: 'pub struct Panel',
    });
    expect(resolver.resolveSymbol('widgets::ui::Theme', LOC).file).toBe('widgets/src/ui/mod.rs');
    expect(thrown(() => resolver.resolveSymbol('widgets::ui::Panel', LOC)))
      .toMatchObject({ message: "'widgets::ui::Panel' does not resolve (no match in widgets/src/ui/mod.rs)" });
  });

  it('searches the whole module when no file matches the segments', () => {
    const { resolver } = createResolver();
    expect(resolver.resolveSymbol('widgets::missing::Widget', LOC)).toMatchObject({ file: 'widgets/src/lib.rs', line: 3 });
  });

  it('falls back to a whole-word match for symbols the scanner does not record', () => {
    const { resolver } = createResolver();
    expect(resolver.resolveSymbol('widgets::MAX_WIDGETS', LOC)).toEqual({
      file: 'widgets/src/lib.rs',
      line: 19,
      text: 'pub const MAX_WIDGETS: usize = 8;',
    });
  });

  it('finds interface-implementation methods and enumeration variants', () => {
    const { resolver } = createResolver();
    expect(resolver.resolveSymbol('widgets::ui::panel::Panel::paint', LOC)).toMatchObject({ line: 12 });
    expect(resolver.resolveSymbol('tokens::Kind::Signed', LOC)).toEqual({
      file: 'tokens/src/lib.rs',
      line: 3,
      text: 'Signed(u8)',
    });
  });

  it('reads each file at most once per run', () => {
    const { resolver, cache } = createResolver();
    resolver.resolveSymbol('widgets::Widget::new', LOC);
    resolver.resolveSymbol('widgets::Widget::render_*', LOC);
    resolver.constructorVisibility('widgets::Widget::new', LOC);
    expect(cache.getStats()).toEqual({ reads: 3, scans: 3 });
  });
});

describe('SymbolResolver (legacy)', () => {
  it('accepts any identifier with the prefix once the type name appears', () => {
    const { resolver } = createResolver('legacy');
    expect(resolver.resolveSymbol('widgets::Widget::draw_*', LOC)).toEqual({
      file: 'widgets/src/lib.rs',
      line: 17,
      text: 'pub fn draw_widget(w: &Widget) {}',
    });
  });

  it('still requires a match somewhere in scope', () => {
    const { resolver } = createResolver('legacy');
    expect(thrown(() => resolver.resolveSymbol('tokens::Kind::Missing', LOC))).toBeInstanceOf(UnresolvedSymbolError);
  });
});

describe('resolveModulePath', () => {
  it('resolves modules, files and directories', () => {
    const { resolver } = createResolver();
    expect(resolver.resolveModulePath('widgets', LOC)).toEqual({ file: 'widgets/src', line: 0, text: 'widgets' });
    expect(resolver.resolveModulePath('widgets::ui', LOC)).toEqual({
      file: 'widgets/src/ui/mod.rs',
      line: 1,
      text: 'pub mod panel;',
    });
    expect(resolver.resolveModulePath('widgets::ui::panel', LOC).file).toBe('widgets/src/ui/panel.rs');
    expect(resolver.resolveModulePath('tokens::codec', LOC)).toEqual({ file: 'tokens/src/codec', line: 0, text: 'codec' });
  });

  it('fails for paths with no file or directory', () => {
    const { resolver } = createResolver();
    expect(thrown(() => resolver.resolveModulePath('widgets::nothing', LOC))).toMatchObject({
      message: "'widgets::nothing' does not resolve (no file or directory 'widgets/src/nothing')",
    });
    expect(thrown(() => resolver.resolveModulePath('gadgets::ui', LOC))).toBeInstanceOf(UnknownModuleError);
  });
});

describe('constructorVisibility', () => {
  it('uses the inherent method visibility', () => {
    const { resolver } = createResolver();
    expect(resolver.constructorVisibility('widgets::Widget::new', LOC)).toMatchObject({ rung: 'public', via: 'inherent' });
    expect(resolver.constructorVisibility('widgets::Widget::render_*', LOC).rung).toBe('module-scoped');
    expect(resolver.constructorVisibility('widgets::ui::panel::Panel::build', LOC).rung).toBe('private');
  });

  it('treats interface-implementation methods as public', () => {
    const { resolver } = createResolver();
    expect(resolver.constructorVisibility('widgets::ui::panel::Panel::paint', LOC)).toMatchObject({
      rung: 'public',
      via: 'interface',
      evidence: { file: 'widgets/src/ui/panel.rs', line: 12 },
    });
  });

  it('uses the type or function declaration for bare symbols', () => {
    const { resolver } = createResolver();
    expect(resolver.constructorVisibility('widgets::ui::panel::Frame', LOC)).toMatchObject({ rung: 'unit-scoped', via: 'type' });
    expect(resolver.constructorVisibility('widgets::ui::panel::make_panel', LOC)).toMatchObject({ rung: 'private', via: 'function' });
    expect(resolver.constructorVisibility('widgets::ui::panel::make_*', LOC).rung).toBe('unit-scoped');
  });

  it('fails when no declaration carries a visibility', () => {
    const { resolver } = createResolver();
    expect(thrown(() => resolver.constructorVisibility('widgets::MAX_WIDGETS', LOC))).toMatchObject({
      message: "'widgets::MAX_WIDGETS' does not resolve (no type declaration in 3 files)",
    });
  });

  it('finds the controlled aggregate declaration', () => {
    const { resolver } = createResolver();
    const decls = resolver.findTypeDeclarations('widgets::ui::panel::Panel', LOC);
    expect(decls.map(d => `${d.kind} ${d.name} ${d.file}`)).toEqual(['aggregate Panel widgets/src/ui/panel.rs']);
  });
});
