export * from './shared.js';
export * from './core-bans.js';
export * from './engine-bans.js';
export * from './invariant-registry.js';
export * from './authority.js';
export * from './parametricity.js';
export * from './move-semantics.js';
export * from './dry-proof-map.js';
