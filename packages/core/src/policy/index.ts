export * from './schemas.js';
export * from './loader.js';
export * from './toml.js';
