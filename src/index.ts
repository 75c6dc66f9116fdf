export * from './types.js';
export * from './errors.js';
export * from './diagnostics.js';
export * from './document.js';
export * from './parser.js';
export * from './renderer.js';
export * from './validate.js';
export * from './version.js';
export * from './control.js';
export * from './loader.js';
