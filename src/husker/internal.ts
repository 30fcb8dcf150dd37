/**
 * Load order of the node variants.
 *
 * The variants refer to each other (searches return lists, Null absorbs
 * everything, `husk()` builds any of them), so every module imports its
 * siblings from here. Each class only extends `Husker`, which is evaluated first.
 */
export * from './base.js';
export * from './null.js';
export * from './list.js';
export * from './text.js';
export * from './scalar.js';
export * from './structured.js';
export * from './element.js';
export * from './husk.js';
