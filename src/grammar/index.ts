export * from './action-grammar.js';
export * from './target-catalog.js';
export * from './describe.js';
