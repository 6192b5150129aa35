export * from './types.js';
export * from './runtime-error.js';
export * from './diagnostics.js';
export * from './execution-collector.js';
export * from './prng.js';
export * from './schemas.js';
export * from './archetype-catalog.js';
export * from './skills.js';
export * from './skill-decision-tree.js';
export * from './character.js';
export * from './turn-queue.js';
export * from './restricted-turn-queue.js';
