export * from './state-score.js';
export * from './minimax-recursive-playstyle.js';
export * from './minimax-iterative-playstyle.js';
export * from './manual-playstyle.js';
export * from './random-playstyle.js';
export * from './factory.js';
