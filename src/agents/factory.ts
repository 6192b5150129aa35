import type { TurnQueue } from '../kernel/turn-queue.js';
import type { Playstyle } from '../kernel/types.js';
import { ManualPlaystyle } from './manual-playstyle.js';
import { MinimaxIterativePlaystyle } from './minimax-iterative-playstyle.js';
import { MinimaxRecursivePlaystyle } from './minimax-recursive-playstyle.js';
import { RandomPlaystyle } from './random-playstyle.js';

export const PLAYSTYLE_TYPES = ['manual', 'random', 'minimax-recursive', 'minimax-iterative'] as const;

export type PlaystyleType = (typeof PLAYSTYLE_TYPES)[number];

export interface PlaystyleFactoryOptions {
  /** Seed for random playstyles; the second seat gets `seed + 1`. */
  readonly seed?: number;
}

export const createPlaystyle = (type: PlaystyleType, queue: TurnQueue, options: PlaystyleFactoryOptions = {}): Playstyle => {
  switch (type) {
    case 'manual':
      return new ManualPlaystyle(queue);
    case 'random':
      return new RandomPlaystyle(queue, options.seed === undefined ? {} : { seed: options.seed });
    case 'minimax-recursive':
      return new MinimaxRecursivePlaystyle(queue);
    case 'minimax-iterative':
      return new MinimaxIterativePlaystyle(queue);
    default:
      throw new Error(`Unknown playstyle type: ${String(type)}`);
  }
};

export const isPlaystyleType = (value: string): value is PlaystyleType =>
  PLAYSTYLE_TYPES.some((type) => type === value);

export const parsePlaystyleSpec = (
  spec: string,
  queue: TurnQueue,
  options: PlaystyleFactoryOptions = {},
): readonly [Playstyle, Playstyle] => {
  const types = spec
    .split(',')
    .map((part) => part.trim().toLowerCase())
    .filter((part) => part.length > 0);

  if (types.length !== 2) {
    throw new Error(`Playstyle spec has ${types.length} playstyles but a match needs 2`);
  }

  const [first, second] = types.map((type, seat) => {
    if (!isPlaystyleType(type)) {
      throw new Error(`Unknown playstyle type: ${type}. Allowed: ${PLAYSTYLE_TYPES.join(', ')}`);
    }
    return createPlaystyle(type, queue, options.seed === undefined ? {} : { seed: options.seed + seat });
  });

  if (first === undefined || second === undefined) {
    throw new Error('Playstyle spec did not produce two playstyles');
  }
  return [first, second];
};
