import { createRng, nextInt, type Rng } from '../kernel/prng.js';
import type { TurnQueue } from '../kernel/turn-queue.js';
import type { ActionChoice, Playstyle } from '../kernel/types.js';

export interface RandomPlaystyleConfig {
  readonly seed?: number;
  readonly rng?: Rng;
}

export class RandomPlaystyle implements Playstyle {
  readonly isManual = false;
  private readonly queue: TurnQueue;
  private rng: Rng;

  constructor(queue: TurnQueue, config: RandomPlaystyleConfig = {}) {
    const { seed, rng } = config;
    if (seed !== undefined && !Number.isSafeInteger(seed)) {
      throw new RangeError(`RandomPlaystyle seed must be a safe integer, received ${String(seed)}`);
    }
    this.queue = queue;
    this.rng = rng ?? createRng(BigInt(seed ?? 0));
  }

  selectAction(): ActionChoice {
    const actions = this.queue.peek().getAvailableActions();
    if (actions.length === 0) {
      return 'none';
    }

    const [index, rng] = nextInt(this.rng, 0, actions.length - 1);
    this.rng = rng;
    const action = actions[index];
    if (action === undefined) {
      throw new Error(`RandomPlaystyle.selectAction selected out-of-range index ${index}`);
    }
    return action;
  }

  /** The copy continues from the current random position. */
  copy(queue: TurnQueue): RandomPlaystyle {
    return new RandomPlaystyle(queue, { rng: this.rng });
  }
}
