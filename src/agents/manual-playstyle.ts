import type { TurnQueue } from '../kernel/turn-queue.js';
import type { ActionChoice, Playstyle } from '../kernel/types.js';

const actionForKey = (key: string): ActionChoice => {
  switch (key) {
    case 'A':
      return 'attack';
    case 'S':
      return 'special';
    default:
      return 'none';
  }
};

/** Plays whatever key the player pressed; unbound keys select nothing. */
export class ManualPlaystyle implements Playstyle {
  readonly isManual = true;
  readonly queue: TurnQueue;

  constructor(queue: TurnQueue) {
    this.queue = queue;
  }

  selectAction(key?: string): ActionChoice {
    return key === undefined ? 'none' : actionForKey(key);
  }

  copy(queue: TurnQueue): ManualPlaystyle {
    return new ManualPlaystyle(queue);
  }
}
