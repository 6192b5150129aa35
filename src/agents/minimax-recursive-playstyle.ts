import type { TurnQueue } from '../kernel/turn-queue.js';
import { ACTION_ORDER, type ActionChoice, type Playstyle } from '../kernel/types.js';
import { scoreState, scoreStateFor, simulateAction } from './state-score.js';

export class MinimaxRecursivePlaystyle implements Playstyle {
  readonly isManual = false;
  private readonly queue: TurnQueue;

  constructor(queue: TurnQueue) {
    this.queue = queue;
  }

  /** `'none'` once the match is over, even if the front actor could still act. */
  selectAction(): ActionChoice {
    if (this.queue.isOver()) {
      return 'none';
    }
    const actor = this.queue.peek();
    const available = actor.getAvailableActions();
    if (available.length === 0) {
      return 'none';
    }

    const bestScore = scoreState(this.queue.copy());
    for (const action of ACTION_ORDER) {
      if (!available.includes(action)) {
        continue;
      }
      const branch = simulateAction(this.queue, actor, action);
      if (scoreStateFor(branch.actor, branch.queue) === bestScore) {
        return action;
      }
    }
    return 'none';
  }

  copy(queue: TurnQueue): MinimaxRecursivePlaystyle {
    return new MinimaxRecursivePlaystyle(queue);
  }
}
