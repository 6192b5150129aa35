import { kernelRuntimeError } from '../kernel/runtime-error.js';
import type { TurnQueue } from '../kernel/turn-queue.js';
import type { ActionChoice, Combatant, Playstyle } from '../kernel/types.js';
import { simulateAction, terminalScore } from './state-score.js';

/**
 * One searched game state.
 *
 * `perspective` is the clone, inside `queue`, of the actor the search decides
 * for; `action` is the move that produced this state from its parent.
 */
export interface GameStateNode {
  readonly queue: TurnQueue;
  readonly perspective: Combatant;
  readonly action: ActionChoice;
  score: number | null;
  children: readonly GameStateNode[] | null;
}

export const createGameStateNode = (queue: TurnQueue, perspective: Combatant, action: ActionChoice = 'none'): GameStateNode => ({
  queue,
  perspective,
  action,
  score: null,
  children: null,
});

export const expandGameStateNode = (node: GameStateNode): readonly GameStateNode[] => {
  const actor = node.queue.peek();
  const actions = actor.getAvailableActions();
  if (actions.length === 0) {
    throw kernelRuntimeError('NON_TERMINAL_WITHOUT_ACTIONS', `${actor.name} has no action in a running match`, {
      combatant: actor.name,
    });
  }
  return actions.map((action) => {
    const branch = simulateAction(node.queue, node.perspective, action);
    return createGameStateNode(branch.queue, branch.perspective, action);
  });
};

const bestChildScore = (children: readonly GameStateNode[]): number => {
  let best = Number.NEGATIVE_INFINITY;
  for (const child of children) {
    if (child.score === null) {
      throw kernelRuntimeError('SEARCH_NODE_UNSCORED', 'Child state reduced before it was scored', {
        action: child.action,
      });
    }
    best = Math.max(best, child.score);
  }
  return best;
};

/**
 * Scores the whole game tree below `root` with an explicit stack, visiting
 * each node once on the way down and once more after its children.
 */
export const searchGameTree = (root: GameStateNode): number => {
  const stack: GameStateNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) {
      break;
    }

    if (node.queue.isOver()) {
      node.score = terminalScore(node.queue, node.perspective);
    } else if (node.children === null) {
      node.children = expandGameStateNode(node);
      stack.push(node, ...node.children);
    } else {
      node.score = bestChildScore(node.children);
    }
  }

  if (root.score === null) {
    throw kernelRuntimeError('SEARCH_NODE_UNSCORED', 'Search finished without scoring the root', {
      action: root.action,
    });
  }
  return root.score;
};

export class MinimaxIterativePlaystyle implements Playstyle {
  readonly isManual = false;
  private readonly queue: TurnQueue;
  private lastScore: number | null = null;

  constructor(queue: TurnQueue) {
    this.queue = queue;
  }

  /** `'none'` once the match is over, even if the front actor could still act. */
  selectAction(): ActionChoice {
    this.lastScore = null;
    if (this.queue.isOver() || this.queue.peek().getAvailableActions().length === 0) {
      return 'none';
    }

    const snapshot = this.queue.copy();
    const root = createGameStateNode(snapshot, snapshot.peek());
    this.lastScore = searchGameTree(root);

    for (const child of root.children ?? []) {
      if (child.score === this.lastScore) {
        return child.action;
      }
    }
    return 'none';
  }

  /** Root score of the last `selectAction`, or null when it searched nothing. */
  searchScore(): number | null {
    return this.lastScore;
  }

  copy(queue: TurnQueue): MinimaxIterativePlaystyle {
    return new MinimaxIterativePlaystyle(queue);
  }
}
