import { kernelRuntimeError } from '../kernel/runtime-error.js';
import type { TurnQueue } from '../kernel/turn-queue.js';
import type { CombatAction, Combatant } from '../kernel/types.js';

export interface SimulatedBranch {
  readonly queue: TurnQueue;
  /** The clone of the perspective actor inside `queue`. */
  readonly perspective: Combatant;
  /** The clone that took the action. */
  readonly actor: Combatant;
}

const requireEnemy = (combatant: Combatant): Combatant => {
  if (combatant.enemy === null) {
    throw kernelRuntimeError('COMBATANT_ENEMY_MISSING', `${combatant.name} has no enemy in the simulated queue`, {
      combatant: combatant.name,
    });
  }
  return combatant.enemy;
};

/**
 * Play `action` with the front actor of `queue`, in place.
 *
 * Lazy purging only retires actors with no action left, so an actor that can
 * still act has its spent ticket removed here.
 */
export const applyAction = (queue: TurnQueue, action: CombatAction): Combatant => {
  const actor = queue.peek();
  if (action === 'attack') {
    actor.attack();
  } else {
    actor.specialAttack();
  }
  if (actor.getAvailableActions().length > 0) {
    queue.remove();
  }
  return actor;
};

/** Copy `queue`, find `perspective` in the copy, then apply `action` there. */
export const simulateAction = (queue: TurnQueue, perspective: Combatant, action: CombatAction): SimulatedBranch => {
  const clone = queue.copy();
  const front = clone.peek();
  const mappedPerspective = perspective === queue.peek() ? front : requireEnemy(front);
  applyAction(clone, action);
  return { queue: clone, perspective: mappedPerspective, actor: front };
};

/** Winner's HP, negated when the winner is not `perspective`; 0 on a tie. */
export const terminalScore = (queue: TurnQueue, perspective: Combatant): number => {
  const winner = queue.getWinner();
  if (winner === null) {
    return 0;
  }
  return winner === perspective ? winner.getHp() : -winner.getHp();
};

/** Best score `perspective` can reach from `queue`. Moves are only played on copies. */
export const scoreStateFor = (perspective: Combatant, queue: TurnQueue): number => {
  if (queue.isOver()) {
    return terminalScore(queue, perspective);
  }

  const actor = queue.peek();
  const actions = actor.getAvailableActions();
  if (actions.length === 0) {
    throw kernelRuntimeError('NON_TERMINAL_WITHOUT_ACTIONS', `${actor.name} has no action in a running match`, {
      combatant: actor.name,
    });
  }

  let best = Number.NEGATIVE_INFINITY;
  for (const action of actions) {
    const branch = simulateAction(queue, perspective, action);
    best = Math.max(best, scoreStateFor(branch.perspective, branch.queue));
  }
  return best;
};

/** Highest score the next actor of `queue` can guarantee. */
export const scoreState = (queue: TurnQueue): number => {
  const snapshot = queue.copy();
  return scoreStateFor(snapshot.peek(), snapshot);
};
