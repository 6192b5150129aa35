import { applyAction } from '../agents/state-score.js';
import { emitTrace } from '../kernel/execution-collector.js';
import type { TurnQueue } from '../kernel/turn-queue.js';
import type { CombatAction, Combatant, Playstyle } from '../kernel/types.js';

export type BattleStopReason = 'terminal' | 'maxTurns' | 'noAction';

export interface CombatantSnapshot {
  readonly hp: number;
  readonly sp: number;
}

export interface TurnLog {
  readonly actor: string;
  readonly action: CombatAction;
  readonly player1: CombatantSnapshot;
  readonly player2: CombatantSnapshot;
}

export interface BattleTrace {
  readonly turns: readonly TurnLog[];
  readonly winner: string | null;
  readonly stopReason: BattleStopReason;
  readonly finalQueue: TurnQueue;
}

export interface RunBattleOptions {
  readonly maxTurns?: number;
  /** Key pressed for a manual playstyle's turn. */
  readonly keyFor?: (actor: Combatant) => string | undefined;
}

const DEFAULT_MAX_TURNS = 1000;

const validateMaxTurns = (maxTurns: number): void => {
  if (!Number.isSafeInteger(maxTurns)) {
    throw new RangeError(`maxTurns must be a safe integer, received ${String(maxTurns)}`);
  }
  if (maxTurns < 0) {
    throw new RangeError(`maxTurns must be a non-negative safe integer, received ${String(maxTurns)}`);
  }
};

const snapshotOf = (combatant: Combatant): CombatantSnapshot => ({
  hp: combatant.getHp(),
  sp: combatant.getSp(),
});

/**
 * Plays `queue` to the end. `playstyles[0]` decides for player 1 and
 * `playstyles[1]` for player 2; the queue and its combatants are mutated.
 * A choice the actor cannot afford ends the battle like `'none'` does.
 */
export const runBattle = (
  queue: TurnQueue,
  playstyles: readonly Playstyle[],
  options: RunBattleOptions = {},
): BattleTrace => {
  const maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
  validateMaxTurns(maxTurns);
  if (playstyles.length !== 2) {
    throw new RangeError(`playstyles length must equal 2, received ${playstyles.length}`);
  }

  const player1 = queue.getPlayer1();
  const player2 = queue.getPlayer2();
  if (player1 === null || player2 === null) {
    throw new RangeError('runBattle needs a queue whose players are already enqueued');
  }

  const turns: TurnLog[] = [];
  let stopReason: BattleStopReason;

  while (true) {
    if (queue.isOver()) {
      stopReason = 'terminal';
      break;
    }

    if (turns.length >= maxTurns) {
      stopReason = 'maxTurns';
      break;
    }

    const actor = queue.peek();
    const playstyle = playstyles[actor === player1 ? 0 : 1];
    if (playstyle === undefined) {
      throw new Error(`missing playstyle for ${actor.name}`);
    }

    const choice = playstyle.isManual ? playstyle.selectAction(options.keyFor?.(actor)) : playstyle.selectAction();
    emitTrace(queue.collector, { kind: 'decision', actor: actor.name, choice });
    if (choice === 'none' || !actor.getAvailableActions().includes(choice)) {
      stopReason = 'noAction';
      break;
    }

    applyAction(queue, choice);
    turns.push({
      actor: actor.name,
      action: choice,
      player1: snapshotOf(player1),
      player2: snapshotOf(player2),
    });
  }

  const winner = queue.getWinner();
  return {
    turns,
    winner: winner === null ? null : winner.name,
    stopReason,
    finalQueue: queue,
  };
};
