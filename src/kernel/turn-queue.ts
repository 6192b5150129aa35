import { kernelRuntimeError } from './runtime-error.js';
import type { Combatant, ExecutionCollector } from './types.js';

export interface TurnQueueOptions {
  /** Receives skill-use trace entries and warnings; never carried into copies. */
  readonly collector?: ExecutionCollector;
}

/**
 * Ordered list of pending turn tickets for a two-player match.
 *
 * Tickets held by actors with no available action are purged lazily from the
 * front whenever the queue is inspected. The two players are fixed by the first
 * ticket ever added.
 */
export class TurnQueue {
  readonly collector: ExecutionCollector | undefined;
  protected readonly tickets: Combatant[] = [];
  protected player1: Combatant | null = null;
  protected player2: Combatant | null = null;

  constructor(options: TurnQueueOptions = {}) {
    this.collector = options.collector;
  }

  add(combatant: Combatant): void {
    this.bindPlayers(combatant);
    this.tickets.push(combatant);
  }

  remove(): Combatant {
    this.purgeExhausted();
    const front = this.tickets[0];
    if (front === undefined) {
      throw kernelRuntimeError('EMPTY_QUEUE', 'Cannot remove from a turn queue with no live tickets');
    }
    this.dropFront();
    return front;
  }

  /** Front ticket, or player 1 when no live ticket remains. */
  peek(): Combatant {
    this.purgeExhausted();
    const front = this.tickets[0];
    if (front !== undefined) {
      return front;
    }
    return this.requirePlayers('peek')[0];
  }

  isEmpty(): boolean {
    this.purgeExhausted();
    return this.tickets.length === 0;
  }

  isOver(): boolean {
    if (this.isEmpty()) {
      return true;
    }
    const [player1, player2] = this.requirePlayers('peek');
    return player1.getHp() === 0 || player2.getHp() === 0;
  }

  /** Surviving player of a finished match; null while running or on a tie. */
  getWinner(): Combatant | null {
    if (!this.isOver() || this.player1 === null || this.player2 === null) {
      return null;
    }
    if (this.player1.getHp() === 0 && this.player2.getHp() !== 0) {
      return this.player2;
    }
    if (this.player2.getHp() === 0 && this.player1.getHp() !== 0) {
      return this.player1;
    }
    return null;
  }

  getPlayer1(): Combatant | null {
    return this.player1;
  }

  getPlayer2(): Combatant | null {
    return this.player2;
  }

  snapshot(): readonly Combatant[] {
    return [...this.tickets];
  }

  describe(): string {
    return this.tickets.map((ticket) => ticket.describe()).join(' -> ');
  }

  /**
   * Independent copy: both players are cloned, relinked as enemies, and every
   * ticket is re-added as the matching clone in the original order.
   */
  copy(): TurnQueue {
    const clone = new TurnQueue();
    this.replayInto(clone);
    return clone;
  }

  protected replayInto(clone: TurnQueue): void {
    if (this.player1 === null) {
      return;
    }
    const [player1, player2] = this.requirePlayers('copy');
    const player1Copy = player1.copy(clone);
    const player2Copy = player2.copy(clone);
    player1Copy.enemy = player2Copy;
    player2Copy.enemy = player1Copy;
    clone.player1 = player1Copy;
    clone.player2 = player2Copy;

    for (const ticket of this.tickets) {
      clone.add(ticket === player1 ? player1Copy : player2Copy);
    }
  }

  protected bindPlayers(combatant: Combatant): void {
    if (this.player1 !== null) {
      return;
    }
    if (combatant.enemy === null) {
      throw kernelRuntimeError(
        'COMBATANT_ENEMY_MISSING',
        'The first combatant added to a turn queue must be linked to an enemy',
        { combatant: combatant.name },
      );
    }
    this.player1 = combatant;
    this.player2 = combatant.enemy;
  }

  protected purgeExhausted(): void {
    while (true) {
      const front = this.tickets[0];
      if (front === undefined || front.getAvailableActions().length > 0) {
        return;
      }
      this.dropFront();
    }
  }

  protected dropFront(): void {
    this.tickets.shift();
  }

  protected requirePlayers(operation: 'peek' | 'copy'): readonly [Combatant, Combatant] {
    if (this.player1 === null || this.player2 === null) {
      throw kernelRuntimeError(
        'QUEUE_PLAYERS_UNBOUND',
        'Turn queue has no players until its first ticket is added',
        { operation },
      );
    }
    return [this.player1, this.player2];
  }
}
