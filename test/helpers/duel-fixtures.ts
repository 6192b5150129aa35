import {
  Character,
  RestrictedTurnQueue,
  TurnQueue,
  linkEnemies,
  type ArchetypeId,
  type ExecutionCollector,
} from '../../src/kernel/index.js';

export interface DuelFixture<Q extends TurnQueue = TurnQueue> {
  readonly queue: Q;
  readonly first: Character;
  readonly second: Character;
}

export interface DuelSetup {
  readonly first: readonly [name: string, archetype: ArchetypeId];
  readonly second: readonly [name: string, archetype: ArchetypeId];
  readonly collector?: ExecutionCollector;
}

/** Two linked characters sharing an empty queue; nothing is enqueued yet. */
export const createDuel = (setup: DuelSetup): DuelFixture => {
  const queue = new TurnQueue(setup.collector === undefined ? {} : { collector: setup.collector });
  return linkDuel(queue, setup);
};

export const createRestrictedDuel = (setup: DuelSetup): DuelFixture<RestrictedTurnQueue> => {
  const queue = new RestrictedTurnQueue(setup.collector === undefined ? {} : { collector: setup.collector });
  return linkDuel(queue, setup);
};

const linkDuel = <Q extends TurnQueue>(queue: Q, setup: DuelSetup): DuelFixture<Q> => {
  const first = Character.create(setup.first[0], setup.first[1], queue);
  const second = Character.create(setup.second[0], setup.second[1], queue);
  linkEnemies(first, second);
  return { queue, first, second };
};

export const setStats = (character: Character, hp: number, sp: number): void => {
  character.setHp(hp);
  character.setSp(sp);
};

/** Names in removal order, read from a copy so `queue` is left untouched. */
export const drainNames = (queue: TurnQueue): readonly string[] => {
  const clone = queue.copy();
  const names: string[] = [];
  while (!clone.isEmpty()) {
    names.push(clone.remove().name);
  }
  return names;
};

export const ticketNames = (queue: TurnQueue): readonly string[] => queue.snapshot().map((ticket) => ticket.name);
