import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { createRng, nextInt, type Rng, type TurnQueue } from '../../../src/kernel/index.js';
import { createDuel, createRestrictedDuel, ticketNames, type DuelFixture } from '../../helpers/duel-fixtures.js';

const SEEDS = [1n, 2n, 3n, 17n, 99n, 2024n];
const STEPS = 40;

/** Random adds and removes with both combatants kept able to act. */
const scramble = <Q extends TurnQueue>(duel: DuelFixture<Q>, seed: bigint, onStep: (queue: Q) => void): void => {
  let rng: Rng = createRng(seed);
  duel.queue.add(duel.first);
  for (let step = 0; step < STEPS; step += 1) {
    const [op, nextRng] = nextInt(rng, 0, 2);
    rng = nextRng;
    if (op === 0) {
      duel.queue.add(duel.first);
    } else if (op === 1) {
      duel.queue.add(duel.second);
    } else if (!duel.queue.isEmpty()) {
      duel.queue.remove();
    }
    onStep(duel.queue);
  }
};

describe('turn queue properties', () => {
  it('inspection is idempotent', () => {
    for (const seed of SEEDS) {
      const duel = createDuel({ first: ['r', 'rogue'], second: ['m', 'mage'] });
      scramble(duel, seed, (queue) => {
        queue.peek();
        const once = ticketNames(queue);
        queue.peek();
        queue.isEmpty();
        assert.deepEqual(ticketNames(queue), once);
      });
    }
  });

  it('copies are independent of their source', () => {
    for (const seed of SEEDS) {
      const duel = createRestrictedDuel({ first: ['r', 'rogue'], second: ['m', 'mage'] });
      scramble(duel, seed, (queue) => {
        const before = queue.describe();
        const clone = queue.copy();
        assert.equal(clone.describe(), before);

        if (!clone.isEmpty()) {
          clone.peek().specialAttack();
          clone.remove();
        }
        assert.equal(queue.describe(), before);
      });
      assert.equal(duel.first.getHp(), 100);
      assert.equal(duel.second.getHp(), 100);
    }
  });

  it('restricted queues keep permissions aligned and cap eligible self tickets at two', () => {
    for (const seed of SEEDS) {
      const duel = createRestrictedDuel({ first: ['r', 'rogue'], second: ['m', 'mage'] });
      scramble(duel, seed, (queue) => {
        assert.equal(queue.getPermissions().length, queue.snapshot().length);
        assert.ok(queue.getAddAbilityCount(duel.first) <= 2);
        assert.ok(queue.getAddAbilityCount(duel.second) <= 2);
      });
    }
  });

  it('restricted copies keep every ticket in order', () => {
    for (const seed of SEEDS) {
      const duel = createRestrictedDuel({ first: ['r', 'rogue'], second: ['m', 'mage'] });
      scramble(duel, seed, (queue) => {
        assert.deepEqual(ticketNames(queue.copy()), ticketNames(queue));
      });
    }
  });
});
