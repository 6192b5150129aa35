import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ManualPlaystyle, RandomPlaystyle } from '../../../src/agents/index.js';
import { createRng } from '../../../src/kernel/index.js';
import { createDuel } from '../../helpers/duel-fixtures.js';

const rogueVsMage = () => {
  const duel = createDuel({ first: ['r', 'rogue'], second: ['m', 'mage'] });
  duel.queue.add(duel.first);
  duel.queue.add(duel.second);
  return duel;
};

const draws = (playstyle: RandomPlaystyle, count: number): readonly string[] =>
  Array.from({ length: count }, () => playstyle.selectAction());

describe('RandomPlaystyle', () => {
  it('is deterministic for a seed', () => {
    const { queue } = rogueVsMage();

    assert.deepEqual(draws(new RandomPlaystyle(queue, { seed: 11 }), 20), draws(new RandomPlaystyle(queue, { seed: 11 }), 20));
  });

  it('only selects available actions', () => {
    const { queue } = rogueVsMage();
    const choices = new Set(draws(new RandomPlaystyle(queue, { seed: 3 }), 50));

    assert.ok([...choices].every((choice) => choice === 'attack' || choice === 'special'));
  });

  it('selects the single affordable action', () => {
    const { queue, first } = rogueVsMage();
    first.setSp(5);

    assert.deepEqual(draws(new RandomPlaystyle(queue, { seed: 1 }), 5), ['attack', 'attack', 'attack', 'attack', 'attack']);
  });

  it('selects nothing when no live actor can act', () => {
    const { queue, first, second } = rogueVsMage();
    first.setSp(0);
    second.setSp(0);

    assert.equal(new RandomPlaystyle(queue, { seed: 1 }).selectAction(), 'none');
  });

  it('continues the random stream in copies', () => {
    const { queue } = rogueVsMage();
    const original = new RandomPlaystyle(queue, { rng: createRng(9n) });
    const copy = original.copy(queue);

    assert.deepEqual(draws(copy, 10), draws(original, 10));
  });

  it('rejects non-integer seeds', () => {
    const { queue } = rogueVsMage();

    assert.throws(() => new RandomPlaystyle(queue, { seed: 1.5 }), /safe integer/);
  });
});

describe('ManualPlaystyle', () => {
  it('maps keys to actions', () => {
    const { queue } = rogueVsMage();
    const playstyle = new ManualPlaystyle(queue);

    assert.equal(playstyle.isManual, true);
    assert.equal(playstyle.selectAction('A'), 'attack');
    assert.equal(playstyle.selectAction('S'), 'special');
    assert.equal(playstyle.selectAction('Q'), 'none');
    assert.equal(playstyle.selectAction(), 'none');
  });

  it('selects nothing for keys inherited from Object.prototype', () => {
    const { queue } = rogueVsMage();
    const playstyle = new ManualPlaystyle(queue);

    assert.equal(playstyle.selectAction('constructor'), 'none');
    assert.equal(playstyle.selectAction('toString'), 'none');
    assert.equal(playstyle.selectAction('__proto__'), 'none');
  });

  it('copies onto another queue', () => {
    const { queue } = rogueVsMage();
    const other = queue.copy();

    assert.equal(new ManualPlaystyle(queue).copy(other).queue, other);
  });
});
