import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  KernelRuntimeError,
  createCollector,
  emitTrace,
  emitWarning,
  isKernelRuntimeError,
  kernelRuntimeError,
  traceEntriesOf,
} from '../../src/kernel/index.js';

describe('kernel runtime errors', () => {
  it('carries code and typed context, and appends the context to the message', () => {
    const error = kernelRuntimeError('COMBATANT_ENEMY_MISSING', 'r has no enemy', { combatant: 'r' });

    assert.ok(error instanceof KernelRuntimeError);
    assert.equal(error.name, 'KernelRuntimeError');
    assert.equal(error.code, 'COMBATANT_ENEMY_MISSING');
    assert.deepEqual(error.context, { combatant: 'r' });
    assert.equal(error.message, 'r has no enemy context={"combatant":"r"}');
  });

  it('keeps the plain message when no context is given', () => {
    const error = kernelRuntimeError('EMPTY_QUEUE', 'nothing to remove');
    assert.equal(error.message, 'nothing to remove');
    assert.equal(error.context, undefined);
  });

  it('passes the cause through', () => {
    const cause = new Error('root');
    const error = kernelRuntimeError('EMPTY_QUEUE', 'nothing to remove', undefined, cause);
    assert.equal(error.cause, cause);
  });

  it('isKernelRuntimeError narrows by code', () => {
    const error = kernelRuntimeError('EMPTY_QUEUE', 'nothing to remove');

    assert.equal(isKernelRuntimeError(error), true);
    assert.equal(isKernelRuntimeError(error, 'EMPTY_QUEUE'), true);
    assert.equal(isKernelRuntimeError(error, 'QUEUE_PLAYERS_UNBOUND'), false);
    assert.equal(isKernelRuntimeError(new Error('plain')), false);
  });
});

describe('execution collector', () => {
  it('keeps trace disabled unless requested', () => {
    const collector = createCollector();
    emitTrace(collector, { kind: 'decision', actor: 'r', choice: 'attack' });

    assert.equal(collector.trace, null);
  });

  it('records trace entries and warnings in order', () => {
    const collector = createCollector({ trace: true });
    emitTrace(collector, { kind: 'decision', actor: 'r', choice: 'attack' });
    emitTrace(collector, { kind: 'decision', actor: 'm', choice: 'none' });
    emitWarning(collector, { code: 'SORCERER_SKILL_UNRESOLVED', message: 'no skill', context: { caster: 's' } });

    assert.deepEqual(collector.trace, [
      { kind: 'decision', actor: 'r', choice: 'attack' },
      { kind: 'decision', actor: 'm', choice: 'none' },
    ]);
    assert.equal(collector.warnings.length, 1);
    assert.equal(collector.warnings[0]?.code, 'SORCERER_SKILL_UNRESOLVED');
  });

  it('filters trace entries by kind', () => {
    const collector = createCollector({ trace: true });
    emitTrace(collector, { kind: 'decision', actor: 'r', choice: 'attack' });
    emitTrace(collector, {
      kind: 'skillUse',
      caster: 'r',
      target: 'm',
      skill: 'RogueAttack',
      targetHpBefore: 100,
      targetHpAfter: 93,
      casterSpBefore: 100,
      casterSpAfter: 97,
    });

    assert.deepEqual(
      traceEntriesOf(collector, 'skillUse').map((entry) => entry.targetHpAfter),
      [93],
    );
    assert.deepEqual(traceEntriesOf(collector, 'decision'), [{ kind: 'decision', actor: 'r', choice: 'attack' }]);
    assert.deepEqual(traceEntriesOf(createCollector(), 'decision'), []);
  });

  it('ignores emits without a collector', () => {
    assert.doesNotThrow(() => emitTrace(undefined, { kind: 'decision', actor: 'r', choice: 'attack' }));
  });
});
