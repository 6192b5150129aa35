import type { BattleTraceEntry, ExecutionCollector, ExecutionOptions, RuntimeWarning } from './types.js';

export type BattleTraceKind = BattleTraceEntry['kind'];

export type BattleTraceEntryOf<K extends BattleTraceKind> = Extract<BattleTraceEntry, { readonly kind: K }>;

/** Warnings are always kept; trace entries only with `{ trace: true }`. */
export const createCollector = (options: ExecutionOptions = {}): ExecutionCollector => ({
  warnings: [],
  trace: options.trace === true ? [] : null,
});

export const emitWarning = (collector: ExecutionCollector | undefined, warning: RuntimeWarning): void => {
  collector?.warnings.push(warning);
};

export const emitTrace = (collector: ExecutionCollector | undefined, entry: BattleTraceEntry): void => {
  collector?.trace?.push(entry);
};

/** Trace entries of one kind in emission order; empty while tracing is off. */
export const traceEntriesOf = <K extends BattleTraceKind>(
  collector: ExecutionCollector,
  kind: K,
): readonly BattleTraceEntryOf<K>[] =>
  (collector.trace ?? []).filter((entry): entry is BattleTraceEntryOf<K> => entry.kind === kind);
