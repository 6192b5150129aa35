import type { ActionChoice } from './types.js';

export type KernelRuntimeErrorCode =
  | 'EMPTY_QUEUE'
  | 'QUEUE_PLAYERS_UNBOUND'
  | 'COMBATANT_ENEMY_MISSING'
  | 'PERMISSION_TABLE_MISALIGNED'
  | 'NON_TERMINAL_WITHOUT_ACTIONS'
  | 'SEARCH_NODE_UNSCORED';

export interface KernelRuntimeErrorContextByCode {
  readonly EMPTY_QUEUE: Readonly<Record<string, never>>;
  readonly QUEUE_PLAYERS_UNBOUND: Readonly<{
    readonly operation: 'peek' | 'copy';
  }>;
  readonly COMBATANT_ENEMY_MISSING: Readonly<{
    readonly combatant: string;
  }>;
  readonly PERMISSION_TABLE_MISALIGNED: Readonly<{
    readonly ticketCount: number;
    readonly permissionCount: number;
  }>;
  readonly NON_TERMINAL_WITHOUT_ACTIONS: Readonly<{
    readonly combatant: string;
  }>;
  readonly SEARCH_NODE_UNSCORED: Readonly<{
    readonly action: ActionChoice;
  }>;
}

export type KernelRuntimeErrorContext<C extends KernelRuntimeErrorCode = KernelRuntimeErrorCode> =
  KernelRuntimeErrorContextByCode[C];

function formatMessage<C extends KernelRuntimeErrorCode>(message: string, context?: KernelRuntimeErrorContext<C>): string {
  if (context === undefined) {
    return message;
  }
  return `${message} context=${JSON.stringify(context)}`;
}

export class KernelRuntimeError<C extends KernelRuntimeErrorCode = KernelRuntimeErrorCode> extends Error {
  readonly code: C;
  readonly context?: KernelRuntimeErrorContext<C>;

  constructor(code: C, message: string, context?: KernelRuntimeErrorContext<C>, cause?: unknown) {
    super(formatMessage(message, context), cause === undefined ? undefined : { cause });
    this.name = 'KernelRuntimeError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
  }
}

export const kernelRuntimeError = <C extends KernelRuntimeErrorCode>(
  code: C,
  message: string,
  context?: KernelRuntimeErrorContext<C>,
  cause?: unknown,
): KernelRuntimeError<C> => new KernelRuntimeError(code, message, context, cause);

export const isKernelRuntimeError = <C extends KernelRuntimeErrorCode>(
  error: unknown,
  code?: C,
): error is KernelRuntimeError<C> =>
  error instanceof KernelRuntimeError && (code === undefined || error.code === code);
