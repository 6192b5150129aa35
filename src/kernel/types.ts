import type { TurnQueue } from './turn-queue.js';

export type CombatAction = 'attack' | 'special';

export type ActionChoice = CombatAction | 'none';

/** Enumeration order used by every search tie-break. */
export const ACTION_ORDER: readonly CombatAction[] = ['attack', 'special'];

export type ArchetypeId = 'rogue' | 'mage' | 'vampire' | 'sorcerer';

/**
 * What the turn queue and the search engine need from an actor.
 *
 * Identity is reference identity: two combatants built with equal stats are
 * different actors.
 */
export interface Combatant {
  readonly name: string;
  enemy: Combatant | null;
  getHp(): number;
  getSp(): number;
  getAvailableActions(): readonly CombatAction[];
  attack(): void;
  specialAttack(): void;
  /** Independent clone bound to `queue`, with no enemy linked yet. */
  copy(queue: TurnQueue): Combatant;
  describe(): string;
}

export interface Playstyle {
  readonly isManual: boolean;
  /** Manual playstyles read `key`; search-based ones ignore it. */
  selectAction(key?: string): ActionChoice;
  copy(queue: TurnQueue): Playstyle;
}

// ── Execution collector ────────────────────────────────────

export type RuntimeWarningCode = 'SORCERER_SKILL_UNRESOLVED';

export interface RuntimeWarning {
  readonly code: RuntimeWarningCode;
  readonly message: string;
  readonly context: Readonly<Record<string, unknown>>;
  readonly hint?: string;
}

export interface SkillUseTraceEntry {
  readonly kind: 'skillUse';
  readonly caster: string;
  readonly target: string;
  readonly skill: string;
  readonly targetHpBefore: number;
  readonly targetHpAfter: number;
  readonly casterSpBefore: number;
  readonly casterSpAfter: number;
}

export interface DecisionTraceEntry {
  readonly kind: 'decision';
  readonly actor: string;
  readonly choice: ActionChoice;
}

export type BattleTraceEntry = SkillUseTraceEntry | DecisionTraceEntry;

export interface ExecutionOptions {
  readonly trace?: boolean;
}

export interface ExecutionCollector {
  readonly warnings: RuntimeWarning[];
  readonly trace: BattleTraceEntry[] | null;
}
