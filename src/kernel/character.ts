import { DEFAULT_ARCHETYPE_CATALOG, type ArchetypeCatalog, type ArchetypeSpec } from './archetype-catalog.js';
import { emitTrace } from './execution-collector.js';
import { kernelRuntimeError } from './runtime-error.js';
import { createDefaultSkillTree, type SkillDecisionTree } from './skill-decision-tree.js';
import { createSkill, useSkill, type Skill } from './skills.js';
import type { TurnQueue } from './turn-queue.js';
import type { ArchetypeId, CombatAction, Combatant } from './types.js';

export interface CharacterOptions {
  readonly catalog?: ArchetypeCatalog;
  /** Only read by archetypes whose attack is a sorcererAttack. */
  readonly decisionTree?: SkillDecisionTree;
}

interface CharacterState {
  readonly name: string;
  readonly archetype: ArchetypeId;
  readonly spec: ArchetypeSpec;
  readonly attackSkill: Skill;
  readonly specialSkill: Skill;
  readonly hp: number;
  readonly sp: number;
}

export class Character implements Combatant {
  readonly name: string;
  readonly archetype: ArchetypeId;
  readonly queue: TurnQueue;
  readonly defense: number;
  readonly attackSkill: Skill;
  readonly specialSkill: Skill;
  enemy: Combatant | null = null;
  private readonly spec: ArchetypeSpec;
  private hp: number;
  private sp: number;

  private constructor(queue: TurnQueue, state: CharacterState) {
    this.queue = queue;
    this.name = state.name;
    this.archetype = state.archetype;
    this.spec = state.spec;
    this.defense = state.spec.defense;
    this.attackSkill = state.attackSkill;
    this.specialSkill = state.specialSkill;
    this.hp = state.hp;
    this.sp = state.sp;
  }

  static create(name: string, archetype: ArchetypeId, queue: TurnQueue, options: CharacterOptions = {}): Character {
    const spec = (options.catalog ?? DEFAULT_ARCHETYPE_CATALOG).archetypes[archetype];
    const decisionTree =
      spec.attack.kind === 'sorcererAttack' ? (options.decisionTree ?? createDefaultSkillTree(options.catalog)) : undefined;
    return new Character(queue, {
      name,
      archetype,
      spec,
      attackSkill: createSkill(`${spec.label}Attack`, spec.attack, decisionTree),
      specialSkill: createSkill(`${spec.label}Special`, spec.special),
      hp: spec.hp,
      sp: spec.sp,
    });
  }

  getHp(): number {
    return this.hp;
  }

  getSp(): number {
    return this.sp;
  }

  setHp(hp: number): void {
    this.hp = hp;
  }

  setSp(sp: number): void {
    this.sp = sp;
  }

  reduceSp(amount: number): void {
    this.sp -= amount;
  }

  /** Damage is reduced by defense and never heals; HP stops at 0. */
  applyDamage(damage: number): void {
    this.hp = Math.max(0, this.hp - Math.max(0, damage - this.defense));
  }

  getAvailableActions(): readonly CombatAction[] {
    if (this.hp <= 0) {
      return [];
    }
    const actions: CombatAction[] = [];
    if (this.sp >= this.attackSkill.cost) {
      actions.push('attack');
    }
    if (this.sp >= this.specialSkill.cost) {
      actions.push('special');
    }
    return actions;
  }

  attack(): void {
    this.perform(this.attackSkill);
  }

  specialAttack(): void {
    this.perform(this.specialSkill);
  }

  copy(queue: TurnQueue): Character {
    return new Character(queue, {
      name: this.name,
      archetype: this.archetype,
      spec: this.spec,
      attackSkill: this.attackSkill,
      specialSkill: this.specialSkill,
      hp: this.hp,
      sp: this.sp,
    });
  }

  describe(): string {
    return `${this.name} (${this.spec.label}): ${this.hp}/${this.sp}`;
  }

  private perform(skill: Skill): void {
    const target = this.requireEnemy();
    const targetHpBefore = target.getHp();
    const casterSpBefore = this.sp;
    useSkill(skill, this, target);
    emitTrace(this.queue.collector, {
      kind: 'skillUse',
      caster: this.name,
      target: target.name,
      skill: skill.label,
      targetHpBefore,
      targetHpAfter: target.getHp(),
      casterSpBefore,
      casterSpAfter: this.sp,
    });
  }

  private requireEnemy(): Character {
    if (!(this.enemy instanceof Character)) {
      throw kernelRuntimeError('COMBATANT_ENEMY_MISSING', `${this.name} has no enemy to act on`, {
        combatant: this.name,
      });
    }
    return this.enemy;
  }
}

/** Link two combatants as each other's enemy. */
export const linkEnemies = (first: Combatant, second: Combatant): void => {
  first.enemy = second;
  second.enemy = first;
};
