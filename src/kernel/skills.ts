import type { SkillKind, SkillSpec } from './archetype-catalog.js';
import type { Character } from './character.js';
import type { Combatant } from './types.js';
import { emitWarning } from './execution-collector.js';
import type { SkillDecisionTree } from './skill-decision-tree.js';

interface SkillShape<K extends SkillKind> {
  readonly kind: K;
  /** Display name such as `RogueAttack`. */
  readonly label: string;
  readonly cost: number;
  readonly damage: number;
}

export type StandardSkill = SkillShape<Exclude<SkillKind, 'sorcererAttack'>>;

export interface SorcererAttackSkill extends SkillShape<'sorcererAttack'> {
  readonly decisionTree: SkillDecisionTree;
}

export type Skill = StandardSkill | SorcererAttackSkill;

export const createSkill = (label: string, spec: SkillSpec, decisionTree?: SkillDecisionTree): Skill => {
  if (spec.kind !== 'sorcererAttack') {
    return { kind: spec.kind, label, cost: spec.cost, damage: spec.damage };
  }
  if (decisionTree === undefined) {
    throw new RangeError(`${label} is a sorcererAttack and needs a decision tree`);
  }
  return { kind: spec.kind, label, cost: spec.cost, damage: spec.damage, decisionTree };
};

const dealDamage = (skill: Skill, caster: Character, target: Character): void => {
  caster.reduceSp(skill.cost);
  target.applyDamage(skill.damage);
};

const drainHealth = (skill: Skill, caster: Character, target: Character): void => {
  const targetHp = target.getHp();
  dealDamage(skill, caster, target);
  caster.setHp(caster.getHp() + targetHp - target.getHp());
};

const rebuildQueueWithoutDuplicates = (caster: Character): void => {
  const queue = caster.queue;
  const distinct: Combatant[] = [];
  while (!queue.isEmpty()) {
    const ticket = queue.remove();
    if (!distinct.includes(ticket)) {
      distinct.push(ticket);
    }
  }
  for (const ticket of distinct) {
    queue.add(ticket);
  }
};

/** Resolve `skill` cast by `caster` on `target`, including every ticket it enqueues. */
export const useSkill = (skill: Skill, caster: Character, target: Character): void => {
  const queue = caster.queue;

  switch (skill.kind) {
    case 'normalAttack':
      dealDamage(skill, caster, target);
      queue.add(caster);
      return;
    case 'mageSpecial':
      dealDamage(skill, caster, target);
      queue.add(target);
      queue.add(caster);
      return;
    case 'rogueSpecial':
      dealDamage(skill, caster, target);
      queue.add(caster);
      queue.add(caster);
      return;
    case 'vampireAttack':
      drainHealth(skill, caster, target);
      queue.add(caster);
      return;
    case 'vampireSpecial':
      drainHealth(skill, caster, target);
      queue.add(caster);
      queue.add(caster);
      queue.add(target);
      return;
    case 'sorcererAttack': {
      const chosen = skill.decisionTree.pickSkill(caster, target);
      if (chosen === null) {
        caster.reduceSp(skill.cost);
        emitWarning(queue.collector, {
          code: 'SORCERER_SKILL_UNRESOLVED',
          message: `${caster.name} found no skill in its decision tree`,
          context: { caster: caster.name, target: target.name },
        });
        return;
      }
      useSkill(chosen, caster, target);
      // The sorcerer pays its own attack cost whatever the borrowed skill costs.
      caster.setSp(caster.getSp() + chosen.cost - skill.cost);
      return;
    }
    case 'sorcererSpecial':
      rebuildQueueWithoutDuplicates(caster);
      queue.add(caster);
      dealDamage(skill, caster, target);
      return;
  }
};
