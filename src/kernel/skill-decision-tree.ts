import { DEFAULT_ARCHETYPE_CATALOG, type ArchetypeCatalog } from './archetype-catalog.js';
import type { Character } from './character.js';
import { createSkill, type Skill } from './skills.js';

export type SkillCondition = (caster: Character, target: Character) => boolean;

/**
 * Conditional skill picker used by sorcerers.
 *
 * A node whose condition holds and which has children delegates to them; any
 * other node is itself a candidate. Among all candidates the smallest priority
 * number wins. Priorities are unique within a tree.
 */
export class SkillDecisionTree {
  readonly skill: Skill;
  readonly condition: SkillCondition;
  readonly priority: number;
  readonly children: readonly SkillDecisionTree[];

  constructor(skill: Skill, condition: SkillCondition, priority: number, children: readonly SkillDecisionTree[] = []) {
    this.skill = skill;
    this.condition = condition;
    this.priority = priority;
    this.children = [...children];
  }

  pickSkill(caster: Character, target: Character): Skill | null {
    let best: SkillDecisionTree | null = null;
    for (const candidate of this.getCandidates(caster, target)) {
      if (best === null || candidate.priority < best.priority) {
        best = candidate;
      }
    }
    return best === null ? null : best.skill;
  }

  getCandidates(caster: Character, target: Character): readonly SkillDecisionTree[] {
    if (this.children.length === 0 || !this.condition(caster, target)) {
      return [this];
    }
    return this.children.flatMap((child) => child.getCandidates(caster, target));
  }

  /** Priorities in pre-order. */
  priorities(): readonly number[] {
    return [this.priority, ...this.children.flatMap((child) => child.priorities())];
  }
}

export const never: SkillCondition = () => false;
export const targetHpBelow30: SkillCondition = (_caster, target) => target.getHp() < 30;
export const casterSpAbove20: SkillCondition = (caster) => caster.getSp() > 20;
export const targetSpAbove40: SkillCondition = (_caster, target) => target.getSp() > 40;
export const casterHpAbove90: SkillCondition = (caster) => caster.getHp() > 90;
export const casterHpAbove50: SkillCondition = (caster) => caster.getHp() > 50;

const buildBorrowedSkills = (catalog: ArchetypeCatalog) => {
  const { mage, rogue } = catalog.archetypes;
  return {
    mageAttack: createSkill(`${mage.label}Attack`, mage.attack),
    mageSpecial: createSkill(`${mage.label}Special`, mage.special),
    rogueAttack: createSkill(`${rogue.label}Attack`, rogue.attack),
    rogueSpecial: createSkill(`${rogue.label}Special`, rogue.special),
  };
};

/**
 * ```
 * 5 MageAttack      caster HP > 50
 * ├─ 3 MageAttack   caster SP > 20
 * │  └─ 4 RogueSpecial  target HP < 30
 * │     └─ 6 RogueAttack
 * ├─ 2 MageSpecial  target SP > 40
 * │  └─ 8 RogueAttack
 * └─ 1 RogueAttack  caster HP > 90
 *    └─ 7 RogueSpecial
 * ```
 */
export const createDefaultSkillTree = (catalog: ArchetypeCatalog = DEFAULT_ARCHETYPE_CATALOG): SkillDecisionTree => {
  const skills = buildBorrowedSkills(catalog);

  const node6 = new SkillDecisionTree(skills.rogueAttack, never, 6);
  const node4 = new SkillDecisionTree(skills.rogueSpecial, targetHpBelow30, 4, [node6]);
  const node3 = new SkillDecisionTree(skills.mageAttack, casterSpAbove20, 3, [node4]);

  const node8 = new SkillDecisionTree(skills.rogueAttack, never, 8);
  const node2 = new SkillDecisionTree(skills.mageSpecial, targetSpAbove40, 2, [node8]);

  const node7 = new SkillDecisionTree(skills.rogueSpecial, never, 7);
  const node1 = new SkillDecisionTree(skills.rogueAttack, casterHpAbove90, 1, [node7]);

  return new SkillDecisionTree(skills.mageAttack, casterHpAbove50, 5, [node3, node2, node1]);
};
