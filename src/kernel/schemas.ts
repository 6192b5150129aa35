import { z } from 'zod';

export const SKILL_KINDS = [
  'normalAttack',
  'mageSpecial',
  'rogueSpecial',
  'vampireAttack',
  'vampireSpecial',
  'sorcererAttack',
  'sorcererSpecial',
] as const;

export const ARCHETYPE_IDS = ['rogue', 'mage', 'vampire', 'sorcerer'] as const;

const StringSchema = z.string();
const NonNegativeIntegerSchema = z.number().int().nonnegative();

export const SkillKindSchema = z.enum(SKILL_KINDS);

export const SkillSpecSchema = z
  .object({
    kind: SkillKindSchema,
    cost: z.number().int().positive(),
    damage: NonNegativeIntegerSchema,
  })
  .strict();

export const ArchetypeSpecSchema = z
  .object({
    label: StringSchema.min(1),
    hp: NonNegativeIntegerSchema,
    sp: NonNegativeIntegerSchema,
    defense: NonNegativeIntegerSchema,
    attack: SkillSpecSchema,
    special: SkillSpecSchema,
  })
  .strict();

export const ArchetypeCatalogSchema = z
  .object({
    archetypes: z
      .object({
        rogue: ArchetypeSpecSchema,
        mage: ArchetypeSpecSchema,
        vampire: ArchetypeSpecSchema,
        sorcerer: ArchetypeSpecSchema,
      })
      .strict(),
  })
  .strict();
