import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { Diagnostic } from './diagnostics.js';
import { ARCHETYPE_IDS, ArchetypeCatalogSchema, type SKILL_KINDS } from './schemas.js';
import type { ArchetypeId } from './types.js';

export type SkillKind = (typeof SKILL_KINDS)[number];

export interface SkillSpec {
  readonly kind: SkillKind;
  readonly cost: number;
  readonly damage: number;
}

export interface ArchetypeSpec {
  readonly label: string;
  readonly hp: number;
  readonly sp: number;
  readonly defense: number;
  readonly attack: SkillSpec;
  readonly special: SkillSpec;
}

export interface ArchetypeCatalog {
  readonly archetypes: Readonly<Record<ArchetypeId, ArchetypeSpec>>;
}

export interface LoadArchetypeCatalogResult {
  readonly catalog: ArchetypeCatalog | null;
  readonly diagnostics: readonly Diagnostic[];
}

export interface ValidateArchetypeCatalogOptions {
  readonly assetPath?: string;
  readonly pathPrefix?: string;
}

/** Archetypes whose skills the default sorcerer decision tree casts. */
const BORROWED_SKILL_SOURCES: readonly ArchetypeId[] = ['mage', 'rogue'];

export const DEFAULT_ARCHETYPE_CATALOG: ArchetypeCatalog = {
  archetypes: {
    rogue: {
      label: 'Rogue',
      hp: 100,
      sp: 100,
      defense: 10,
      attack: { kind: 'normalAttack', cost: 3, damage: 15 },
      special: { kind: 'rogueSpecial', cost: 10, damage: 20 },
    },
    mage: {
      label: 'Mage',
      hp: 100,
      sp: 100,
      defense: 8,
      attack: { kind: 'normalAttack', cost: 5, damage: 20 },
      special: { kind: 'mageSpecial', cost: 30, damage: 40 },
    },
    vampire: {
      label: 'Vampire',
      hp: 100,
      sp: 100,
      defense: 12,
      attack: { kind: 'vampireAttack', cost: 15, damage: 20 },
      special: { kind: 'vampireSpecial', cost: 20, damage: 30 },
    },
    sorcerer: {
      label: 'Sorcerer',
      hp: 100,
      sp: 100,
      defense: 10,
      attack: { kind: 'sorcererAttack', cost: 15, damage: 0 },
      special: { kind: 'sorcererSpecial', cost: 20, damage: 25 },
    },
  },
};

export function loadArchetypeCatalogFromFile(assetPath: string): LoadArchetypeCatalogResult {
  const fileResult = readCatalogFile(assetPath);
  if (fileResult.diagnostic !== undefined) {
    return {
      catalog: null,
      diagnostics: [fileResult.diagnostic],
    };
  }

  return validateArchetypeCatalog(fileResult.value, { assetPath });
}

export function validateArchetypeCatalog(
  value: unknown,
  options: ValidateArchetypeCatalogOptions = {},
): LoadArchetypeCatalogResult {
  const pathPrefix = options.pathPrefix ?? 'catalog';
  const parsed = ArchetypeCatalogSchema.safeParse(value);
  if (!parsed.success) {
    return {
      catalog: null,
      diagnostics: parsed.error.issues.map((issue) => ({
        code: 'ARCHETYPE_CATALOG_SCHEMA_INVALID',
        path: issue.path.length > 0 ? `${pathPrefix}.${issue.path.join('.')}` : pathPrefix,
        severity: 'error',
        message: issue.message,
        ...(options.assetPath === undefined ? {} : { assetPath: options.assetPath }),
      })),
    };
  }

  const catalog: ArchetypeCatalog = parsed.data;
  const diagnostics: Diagnostic[] = [];
  for (const archetypeId of ARCHETYPE_IDS) {
    if (catalog.archetypes[archetypeId].special.kind === 'sorcererAttack') {
      diagnostics.push({
        code: 'ARCHETYPE_CATALOG_SKILL_SLOT_INVALID',
        path: `${pathPrefix}.archetypes.${archetypeId}.special.kind`,
        severity: 'error',
        message: 'sorcererAttack resolves through a decision tree and is only allowed in the attack slot.',
        suggestion: 'Move sorcererAttack to the attack slot or pick another special skill kind.',
        ...(options.assetPath === undefined ? {} : { assetPath: options.assetPath }),
      });
    }
  }
  for (const archetypeId of BORROWED_SKILL_SOURCES) {
    if (catalog.archetypes[archetypeId].attack.kind === 'sorcererAttack') {
      diagnostics.push({
        code: 'ARCHETYPE_CATALOG_SKILL_SLOT_INVALID',
        path: `${pathPrefix}.archetypes.${archetypeId}.attack.kind`,
        severity: 'error',
        message: `The default sorcerer decision tree borrows ${archetypeId} skills, so ${archetypeId} cannot attack with sorcererAttack.`,
        suggestion: 'Give this archetype a normalAttack or another non-sorcerer attack kind.',
        ...(options.assetPath === undefined ? {} : { assetPath: options.assetPath }),
      });
    }
  }

  if (diagnostics.length > 0) {
    return { catalog: null, diagnostics };
  }

  return { catalog, diagnostics: [] };
}

function readCatalogFile(assetPath: string): { readonly value: unknown; readonly diagnostic?: Diagnostic } {
  const extension = extname(assetPath).toLowerCase();
  if (extension !== '.json' && extension !== '.yaml' && extension !== '.yml') {
    return {
      value: null,
      diagnostic: {
        code: 'ARCHETYPE_CATALOG_FORMAT_UNSUPPORTED',
        path: 'catalog.file',
        severity: 'error',
        message: `Unsupported catalog format "${extension || '(none)'}".`,
        suggestion: 'Use .json, .yaml, or .yml catalog files.',
        assetPath,
      },
    };
  }

  try {
    const source = readFileSync(assetPath, 'utf8');
    const value: unknown = extension === '.json' ? JSON.parse(source) : parseYaml(source);
    return { value };
  } catch (error) {
    return {
      value: null,
      diagnostic: {
        code: 'ARCHETYPE_CATALOG_PARSE_ERROR',
        path: 'catalog.file',
        severity: 'error',
        message: `Failed to parse catalog file: ${formatError(error)}.`,
        suggestion: 'Fix file syntax and try loading again.',
        assetPath,
      },
    };
  }
}

function formatError(error: unknown): string {
  if (error instanceof Error && error.message.trim() !== '') {
    return error.message;
  }
  return String(error);
}
