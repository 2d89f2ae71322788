import { asText, dedupePreservingOrder, isContainer, isRecord, probeText, unwrapText } from './guards.js';
import type { JobRecord, LocatedRequirements, RequirementTier } from './types.js';

// Key order is precedence order: the first key that yields text wins.
export const DESCRIPTION_KEYS = ['JobDescription', 'Description', 'job_description', 'jobDesc'] as const;
export const DESCRIPTION_SUBKEYS = ['caption', 'value', 'text', 'description'] as const;

export const REQUIREMENT_KEYS = ['id_Job_Requirement', 'id_Job_Requirements', 'Job_Requirement', 'Job_Requirements'] as const;
export const REQUIREMENT_SUBKEYS = [
  'caption',
  'value',
  'text',
  'requirements',
  'description',
  'JobRequirement',
  'JobRequirements',
] as const;

export const LEGACY_REQUIREMENT_KEYS = [
  'JobRequirement',
  'JobRequirements',
  'Requirement',
  'Requirements',
  'job_requirement',
] as const;
export const LEGACY_REQUIREMENT_SUBKEYS = ['caption', 'value', 'text', 'requirements'] as const;

export const REQUIREMENT_KEY_HINTS = ['require', 'qualif', 'about you', 'what you bring', 'who you are'] as const;

export const SKILL_KEYS = ['id_Job_Skills', 'Skills', 'skills'] as const;
export const SKILL_SUBKEYS = ['caption', 'value', 'text', 'name'] as const;

export const TITLE_KEYS = ['Title', 'JobTitle', 'title'] as const;
export const COMPANY_KEYS = ['CompanyName', 'company_name', 'company'] as const;

/**
 * Nesting level past which the fuzzy requirement walk stops descending.
 * Containers are entered once each, so cycles end the walk as well.
 */
export const MAX_WALK_DEPTH = 32;

const REQUIREMENT_HEADING = /(requirements|requirement|qualifications|about you|what you bring|who you are)/i;
// A Title Case line ending in a colon, e.g. "\nBenefits:\n"
const SECTION_HEADING = /\n[A-Z][A-Za-z0-9 /&]{3,}:\s*\n/;

function firstText(job: JobRecord, keys: readonly string[], subkeys: readonly string[]): string {
  for (const key of keys) {
    const text = unwrapText(job[key], subkeys);
    if (text) {
      return text;
    }
  }

  return '';
}

/**
 * Locate the job description under any of the known schema variants.
 * Returns '' when nothing is found.
 */
export function getDescription(job: unknown): string {
  if (!isRecord(job)) return '';
  return firstText(job, DESCRIPTION_KEYS, DESCRIPTION_SUBKEYS);
}

export function getJobTitle(job: unknown): string {
  if (!isRecord(job)) return '';
  return firstText(job, TITLE_KEYS, ['caption']);
}

export function getCompanyName(job: unknown): string {
  if (!isRecord(job)) return '';
  return firstText(job, COMPANY_KEYS, ['caption', 'CompanyName', 'name']);
}

/**
 * Raw skill values listed on the posting. List items that are mappings are
 * unwrapped; scalars are kept as strings. A lone scalar becomes a one-item list.
 */
export function getJobSkills(job: unknown): string[] {
  if (!isRecord(job)) return [];

  for (const key of SKILL_KEYS) {
    const value = job[key];

    if (Array.isArray(value)) {
      const skills: string[] = [];
      for (const item of value) {
        const skill = isRecord(item) ? probeText(item, SKILL_SUBKEYS) : scalarText(item);
        if (skill) {
          skills.push(skill);
        }
      }

      if (skills.length > 0) {
        return skills;
      }
      continue;
    }

    const skill = isRecord(value) ? probeText(value, SKILL_SUBKEYS) : scalarText(value);
    if (skill) {
      return [skill];
    }
  }

  return [];
}

function scalarText(value: unknown): string | undefined {
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }

  return asText(value);
}

// --- Requirement tiers ---

function fromKnownKeys(job: JobRecord): string | undefined {
  for (const key of REQUIREMENT_KEYS) {
    const value = job[key];

    if (Array.isArray(value)) {
      const parts: string[] = [];
      for (const item of value) {
        const part = isRecord(item) ? probeText(item, REQUIREMENT_SUBKEYS) : asText(item);
        if (part) {
          parts.push(part);
        }
      }

      if (parts.length > 0) {
        return parts.join('\n');
      }
      continue;
    }

    const text = unwrapText(value, REQUIREMENT_SUBKEYS);
    if (text) {
      return text;
    }
  }

  return undefined;
}

function fromLegacyKeys(job: JobRecord): string | undefined {
  return firstText(job, LEGACY_REQUIREMENT_KEYS, LEGACY_REQUIREMENT_SUBKEYS) || undefined;
}

function compactKey(key: string): string {
  return key.toLowerCase().replace(/[^a-z0-9]/g, '');
}

const COMPACT_HINTS = REQUIREMENT_KEY_HINTS.map(compactKey);

export function isRequirementKey(key: string): boolean {
  const compact = compactKey(key);
  return COMPACT_HINTS.some((hint) => compact.includes(hint));
}

// `seen` holds every container already entered, so shared or cyclic
// references are walked once.
function enter(node: object, depth: number, seen: WeakSet<object>): boolean {
  if (depth > MAX_WALK_DEPTH || seen.has(node)) return false;
  seen.add(node);
  return true;
}

function collectAllText(node: unknown, depth: number, seen: WeakSet<object>, out: string[]): void {
  if (depth > MAX_WALK_DEPTH) return;

  const text = asText(node);
  if (text) {
    out.push(text);
    return;
  }

  if (!isContainer(node) || !enter(node, depth, seen)) return;

  const children = Array.isArray(node) ? node : Object.values(node);
  for (const child of children) {
    collectAllText(child, depth + 1, seen, out);
  }
}

function collectRequirementText(node: unknown, depth: number, seen: WeakSet<object>, out: string[]): void {
  if (!isContainer(node) || !enter(node, depth, seen)) return;

  if (Array.isArray(node)) {
    for (const item of node) {
      collectRequirementText(item, depth + 1, seen, out);
    }
    return;
  }

  for (const [key, value] of Object.entries(node)) {
    if (isRequirementKey(key)) {
      collectAllText(value, depth + 1, seen, out);
    } else {
      collectRequirementText(value, depth + 1, seen, out);
    }
  }
}

function fromFuzzyKeys(job: JobRecord): string | undefined {
  const texts: string[] = [];
  collectRequirementText(job, 0, new WeakSet(), texts);
  if (texts.length === 0) return undefined;

  return dedupePreservingOrder(texts).join('\n');
}

function fromDescription(job: JobRecord): string | undefined {
  return carveRequirementsFromDescription(getDescription(job)) || undefined;
}

export interface RequirementStrategy {
  tier: RequirementTier;
  locate: (job: JobRecord) => string | undefined;
}

/**
 * Tried in order; the first strategy that yields text wins.
 */
export const REQUIREMENT_STRATEGIES: readonly RequirementStrategy[] = [
  { tier: 'known-keys', locate: fromKnownKeys },
  { tier: 'legacy-keys', locate: fromLegacyKeys },
  { tier: 'fuzzy-keys', locate: fromFuzzyKeys },
  { tier: 'description', locate: fromDescription },
];

export function locateRequirements(
  job: unknown,
  strategies: readonly RequirementStrategy[] = REQUIREMENT_STRATEGIES,
): LocatedRequirements {
  if (!isRecord(job)) {
    return { text: '', tier: null };
  }

  for (const strategy of strategies) {
    const text = strategy.locate(job)?.trim();
    if (text) {
      return { text, tier: strategy.tier };
    }
  }

  return { text: '', tier: null };
}

export function getRequirements(job: unknown): string {
  return locateRequirements(job).text;
}

/**
 * Pull the requirements section out of a free-form description: everything after
 * the first requirement-like heading, cut at the next "Heading:" line.
 * Returns '' when the description has no such heading.
 */
export function carveRequirementsFromDescription(description: string): string {
  if (!description) return '';

  const text = description.replace(/\r\n?/g, '\n');
  // With a capture group, split keeps the headings: [before, heading, after, heading, after, ...]
  const parts = text.split(REQUIREMENT_HEADING);
  if (parts.length < 3) return '';

  const section = parts[2] ?? '';
  const [head = ''] = section.split(SECTION_HEADING);
  return head.trim();
}
