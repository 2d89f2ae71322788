import { isRecord, probeText } from './guards.js';
import { normalizeSkillText } from './text.js';
import type { SkillMatchResult } from './types.js';

const MIN_FALLBACK_TOKEN_LENGTH = 3;

/**
 * Coerce a raw skill value from the API into a trimmed string.
 */
export function toSkillString(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (isRecord(value)) {
    return probeText(value, ['caption', 'value', 'text', 'name']) ?? '';
  }

  return '';
}

/**
 * Whether the résumé mentions a skill. The normalized phrase and the raw
 * lowercased phrase are tried first; failing that, any token longer than two
 * characters is enough.
 *
 * Containment is plain substring search, not word-boundary aware: "excel" is
 * found inside "excellent".
 */
export function resumeMentionsSkill(skill: string, resumeLower: string): boolean {
  const normalized = normalizeSkillText(skill);
  if (!normalized) return false;

  if (resumeLower.includes(normalized) || resumeLower.includes(skill.toLowerCase())) {
    return true;
  }

  return normalized
    .split(/\s+/)
    .some((token) => token.length >= MIN_FALLBACK_TOKEN_LENGTH && resumeLower.includes(token));
}

/**
 * Split the job's skill list into skills the résumé mentions and skills it does not.
 * Blank skills, and repeats of an already-seen skill, are skipped.
 */
export function matchSkills(jobSkills: readonly unknown[], resumeText: string): SkillMatchResult {
  const resumeLower = resumeText.toLowerCase();
  const matched: string[] = [];
  const missing: string[] = [];
  const seen = new Set<string>();

  for (const raw of jobSkills) {
    const skill = toSkillString(raw);
    if (!skill) continue;

    const normalized = normalizeSkillText(skill);
    if (!normalized || seen.has(normalized)) continue;
    seen.add(normalized);

    if (resumeMentionsSkill(skill, resumeLower)) {
      matched.push(skill);
    } else {
      missing.push(skill);
    }
  }

  return { matched, missing };
}
