/**
 * Trim whitespace and collapse runs of whitespace to one space.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Drop anything between `<` and `>` (tags become spaces), then collapse whitespace.
 * Empty or absent input yields ''.
 */
export function stripMarkup(text: string | null | undefined): string {
  if (!text) return '';
  return normalizeWhitespace(text.replace(/<[^>]+>/g, ' '));
}

/**
 * Lowercase and blank out everything except letters, digits, `+`, `.`, `#` and space,
 * so "C++", "C#" and "Node.js" survive as comparable tokens.
 */
export function normalizeSkillText(skill: string): string {
  return skill.toLowerCase().replace(/[^a-z0-9+.# ]/g, ' ').trim();
}
