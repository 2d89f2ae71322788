export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isContainer(value: unknown): value is Record<string, unknown> | unknown[] {
  return Array.isArray(value) || isRecord(value);
}

/**
 * Trimmed string, or undefined when the value is not a string or is blank.
 */
export function asText(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * First non-blank string found under `subkeys`, in order.
 */
export function probeText(record: Record<string, unknown>, subkeys: readonly string[]): string | undefined {
  for (const subkey of subkeys) {
    const text = asText(record[subkey]);
    if (text) {
      return text;
    }
  }

  return undefined;
}

/**
 * A plain string is taken as-is; a mapping is unwrapped through `subkeys`.
 */
export function unwrapText(value: unknown, subkeys: readonly string[]): string | undefined {
  if (isRecord(value)) {
    return probeText(value, subkeys);
  }

  return asText(value);
}

export function dedupePreservingOrder(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const value of values) {
    if (seen.has(value)) continue;
    seen.add(value);
    result.push(value);
  }

  return result;
}
