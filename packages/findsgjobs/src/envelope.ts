import { z } from 'zod';
import type { SearchResultItem } from './types.js';

const mappingSchema = z.record(z.string(), z.unknown());

const searchItemSchema = z.object({
  job: mappingSchema.nullish(),
  company: mappingSchema.nullish(),
});

const searchEnvelopeSchema = z.object({
  data: z
    .object({
      result: z.array(z.unknown()).nullish(),
    })
    .nullish(),
});

/**
 * Pull `data.result[]` out of a search response. A missing or malformed envelope
 * yields []; entries that are not mappings are skipped.
 */
export function unwrapSearchResponse(payload: unknown): SearchResultItem[] {
  const envelope = searchEnvelopeSchema.safeParse(payload);
  if (!envelope.success) {
    return [];
  }

  const items: SearchResultItem[] = [];
  for (const entry of envelope.data.data?.result ?? []) {
    const item = searchItemSchema.safeParse(entry);
    if (item.success) {
      items.push({ job: item.data.job ?? {}, company: item.data.company ?? {} });
    }
  }

  return items;
}
