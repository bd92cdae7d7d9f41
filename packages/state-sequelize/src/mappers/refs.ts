import { z } from 'zod';
import type { FragmentRef } from '@embedbatch/core';
import { parseJson } from '../utils/parseJson.js';

const fragmentRefsSchema = z.array(z.object({ ownerId: z.number().int(), fragmentId: z.number().int() }));
const idListSchema = z.array(z.string());

/** Read a JSON column holding fragment references. */
export function toFragmentRefs(value: unknown): FragmentRef[] {
  return fragmentRefsSchema.parse(parseJson(value));
}

/** Read a nullable JSON column holding ids. `null` and an empty list both read as absent. */
export function toIdList(value: unknown): string[] | undefined {
  const parsed = parseJson(value);
  if (parsed === null || parsed === undefined) return undefined;
  const ids = idListSchema.parse(parsed);
  return ids.length > 0 ? ids : undefined;
}

/** BIGINT columns come back as strings on some dialects. */
export function toTimestamp(value: number | string): number;
export function toTimestamp(value: number | string | null): number | undefined;
export function toTimestamp(value: number | string | null): number | undefined {
  return value === null ? undefined : Number(value);
}
