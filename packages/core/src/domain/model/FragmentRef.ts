/** Identifies one unit of text to embed: the owning entity and the fragment within it. */
export interface FragmentRef {
  readonly ownerId: number;
  readonly fragmentId: number;
}

/** A fragment together with the text that will be sent for embedding. */
export interface Fragment extends FragmentRef {
  readonly text: string;
}

const CORRELATION_ID_PATTERN = /^(\d+)-(\d+)$/;

/** Stable map key for a fragment reference. */
export function fragmentKey(ref: FragmentRef): string {
  return `${String(ref.ownerId)}:${String(ref.fragmentId)}`;
}

/** Correlation id embedded in every request line: `"<ownerId>-<fragmentId>"`. */
export function toCorrelationId(ref: FragmentRef): string {
  return `${String(ref.ownerId)}-${String(ref.fragmentId)}`;
}

/** Parse a correlation id back into its reference. Returns `null` for anything not produced by `toCorrelationId`. */
export function parseCorrelationId(correlationId: string): FragmentRef | null {
  const match = CORRELATION_ID_PATTERN.exec(correlationId);
  if (!match) return null;
  const ownerId = Number(match[1]);
  const fragmentId = Number(match[2]);
  if (!Number.isSafeInteger(ownerId) || !Number.isSafeInteger(fragmentId)) return null;
  return { ownerId, fragmentId };
}

/** Drop repeated references, keeping the first occurrence of each. */
export function uniqueRefs(refs: Iterable<FragmentRef>): FragmentRef[] {
  const seen = new Set<string>();
  const result: FragmentRef[] = [];
  for (const ref of refs) {
    const key = fragmentKey(ref);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push({ ownerId: ref.ownerId, fragmentId: ref.fragmentId });
  }
  return result;
}
