import { z } from 'zod';

const requestLineSchema = z
  .object({
    custom_id: z.string(),
    body: z.record(z.unknown()),
  })
  .passthrough();

export interface RewrittenPayload {
  readonly content: string;
  readonly lineCount: number;
  readonly droppedLines: number;
}

/**
 * Replace the `body.model` field of every request line.
 *
 * Lines that are not valid request objects are dropped and counted. An
 * empty result means nothing in the original payload could be recovered.
 */
export function rewritePayloadModel(content: string, model: string): RewrittenPayload {
  const lines: string[] = [];
  let droppedLines = 0;

  for (const line of content.split('\n')) {
    if (line.trim() === '') continue;
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      droppedLines++;
      continue;
    }
    const parsed = requestLineSchema.safeParse(json);
    if (!parsed.success) {
      droppedLines++;
      continue;
    }
    lines.push(JSON.stringify({ ...parsed.data, body: { ...parsed.data.body, model } }));
  }

  return { content: lines.join('\n'), lineCount: lines.length, droppedLines };
}

/** Concatenate several JSONL payloads into one. */
export function combinePayloads(contents: readonly string[]): string {
  return contents.filter((c) => c.trim() !== '').join('\n');
}
