import { z } from 'zod';
import type { Fragment } from '@embedbatch/core';

const fragmentLineSchema = z.object({
  ownerId: z.number().int().nonnegative(),
  fragmentId: z.number().int().nonnegative(),
  text: z.string().min(1),
});

export interface FragmentLineError {
  /** 1-based line number in the source file. */
  readonly line: number;
  readonly message: string;
}

export interface ParsedFragments {
  readonly fragments: Fragment[];
  readonly errors: FragmentLineError[];
}

/**
 * Parse JSONL with one `{ ownerId, fragmentId, text }` object per line.
 * Blank lines are ignored; every other line is either a fragment or an error.
 */
export function parseFragmentLines(content: string): ParsedFragments {
  const fragments: Fragment[] = [];
  const errors: FragmentLineError[] = [];

  content.split(/\r?\n/).forEach((raw, index) => {
    const line = index + 1;
    if (raw.trim() === '') return;

    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch {
      errors.push({ line, message: 'Malformed JSON' });
      return;
    }

    const parsed = fragmentLineSchema.safeParse(value);
    if (!parsed.success) {
      errors.push({
        line,
        message: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      });
      return;
    }
    fragments.push(parsed.data);
  });

  return { fragments, errors };
}
