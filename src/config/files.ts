import { readFile } from 'node:fs/promises';
import { ConfigError, describeError } from '@domain/errors';
import { compileTitlePatterns, type TitlePatternTable } from '@domain/eligibility';
import { type Roster, RosterSchema } from '@domain/types';
import { z } from 'zod';

async function readJson(path: string, label: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(`Unable to read ${label} at ${path}: ${describeError(error)}`);
  }
  try {
    return JSON.parse(text) as unknown;
  } catch (error) {
    throw new ConfigError(`${label} at ${path} is not valid JSON: ${describeError(error)}`);
  }
}

export function parseRoster(input: unknown): Roster {
  const result = RosterSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError('Roster validation failed', result.error.issues);
  }
  return result.data;
}

/** Reads the roster file: a JSON array of `{ name, url }` entries. */
export async function loadRosterConfig(path: string): Promise<Roster> {
  return parseRoster(await readJson(path, 'roster config'));
}

const PatternSourceSchema = z
  .string()
  .min(1)
  .superRefine((pattern: string, ctx: z.RefinementCtx) => {
    try {
      new RegExp(pattern, 'i');
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid pattern: ${describeError(error)}`,
      });
    }
  });

const TitlePatternFileSchema = z
  .object({
    exclude: z.array(PatternSourceSchema),
    allow: z.array(PatternSourceSchema).min(1, 'At least one allow pattern is required'),
  })
  .strict();

export function parseTitlePatterns(input: unknown): TitlePatternTable {
  const result = TitlePatternFileSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError('Title pattern validation failed', result.error.issues);
  }
  return compileTitlePatterns(result.data);
}

/** Reads an `{ exclude: string[], allow: string[] }` pattern table. Order is kept. */
export async function loadTitlePatterns(path: string): Promise<TitlePatternTable> {
  return parseTitlePatterns(await readJson(path, 'title patterns'));
}
