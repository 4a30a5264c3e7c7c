import { z } from 'zod';
import type { QuestionRecord } from '../ports/CorpusSource';
import { type Logger, silentLogger } from '../logger';

// Postgres returns bigint ids as strings; ids beyond 2^53 cannot be kept apart as numbers.
const questionIdSchema = z
  .union([z.number(), z.string().regex(/^-?\d+$/).transform(Number)])
  .pipe(z.number().refine(Number.isSafeInteger, { message: 'question id must be a safe integer' }));

const labelSchema = z.string().nullish().transform((value) => value?.trim() || 'Unknown');

// Corpus files name the text `question`; `text` is accepted as well.
const rawQuestionSchema = z
  .object({
    id: questionIdSchema,
    question: z.string().nullish(),
    text: z.string().nullish(),
    domain: labelSchema,
    subdomain: labelSchema,
  })
  .transform((raw, ctx) => {
    const text = raw.question ?? raw.text ?? '';
    if (text.trim().length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'question text is missing or blank', path: ['question'] });
      return z.NEVER;
    }
    return { id: raw.id, text, domain: raw.domain, subdomain: raw.subdomain };
  });

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`).join('; ');
}

/**
 * Turns raw corpus entries into the ordered, immutable record list the engine
 * indexes. Malformed entries and repeated ids are skipped with a warning.
 */
export function parseCorpus(raw: readonly unknown[], logger: Logger = silentLogger): readonly QuestionRecord[] {
  const records: QuestionRecord[] = [];
  const seen = new Set<number>();

  raw.forEach((entry, position) => {
    const parsed = rawQuestionSchema.safeParse(entry);
    if (!parsed.success) {
      logger.warn(`Skipping corpus entry #${position}: ${describeIssues(parsed.error)}`);
      return;
    }

    const record = parsed.data;
    if (seen.has(record.id)) {
      logger.warn(`Skipping corpus entry #${position}: duplicate question id ${record.id}`);
      return;
    }

    seen.add(record.id);
    records.push(Object.freeze(record));
  });

  return Object.freeze(records);
}
