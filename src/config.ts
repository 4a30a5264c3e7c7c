import { z } from 'zod';

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

const blankToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const optionalString = z.preprocess(blankToUndefined, z.string().optional());

const booleanFlag = (fallback: boolean) => z.preprocess(
  blankToUndefined,
  z.enum(['true', 'false', '1', '0']).default(fallback ? 'true' : 'false').transform((value) => value === 'true' || value === '1'),
);

const envSchema = z.object({
  QSIM_CORPUS_SOURCE: z.preprocess(blankToUndefined, z.enum(['file', 'postgres']).default('file')),
  QSIM_CORPUS_FILE: z.preprocess(blankToUndefined, z.string().default('question.json')),
  QSIM_CORPUS_TABLE: z.preprocess(blankToUndefined, z.string().default('questions')),
  DATABASE_URL: optionalString,
  QSIM_EMBEDDER: z.preprocess(blankToUndefined, z.enum(['local', 'openai', 'hashing']).default('local')),
  QSIM_EMBEDDING_MODEL: optionalString,
  QSIM_THRESHOLD: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(1).default(0.8)),
  QSIM_TOP_K: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(10)),
  QSIM_EXCLUDE_EXACT: booleanFlag(true),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  QSIM_LLM_MODEL: z.preprocess(blankToUndefined, z.string().default('gpt-4o-mini')),
  QSIM_LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(['debug', 'info', 'warn', 'error']).default('info')),
});

export type CorpusConfig =
  | { source: 'file'; file: string }
  | { source: 'postgres'; databaseUrl: string; table: string };

export interface AppConfig {
  corpus: CorpusConfig;
  embedder: {
    kind: 'local' | 'openai' | 'hashing';
    model?: string;
  };
  similarity: {
    threshold: number;
    topK: number;
    excludeExact: boolean;
  };
  openai: {
    apiKey?: string;
    baseURL?: string;
    chatModel: string;
  };
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const vars = parsed.data;
  let corpus: CorpusConfig;
  if (vars.QSIM_CORPUS_SOURCE === 'postgres') {
    if (!vars.DATABASE_URL) {
      throw new ConfigError(['DATABASE_URL: required when QSIM_CORPUS_SOURCE is postgres']);
    }
    corpus = { source: 'postgres', databaseUrl: vars.DATABASE_URL, table: vars.QSIM_CORPUS_TABLE };
  } else {
    corpus = { source: 'file', file: vars.QSIM_CORPUS_FILE };
  }

  return {
    corpus,
    embedder: {
      kind: vars.QSIM_EMBEDDER,
      model: vars.QSIM_EMBEDDING_MODEL,
    },
    similarity: {
      threshold: vars.QSIM_THRESHOLD,
      topK: vars.QSIM_TOP_K,
      excludeExact: vars.QSIM_EXCLUDE_EXACT,
    },
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      baseURL: vars.OPENAI_BASE_URL,
      chatModel: vars.QSIM_LLM_MODEL,
    },
    logLevel: vars.QSIM_LOG_LEVEL,
  };
}
