import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { CorpusSource, QuestionRecord } from '../ports/CorpusSource';
import { parseCorpus } from '../core/corpus';
import { type Logger, silentLogger } from '../logger';

export interface JsonFileCorpusSourceOptions {
  baseDir?: string;
  logger?: Logger;
}

/**
 * Reads the corpus from a JSON array on disk. The configured path is tried
 * first, then `question.json` and `questions.json` in the base directory.
 * A missing or unreadable file yields an empty corpus.
 */
export class JsonFileCorpusSource implements CorpusSource {
  private readonly candidates: string[];
  private readonly logger: Logger;

  constructor(private readonly filePath: string, options: JsonFileCorpusSourceOptions = {}) {
    const baseDir = options.baseDir ?? process.cwd();
    this.logger = options.logger ?? silentLogger;
    this.candidates = [
      path.resolve(baseDir, filePath),
      path.resolve(baseDir, 'question.json'),
      path.resolve(baseDir, 'questions.json'),
    ].filter((candidate, index, all) => all.indexOf(candidate) === index);
  }

  get description(): string {
    return `file:${this.filePath}`;
  }

  private async findExisting(): Promise<string | null> {
    for (const candidate of this.candidates) {
      try {
        const stats = await fs.stat(candidate);
        if (stats.isFile()) return candidate;
      } catch (error) {
        if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
          this.logger.warn(`⚠️  Cannot read ${candidate}: ${error instanceof Error ? error.message : 'Unknown error'}`);
        }
      }
    }
    return null;
  }

  async load(): Promise<readonly QuestionRecord[]> {
    const filePath = await this.findExisting();
    if (!filePath) {
      this.logger.warn(`⚠️  Questions file not found (tried ${this.candidates.join(', ')}), using an empty corpus`);
      return [];
    }

    this.logger.info(`📂 Loading questions from ${filePath}`);

    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    } catch (error) {
      this.logger.error(`❌ Error loading questions from ${path.basename(filePath)}: ${error instanceof Error ? error.message : 'Unknown error'}`);
      return [];
    }

    if (!Array.isArray(raw)) {
      this.logger.error(`❌ ${path.basename(filePath)} does not contain a JSON array of questions`);
      return [];
    }

    const records = parseCorpus(raw, this.logger);
    this.logger.info(`📄 Loaded ${records.length} of ${raw.length} questions`);
    return records;
  }

  async close(): Promise<void> {}
}
