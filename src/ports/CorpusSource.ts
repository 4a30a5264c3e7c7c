export interface QuestionRecord {
  readonly id: number;
  readonly text: string;
  readonly domain: string;
  readonly subdomain: string;
}

export interface CorpusSource {
  readonly description: string;
  load(): Promise<readonly QuestionRecord[]>;
  close(): Promise<void>;
}
