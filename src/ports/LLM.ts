export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string };

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  /** Ask the model to answer with a single JSON object. */
  json?: boolean;
}

export interface LLM {
  generateCompletion: (messages: ChatMessage[], options?: CompletionOptions) => Promise<string>;
}
