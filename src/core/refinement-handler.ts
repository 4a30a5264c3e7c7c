import { z } from 'zod';
import type { LLM } from '../ports/LLM';
import { type Logger, silentLogger } from '../logger';
import { parseJsonReply } from './llm-json';

export interface RefinementResult {
  refinedQuestion: string;
  changesMade: string;
  reasoning: string;
}

const refinementReplySchema = z.object({
  refined_question: z.string().trim().min(1),
  changes_made: z.string(),
  reasoning: z.string().default(''),
});

const systemPrompt = `You copy-edit mathematics questions. Improve grammar, wording and notation so the question reads clearly and means exactly one thing.

Keep the mathematics untouched: same content, same difficulty, same kind of question (proof, computation, explanation). Do not add facts or drop details.

Reply with one JSON object and nothing else:
{"refined_question": "the edited question", "changes_made": "what you changed", "reasoning": "why the edit reads better"}`;

export class RefinementHandler {
  constructor(private readonly llm: LLM, private readonly logger: Logger = silentLogger) {}

  async run(question: string): Promise<RefinementResult> {
    try {
      const reply = await this.llm.generateCompletion([
        { role: 'system', content: systemPrompt },
        { role: 'user', content: `Question: ${question}` }
      ], { temperature: 0.3, json: true });

      const result = parseJsonReply(reply, refinementReplySchema);
      return {
        refinedQuestion: result.refined_question,
        changesMade: result.changes_made,
        reasoning: result.reasoning,
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`❌ Refinement error: ${reason}`);
      return {
        refinedQuestion: question,
        changesMade: 'Refinement was unavailable; the original question is kept.',
        reasoning: `Error: ${reason}`,
      };
    }
  }
}
