import { z } from 'zod';
import type { LLM } from '../ports/LLM';
import { type Logger, silentLogger } from '../logger';
import { parseJsonReply } from './llm-json';

export interface ValidationResult {
  isValid: boolean;
  message: string;
  reasoning: string;
  suggestions: string;
}

const validationReplySchema = z.object({
  is_valid: z.boolean(),
  reasoning: z.string(),
  suggestions: z.string().default(''),
});

export const MIN_QUESTION_LENGTH = 10;

const systemPrompt = `You review inputs submitted to a bank of mathematics questions and decide whether each one is a genuine mathematical question.

Accept input that asks something mathematical: a computation, a proof, a definition or concept, a problem to solve. It should be understandable as written.

Reject small talk, questions about other subjects, requests that are not questions, and bare expressions such as "2+2" that carry no question.

Reply with one JSON object and nothing else:
{"is_valid": boolean, "reasoning": "one or two sentences", "suggestions": "how to turn the input into a valid question, or an empty string when it is valid"}`;

export class ValidationHandler {
  constructor(private readonly llm: LLM, private readonly logger: Logger = silentLogger) {}

  async run(input: string): Promise<ValidationResult> {
    try {
      const reply = await this.llm.generateCompletion([
        { role: 'system', content: systemPrompt },
        { role: 'user', content: `Input: ${input}` }
      ], { temperature: 0.1, json: true });

      const result = parseJsonReply(reply, validationReplySchema);

      return {
        isValid: result.is_valid,
        message: result.is_valid
          ? '✓ Your question is valid! Moving on to refinement.'
          : `✗ This does not look like a mathematical question. ${result.suggestions}`.trim(),
        reasoning: result.reasoning,
        suggestions: result.is_valid ? '' : result.suggestions,
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`❌ Validation error: ${reason}`);

      if (input.trim().length < MIN_QUESTION_LENGTH) {
        return {
          isValid: false,
          message: 'Input is too short. Please provide a complete mathematical question.',
          reasoning: 'Input length check failed',
          suggestions: '',
        };
      }

      this.logger.warn(`⚠️  Validation unavailable, accepting the question: ${reason}`);
      return {
        isValid: true,
        message: 'Question received (validation was unavailable, proceeding anyway).',
        reasoning: 'Fallback validation',
        suggestions: '',
      };
    }
  }
}
