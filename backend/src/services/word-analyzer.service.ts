import OpenAI from 'openai';
import {
  getAnalysisMaxRetries,
  getAnalysisModel,
  getAnalysisRetryDelayMs,
  getAnalysisTimeoutMs,
  getOpenAIApiKey,
} from '../config/env';
import { HttpError } from '../utils/http';
import { logger } from '../utils/logger';
import { withRetry } from '../utils/retry';
import { ANALYSIS_SYSTEM_PROMPT, buildAnalysisPrompt, cleanAnalysisText } from './analysis-prompt';

export interface WordAnalyzer {
  analyze(word: string, templateContent: string): Promise<string>;
}

/**
 * Produces a Markdown analysis of a word through the OpenAI chat API.
 * The client is created on first use so the service starts without a key.
 */
export class OpenAIWordAnalyzer implements WordAnalyzer {
  private client: OpenAI | null = null;

  private getClient(): OpenAI {
    if (!this.client) {
      const apiKey = getOpenAIApiKey();
      if (!apiKey) {
        throw new HttpError(503, 'OPENAI_API_KEY is not set.');
      }
      this.client = new OpenAI({ apiKey });
    }
    return this.client;
  }

  async analyze(word: string, templateContent: string): Promise<string> {
    const client = this.getClient();
    const attempts = getAnalysisMaxRetries();
    const prompt = buildAnalysisPrompt(word, templateContent);
    const retryDelayMs = getAnalysisRetryDelayMs();

    try {
      return await withRetry(
        async () => {
          const response = await client.chat.completions.create(
            {
              model: getAnalysisModel(),
              messages: [
                { role: 'system', content: ANALYSIS_SYSTEM_PROMPT },
                { role: 'user', content: prompt },
              ],
            },
            { timeout: getAnalysisTimeoutMs(), maxRetries: 0 }
          );
          const analysis = cleanAnalysisText(response.choices[0]?.message?.content ?? '');
          if (!analysis) {
            throw new Error('Empty completion');
          }
          return analysis;
        },
        {
          attempts,
          baseDelayMs: retryDelayMs,
          maxDelayMs: retryDelayMs,
          backoffFactor: 1,
          isRetryable: () => true,
          onRetry: (err, attempt) => {
            logger.error(`OpenAI analysis request failed (attempt ${attempt}/${attempts})`, {
              word,
              error: err instanceof Error ? err.message : String(err),
            });
          },
        }
      );
    } catch (error) {
      logger.error('OpenAI analysis request failed', {
        word,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new HttpError(502, `Analysis request failed after ${attempts} attempts.`);
    }
  }
}

export const wordAnalyzer: WordAnalyzer = new OpenAIWordAnalyzer();
