import { GoogleGenerativeAI, GenerativeModel } from '@google/generative-ai';
import { getConfig } from '../utils/config';
import { OracleUnavailableError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('GeminiClient');

export interface GeminiClientOptions {
  apiKey?: string;
  model?: string;
  maxRetries?: number;
  retryDelay?: number;
  timeout?: number;
}

/**
 * Gemini API client shared by the oracle adapters.
 * Owns the timeout and retry policy; callers see text or OracleUnavailableError.
 */
export class GeminiClient {
  private model: GenerativeModel | null = null;
  private readonly maxRetries: number;
  private readonly retryDelay: number;
  private readonly timeout: number;

  constructor(options: GeminiClientOptions = {}) {
    const config = getConfig().gemini;
    const apiKey = options.apiKey ?? config.apiKey;

    this.maxRetries = options.maxRetries ?? config.maxRetries;
    this.retryDelay = options.retryDelay ?? config.retryDelay;
    this.timeout = options.timeout ?? config.timeout;

    if (apiKey) {
      const genAI = new GoogleGenerativeAI(apiKey);
      this.model = genAI.getGenerativeModel({ model: options.model ?? config.model });
    }
  }

  isAvailable(): boolean {
    return this.model !== null;
  }

  async generateText(prompt: string, temperature: number): Promise<string> {
    const model = this.model;
    if (!model) {
      throw new OracleUnavailableError('Gemini', 'API key not configured');
    }

    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        return await this.callWithTimeout(model, prompt, temperature);
      } catch (error) {
        lastError = error;
        logger.warn(`Gemini call failed (attempt ${attempt}/${this.maxRetries})`, {
          error: errorMessage(error),
        });

        if (attempt < this.maxRetries) {
          // Exponential backoff
          await this.sleep(this.retryDelay * Math.pow(2, attempt - 1));
        }
      }
    }

    throw new OracleUnavailableError('Gemini', errorMessage(lastError ?? 'no attempts made'));
  }

  private async callWithTimeout(model: GenerativeModel, prompt: string, temperature: number): Promise<string> {
    let timeoutId: NodeJS.Timeout | undefined;

    try {
      const result = await Promise.race([
        model.generateContent({
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          generationConfig: { temperature },
        }),
        new Promise<never>((_, reject) => {
          timeoutId = setTimeout(() => reject(new Error('Request timeout')), this.timeout);
        }),
      ]);

      const text = result.response.text().trim();
      if (!text) {
        throw new Error('Empty response');
      }
      return text;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
