import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';

/**
 * Anything that turns a prompt into text. The agent loop only needs this,
 * which keeps it testable without the network.
 */
export interface TextGenerator {
  generate(prompt: string, systemInstruction?: string): Promise<string>;
}

/**
 * Gemini AI Client Configuration
 */
export interface GeminiClientConfig {
  /** Google AI API key */
  apiKey: string;
  /** Model to use (default: gemini-2.0-flash) */
  model?: string;
  /** Sampling temperature (default: 0.2) */
  temperature?: number;
}

/**
 * Gemini AI Client
 *
 * Wrapper around Google's Generative AI SDK. Replies are plain text: the
 * agent loop decides whether a reply is a tool call or a final answer.
 */
export class GeminiClient implements TextGenerator {
  private client: GoogleGenerativeAI;
  private model: GenerativeModel;
  private modelName: string;

  constructor(config: GeminiClientConfig) {
    this.client = new GoogleGenerativeAI(config.apiKey);
    this.modelName = config.model ?? DEFAULT_GEMINI_MODEL;

    this.model = this.client.getGenerativeModel({
      model: this.modelName,
      generationConfig: {
        temperature: config.temperature ?? 0.2,
        topP: 0.8,
        topK: 40,
        maxOutputTokens: 2048,
      },
    });
  }

  /**
   * Generate content with the configured model
   *
   * Includes automatic retry with exponential backoff for transient errors
   * (503 Service Unavailable, 429 Rate Limited).
   *
   * @param prompt - The prompt to send to Gemini
   * @param systemInstruction - Optional system instruction (prepended to prompt)
   * @returns Generated text response
   */
  async generate(prompt: string, systemInstruction?: string): Promise<string> {
    const fullPrompt = systemInstruction
      ? `${systemInstruction}\n\n${prompt}`
      : prompt;

    const maxRetries = 3;

    for (let attempt = 1; ; attempt++) {
      try {
        const result = await this.model.generateContent(fullPrompt);
        return result.response.text();
      } catch (error) {
        if (!isRetryableError(error) || attempt >= maxRetries) {
          throw error;
        }

        // Exponential backoff: 1s, 2s, 4s
        const delay = Math.pow(2, attempt - 1) * 1000;
        console.error(
          `[GeminiClient] Retrying after ${delay}ms (attempt ${attempt}/${maxRetries})`
        );
        await sleep(delay);
      }
    }
  }

  /**
   * Get the model name being used
   */
  getModelName(): string {
    return this.modelName;
  }
}

/**
 * Check if an error is retryable (transient server error)
 */
export function isRetryableError(error: unknown): boolean {
  if (error && typeof error === 'object' && 'status' in error) {
    return error.status === 503 || error.status === 429;
  }
  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create Gemini client from environment variables
 * (GOOGLE_AI_API_KEY, optional GEMINI_MODEL)
 */
export function createGeminiClient(env: NodeJS.ProcessEnv = process.env): GeminiClient {
  const apiKey = env['GOOGLE_AI_API_KEY'];

  if (!apiKey) {
    throw new Error('Missing required environment variable: GOOGLE_AI_API_KEY');
  }

  return new GeminiClient({ apiKey, model: env['GEMINI_MODEL'] || undefined });
}
