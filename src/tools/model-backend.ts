/**
 * Model Backend
 * Gemini text generation behind a minimal interface, with retries
 */

import { ApiError, GoogleGenAI } from '@google/genai';
import {
  BackendTransportError,
  BackendUnavailableError,
  BackendUnexpectedResponseError,
  errorMessage,
} from '../errors.js';
import { RetryExhaustedError, sleep, withRetry, type RetryPolicy, type Sleep } from '../retry.js';

export interface ModelBackend {
  generate(systemInstruction: string, userInstruction: string): Promise<string>;
}

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

/**
 * Server errors, rate limiting, and transport failures without an HTTP status
 * are retried; other statuses and malformed responses are not.
 */
export function isRetryableBackendError(error: unknown): boolean {
  if (error instanceof BackendUnexpectedResponseError) return false;
  if (error instanceof BackendTransportError) {
    return error.status === undefined || RETRYABLE_STATUSES.has(error.status);
  }
  return false;
}

export interface GeminiBackendOptions {
  apiKey: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  retry: Pick<RetryPolicy, 'maxAttempts' | 'baseDelayMs'>;
  /** Overrides the backoff wait */
  sleep?: Sleep;
}

export class GeminiBackend implements ModelBackend {
  private readonly ai: GoogleGenAI;
  private readonly policy: RetryPolicy;
  private readonly wait: Sleep;

  constructor(private readonly options: GeminiBackendOptions) {
    this.ai = new GoogleGenAI({
      apiKey: options.apiKey,
      httpOptions: { timeout: options.timeoutMs },
    });
    this.policy = {
      maxAttempts: options.retry.maxAttempts,
      baseDelayMs: options.retry.baseDelayMs,
      backoffMultiplier: 2,
      isRetryable: isRetryableBackendError,
    };
    this.wait = options.sleep ?? sleep;
  }

  async generate(systemInstruction: string, userInstruction: string): Promise<string> {
    console.log(`  🤖 Querying ${this.options.model}: ${userInstruction.substring(0, 50)}...`);

    try {
      return await withRetry(() => this.callOnce(systemInstruction, userInstruction), this.policy, this.wait);
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new BackendUnavailableError(error.attempts, error.lastError);
      }
      throw error;
    }
  }

  private async callOnce(systemInstruction: string, userInstruction: string): Promise<string> {
    let text: string | undefined;
    try {
      const response = await this.ai.models.generateContent({
        model: this.options.model,
        contents: userInstruction,
        config: {
          systemInstruction,
          temperature: this.options.temperature,
        },
      });
      text = response.text;
    } catch (error) {
      if (error instanceof ApiError) {
        throw new BackendTransportError(`Model API returned HTTP ${error.status}: ${error.message}`, error.status, {
          cause: error,
        });
      }
      throw new BackendTransportError(`Error calling model API: ${errorMessage(error)}`, undefined, { cause: error });
    }

    if (!text || text.trim() === '') {
      throw new BackendUnexpectedResponseError('Unexpected API response format: no text in the first candidate');
    }
    console.log('  ✓ Model call successful');
    return text;
  }
}
