import { logger } from '../utils/logger.js';

export interface LanguageModel {
  /** Cheap reachability check; callers skip the model when this is false. */
  isAvailable(): Promise<boolean>;
  /** Returns the completion text, or '' when the call failed. */
  complete(prompt: string): Promise<string>;
}

export interface OllamaOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  temperature?: number;
  numCtx?: number;
}

interface GenerateResponse {
  response: string;
}

function isGenerateResponse(value: unknown): value is GenerateResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'response' in value &&
    typeof value.response === 'string'
  );
}

/**
 * Client for a local Ollama server (`/api/generate`, non-streaming).
 * Availability is probed once per client through `/api/tags`.
 */
export class OllamaClient implements LanguageModel {
  private available: boolean | null = null;

  constructor(private readonly options: OllamaOptions) {}

  async isAvailable(): Promise<boolean> {
    if (this.available !== null) return this.available;

    try {
      const response = await fetch(`${this.options.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(3000),
      });
      this.available = response.ok;
    } catch (error) {
      logger.debug(`Ollama not reachable at ${this.options.baseUrl}: ${error}`);
      this.available = false;
    }

    if (!this.available) {
      logger.info('Local language model unavailable; classifier strategies will be skipped');
    }
    return this.available;
  }

  async complete(prompt: string): Promise<string> {
    try {
      const response = await fetch(`${this.options.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.options.model,
          prompt,
          stream: false,
          options: {
            temperature: this.options.temperature ?? 0.1,
            num_ctx: this.options.numCtx ?? 8192,
          },
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (!response.ok) {
        logger.warn(`Ollama returned HTTP ${response.status}`);
        return '';
      }

      const body: unknown = await response.json();
      return isGenerateResponse(body) ? body.response.trim() : '';
    } catch (error) {
      logger.warn(`Ollama request failed: ${error}`);
      return '';
    }
  }
}

/** Stand-in used when the model is disabled by configuration. */
export const disabledLanguageModel: LanguageModel = {
  isAvailable: async () => false,
  complete: async () => '',
};
