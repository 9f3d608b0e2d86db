/**
 * Gateway to the text-completion service.
 *
 * One call, one outcome: raw text, or a classified failure. Retrying is
 * the orchestrator's job, so the HTTP client is built with zero retries.
 * A user abort is the one failure that is not classified; it is thrown
 * so the orchestrator can stop the stage.
 */

import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from 'openai';
import type { AppConfig } from '../config/index.js';
import { PipelineAbortedError } from '../runner/errors.js';

export type GatewayErrorKind = 'network' | 'service' | 'empty';

export interface ClassifiedError {
  kind: GatewayErrorKind;
  message: string;
  status?: number;
}

export type GatewayOutcome =
  | { ok: true; text: string }
  | { ok: false; error: ClassifiedError };

export interface SendOptions {
  timeoutMs: number;
  maxTokens: number;
  signal?: AbortSignal;
}

export interface InferenceGateway {
  send(prompt: string, options: SendOptions): Promise<GatewayOutcome>;
}

/**
 * Transport seam: returns the completion text (possibly null/empty) or
 * throws the SDK's error types.
 */
export type CompletionFn = (prompt: string, options: SendOptions) => Promise<string | null | undefined>;

/**
 * Map a thrown transport error onto the gateway taxonomy.
 * Returns null for user aborts, which are not gateway failures.
 */
export function classifyGatewayError(err: unknown): ClassifiedError | null {
  if (err instanceof APIUserAbortError) return null;
  if (err instanceof APIConnectionTimeoutError) {
    return { kind: 'network', message: 'request timed out' };
  }
  if (err instanceof APIConnectionError) {
    return { kind: 'network', message: err.message || 'connection error' };
  }
  if (err instanceof APIError) {
    return { kind: 'service', message: err.message, ...(err.status !== undefined && { status: err.status }) };
  }
  if (err instanceof Error && err.name === 'AbortError') return null;
  if (err instanceof Error) return { kind: 'network', message: err.message };
  return { kind: 'network', message: String(err) };
}

export class CompletionGateway implements InferenceGateway {
  constructor(private readonly complete: CompletionFn) {}

  async send(prompt: string, options: SendOptions): Promise<GatewayOutcome> {
    let text: string | null | undefined;
    try {
      text = await this.complete(prompt, options);
    } catch (err) {
      const classified = classifyGatewayError(err);
      if (!classified) throw new PipelineAbortedError();
      return { ok: false, error: classified };
    }

    if (!text || text.trim() === '') {
      return { ok: false, error: { kind: 'empty', message: 'service returned no content' } };
    }
    return { ok: true, text };
  }
}

/**
 * Chat-completions transport over the `openai` SDK, pointed at any
 * OpenAI-compatible endpoint (the Hugging Face router by default).
 */
export function createOpenAICompletion(
  config: Pick<AppConfig, 'apiKey' | 'baseUrl' | 'model' | 'temperature' | 'timeoutMs'>,
): CompletionFn {
  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    maxRetries: 0,
    timeout: config.timeoutMs,
  });

  return async (prompt, options) => {
    const response = await client.chat.completions.create(
      {
        model: config.model,
        messages: [{ role: 'user', content: prompt }],
        max_tokens: options.maxTokens,
        temperature: config.temperature,
      },
      { timeout: options.timeoutMs, signal: options.signal, maxRetries: 0 },
    );
    return response.choices[0]?.message.content;
  };
}

export function createGateway(config: AppConfig): InferenceGateway {
  return new CompletionGateway(createOpenAICompletion(config));
}
