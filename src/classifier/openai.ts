import OpenAI from 'openai';
import { z } from 'zod';
import { getConfig } from '../config.js';
import {
  ClassificationDegraded,
  ClassifierAuthError,
  ClassifierRequestError,
  ClassifierTransientError,
  describeError,
  httpStatusOf,
} from '../errors.js';
import { getLogger, type Logger } from '../logger.js';
import { AbortedError, BackoffPolicy, RetryExhaustedError } from '../retry/backoff.js';
import type { Taxonomy } from '../taxonomy/taxonomy.js';
import { buildClassifyPrompt, buildSystemPrompt } from './prompts.js';
import type { Classification, Classifier } from './types.js';

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const TRANSIENT_STATUS = new Set([408, 409, 429]);
const AUTH_STATUS = new Set([401, 403]);

const responseSchema = z.object({ category: z.string().min(1) });

export function isTransientClassifierError(err: unknown): boolean {
  if (err instanceof AbortedError) return false;
  const status = httpStatusOf(err);
  // No status means the request never got an HTTP answer (timeout, DNS, reset)
  if (status === undefined) return true;
  return TRANSIENT_STATUS.has(status) || status >= 500;
}

function translateError(err: unknown): Error {
  if (err instanceof AbortedError) return err;
  const status = httpStatusOf(err);
  if (status !== undefined && AUTH_STATUS.has(status)) {
    return new ClassifierAuthError(`Classifier rejected credentials (status ${status})`, err);
  }
  if (isTransientClassifierError(err)) {
    return new ClassifierTransientError(`Classifier unavailable: ${describeError(err)}`, err);
  }
  return new ClassifierRequestError(
    `Classifier rejected the request (status ${status ?? 'unknown'}): ${describeError(err)}`,
    err,
  );
}

export interface OpenAIClassifierOptions {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  backoff?: BackoffPolicy;
  logger?: Logger;
  /** Per-request timeout; each retry attempt gets its own. */
  requestTimeoutMs?: number;
}

export class OpenAIClassifier implements Classifier {
  private client: OpenAI;
  private model: string;
  private requestTimeoutMs: number;
  private backoff: BackoffPolicy;
  private logger: Logger;
  private systemPromptCache = new WeakMap<Taxonomy, string>();

  constructor(options?: OpenAIClassifierOptions) {
    const config = getConfig();
    const apiKey = options?.apiKey ?? config.openaiApiKey;
    const baseUrl = options?.baseUrl ?? config.openaiBaseUrl;
    this.client = new OpenAI({
      apiKey,
      ...(baseUrl ? { baseURL: baseUrl } : {}),
      // Retries are owned by the backoff policy
      maxRetries: 0,
    });
    this.model = options?.model ?? config.openaiModel;
    this.requestTimeoutMs = options?.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = options?.logger ?? getLogger();
    this.backoff = (
      options?.backoff ??
      new BackoffPolicy({ maxAttempts: config.retryMaxAttempts, baseDelayMs: config.retryBaseDelayMs })
    ).with({
      isRetryable: isTransientClassifierError,
      onRetry: (err, attempt, delay) =>
        this.logger.warn(
          `Classifier call failed (attempt ${attempt}, status ${httpStatusOf(err) ?? 'none'}). Retrying in ${delay}ms...`,
        ),
    });
  }

  async classify(text: string, taxonomy: Taxonomy, signal?: AbortSignal): Promise<Classification> {
    if (!text.trim()) {
      throw new ClassifierRequestError('Cannot classify an empty item');
    }

    let raw: string;
    try {
      raw = await this.backoff.execute(
        () => this.complete(this.systemPromptFor(taxonomy), buildClassifyPrompt(text), signal),
        signal,
      );
    } catch (err) {
      if (signal?.aborted) throw new AbortedError();
      if (err instanceof RetryExhaustedError) {
        return this.degrade(
          taxonomy,
          `classifier unavailable after ${err.attempts} attempt(s): ${describeError(err.lastError)}`,
          err.lastError,
        );
      }
      throw translateError(err);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      return this.degrade(taxonomy, `classifier returned non-JSON output`, err);
    }

    const result = responseSchema.safeParse(parsed);
    if (!result.success) {
      return this.degrade(taxonomy, `classifier response had no category field`);
    }

    const category = taxonomy.resolve(result.data.category);
    if (!category) {
      return this.degrade(taxonomy, `classifier answered unknown category "${result.data.category}"`);
    }
    return { category };
  }

  async ping(): Promise<void> {
    try {
      await this.client.models.retrieve(this.model, { timeout: this.requestTimeoutMs });
    } catch (err) {
      throw translateError(err);
    }
  }

  private systemPromptFor(taxonomy: Taxonomy): string {
    let prompt = this.systemPromptCache.get(taxonomy);
    if (!prompt) {
      prompt = buildSystemPrompt(taxonomy);
      this.systemPromptCache.set(taxonomy, prompt);
    }
    return prompt;
  }

  private degrade(taxonomy: Taxonomy, reason: string, cause?: unknown): Classification {
    return {
      category: taxonomy.fallback(),
      degraded: new ClassificationDegraded(reason, cause),
    };
  }

  private async complete(systemPrompt: string, userMessage: string, signal?: AbortSignal): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userMessage },
        ],
        temperature: 0,
        response_format: { type: 'json_object' },
      },
      { signal, timeout: this.requestTimeoutMs },
    );

    return response.choices[0]?.message?.content ?? '{}';
  }
}
