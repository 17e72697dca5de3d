import {
  BedrockRuntimeClient,
  ConverseCommand,
  InvokeModelCommand,
  type ContentBlock,
  type ConverseCommandInput,
  type Message,
  type TokenUsage,
} from '@aws-sdk/client-bedrock-runtime';
import { z } from 'zod';
import type { SimilarityBackend } from '../memory/context-index';
import { describeError, GenerationFailure } from './errors';
import type {
  ChatMessage,
  GenerationBackend,
  GenerationModelConfig,
  GenerationStep,
  StructuredRequest,
  TextRequest,
} from './generation-state';
import { logger as defaultLogger, type Logger } from './logger';

// ============================================
// Transport
//
// The narrow slice of the Bedrock runtime the game uses. Tests swap in a
// fake; production wraps a BedrockRuntimeClient.
// ============================================

export interface ConverseReply {
  text: string;
  usage?: TokenUsage;
}

export interface BedrockTransport {
  converse(input: ConverseCommandInput): Promise<ConverseReply>;
  /** InvokeModel with a JSON body; resolves to the parsed JSON response */
  invokeJson(modelId: string, body: unknown): Promise<unknown>;
}

export function createBedrockTransport(client: BedrockRuntimeClient = new BedrockRuntimeClient({})): BedrockTransport {
  return {
    async converse(input) {
      const response = await client.send(new ConverseCommand(input));
      return { text: extractText(response.output?.message?.content), usage: response.usage };
    },
    async invokeJson(modelId, body) {
      const response = await client.send(
        new InvokeModelCommand({
          modelId,
          contentType: 'application/json',
          accept: 'application/json',
          body: JSON.stringify(body),
        }),
      );
      return JSON.parse(response.body.transformToString());
    },
  };
}

/** Env-var fallback when no config is provided at all */
const DEFAULT_MODEL_ID = process.env.BEDROCK_DEFAULT_MODEL_ID ?? 'us.anthropic.claude-haiku-4-5-20251001-v1:0';

export const DEFAULT_EMBEDDING_MODEL_ID = 'amazon.titan-embed-text-v2:0';

// ============================================
// Model Shortcuts (US inference profiles)
// ============================================

/** Short names -> full Bedrock inference profile IDs. */
export const MODEL_SHORTCUTS: Record<string, string> = {
  haiku: 'us.anthropic.claude-haiku-4-5-20251001-v1:0',
  sonnet: 'us.anthropic.claude-sonnet-4-5-20250929-v1:0',
  sonnet4: 'us.anthropic.claude-sonnet-4-20250514-v1:0',
  opus: 'us.anthropic.claude-opus-4-6-v1',
  opus45: 'us.anthropic.claude-opus-4-5-20251101-v1:0',
  opus41: 'us.anthropic.claude-opus-4-1-20250805-v1:0',
};

function expandModelId(idOrShortcut: string): string {
  const lower = idOrShortcut.toLowerCase().trim();
  return MODEL_SHORTCUTS[lower] ?? idOrShortcut;
}

// ============================================
// Model Resolution
// ============================================

/**
 * Resolve which Bedrock model ID to use for a given generation step.
 *
 * Priority (highest first):
 *   1. Per-step override in modelConfig.steps[stepName]
 *   2. modelConfig.default
 *   3. BEDROCK_DEFAULT_MODEL_ID env var
 *   4. Hard-coded fallback (Claude Haiku 4.5)
 *
 * Both full inference profile IDs and shortcuts (e.g. "haiku", "sonnet") are accepted.
 */
export function resolveModelId(
  stepName: GenerationStep,
  modelConfig?: GenerationModelConfig,
): string {
  const raw =
    modelConfig?.steps?.[stepName]
    ?? modelConfig?.default
    ?? DEFAULT_MODEL_ID;
  return expandModelId(raw);
}

// ============================================
// callModel: structured JSON generation
// ============================================

export interface CallModelOptions {
  /** Generation step, for model resolution and logging */
  stepName: GenerationStep;
  /** System prompt providing context and instructions */
  systemPrompt: string;
  /** User message with the specific generation request */
  userPrompt: string;
  modelConfig?: GenerationModelConfig;
  /** Max tokens for the response. Defaults to 4096. */
  maxTokens?: number;
  /** Temperature. Defaults to 0.7 for creative generation. */
  temperature?: number;
  /** Number of retry attempts for malformed JSON. Defaults to 2. */
  maxRetries?: number;
}

export interface CallModelResult<T> {
  /** The parsed JSON response */
  data: T;
  /** The model ID that was actually used */
  modelId: string;
  /** Raw text response from the model (for debugging) */
  rawText: string;
  /** The model's reasoning/preamble before the JSON (if any) */
  reasoning: string;
}

/**
 * Call a Bedrock model and parse the response as JSON.
 *
 * The model may reason before producing JSON; the preamble is captured and
 * logged separately. On malformed or invalid JSON the function retries with an
 * error-correcting follow-up message up to `maxRetries` times.
 *
 * @param validate - Validates and returns the parsed data (e.g. Zod .parse())
 */
export async function callModel<T>(
  transport: BedrockTransport,
  options: CallModelOptions,
  validate: (raw: unknown) => T,
  log: Logger = defaultLogger,
): Promise<CallModelResult<T>> {
  const {
    stepName,
    systemPrompt,
    userPrompt,
    modelConfig,
    maxTokens = 4096,
    temperature = 0.7,
    maxRetries = 2,
  } = options;

  const modelId = resolveModelId(stepName, modelConfig);

  const messages: Message[] = [
    {
      role: 'user',
      content: [{ text: userPrompt }],
    },
  ];

  let lastError: Error | undefined;
  let rawText = '';

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const reply = await converse(transport, {
      modelId,
      system: [{ text: systemPrompt }],
      messages,
      inferenceConfig: { maxTokens, temperature },
    }, stepName);
    rawText = reply.text;

    const { reasoning, jsonStr } = splitReasoningAndJson(rawText);

    logCall(log, {
      stepName,
      modelId,
      attempt: attempt + 1,
      maxAttempts: maxRetries + 1,
      latencyMs: reply.latencyMs,
      usage: reply.usage,
      reasoning,
      rawText,
    });

    try {
      const parsed: unknown = JSON.parse(jsonStr);
      const data = validate(parsed);
      return { data, modelId, rawText, reasoning };
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      log.warn('structured_output_rejected', {
        step: stepName,
        attempt: `${attempt + 1}/${maxRetries + 1}`,
        error: lastError.message,
      });

      if (attempt < maxRetries) {
        // Add the model's failed response and a correction request
        messages.push(
          {
            role: 'assistant',
            content: [{ text: rawText }],
          },
          {
            role: 'user',
            content: [
              {
                text: `Your previous response was not valid JSON or failed validation. Error: ${lastError.message}\n\nPlease try again. Think through the fix briefly, then provide the corrected JSON.`,
              },
            ],
          },
        );
      }
    }
  }

  throw new GenerationFailure(
    stepName,
    `structured output failed after ${maxRetries + 1} attempts using model "${modelId}". ` +
    `Last error: ${lastError?.message}. Last raw response: ${rawText.slice(0, 500)}`,
    { cause: lastError },
  );
}

// ============================================
// callText: free-form dialogue and narration
// ============================================

export interface CallTextOptions {
  stepName: GenerationStep;
  systemPrompt: string;
  messages: ChatMessage[];
  modelConfig?: GenerationModelConfig;
  /** Defaults to 1024. */
  maxTokens?: number;
  /** Defaults to 0.8. */
  temperature?: number;
}

/** Single Converse call returning trimmed text. Empty replies are failures. */
export async function callText(
  transport: BedrockTransport,
  options: CallTextOptions,
  log: Logger = defaultLogger,
): Promise<string> {
  const { stepName, systemPrompt, modelConfig, maxTokens = 1024, temperature = 0.8 } = options;
  const modelId = resolveModelId(stepName, modelConfig);

  const reply = await converse(transport, {
    modelId,
    system: [{ text: systemPrompt }],
    messages: toConverseMessages(options.messages),
    inferenceConfig: { maxTokens, temperature },
  }, stepName);

  logCall(log, {
    stepName,
    modelId,
    attempt: 1,
    maxAttempts: 1,
    latencyMs: reply.latencyMs,
    usage: reply.usage,
    reasoning: '',
    rawText: reply.text,
  });

  const text = reply.text.trim();
  if (!text) {
    throw new GenerationFailure(stepName, `model "${modelId}" returned an empty response`);
  }
  return text;
}

/**
 * Converse requires the transcript to open with a user turn and to alternate
 * roles. Consecutive turns from one side are merged; a leading assistant turn
 * gets a short user opener in front of it.
 */
export function toConverseMessages(messages: readonly ChatMessage[]): Message[] {
  const merged: ChatMessage[] = [];
  for (const message of messages) {
    const previous = merged[merged.length - 1];
    if (previous && previous.role === message.role) {
      previous.content = `${previous.content}\n\n${message.content}`;
    } else {
      merged.push({ ...message });
    }
  }

  if (merged.length === 0 || merged[0].role !== 'user') {
    merged.unshift({ role: 'user', content: 'Begin.' });
  }

  return merged.map((message) => ({
    role: message.role,
    content: [{ text: message.content }],
  }));
}

// ============================================
// Backend
// ============================================

export interface BedrockBackendOptions {
  modelConfig?: GenerationModelConfig;
  maxRetries?: number;
  logger?: Logger;
}

export class BedrockGenerationBackend implements GenerationBackend {
  readonly #transport: BedrockTransport;
  readonly #modelConfig?: GenerationModelConfig;
  readonly #maxRetries?: number;
  readonly #logger: Logger;

  constructor(transport: BedrockTransport, options: BedrockBackendOptions = {}) {
    this.#transport = transport;
    this.#modelConfig = options.modelConfig;
    this.#maxRetries = options.maxRetries;
    this.#logger = options.logger ?? defaultLogger;
  }

  async generateStructured<T>(request: StructuredRequest<T>): Promise<T> {
    const { data } = await callModel(
      this.#transport,
      {
        stepName: request.step,
        systemPrompt: request.systemPrompt,
        userPrompt: request.userPrompt,
        modelConfig: this.#modelConfig,
        maxRetries: this.#maxRetries,
      },
      (raw) => request.schema.parse(raw),
      this.#logger,
    );
    return data;
  }

  generateText(request: TextRequest): Promise<string> {
    return callText(
      this.#transport,
      {
        stepName: request.step,
        systemPrompt: request.systemPrompt,
        messages: request.messages,
        modelConfig: this.#modelConfig,
      },
      this.#logger,
    );
  }
}

// ============================================
// Embeddings (Titan text embeddings)
// ============================================

const TitanEmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

export interface BedrockEmbeddingOptions {
  modelId?: string;
  /** Titan v2 accepts 256, 512 or 1024. Defaults to 512. */
  dimensions?: number;
}

/** Similarity backend for the context index, one InvokeModel call per text. */
export class BedrockEmbeddings implements SimilarityBackend {
  readonly #transport: BedrockTransport;
  readonly #modelId: string;
  readonly #dimensions: number;

  constructor(transport: BedrockTransport, options: BedrockEmbeddingOptions = {}) {
    this.#transport = transport;
    this.#modelId = options.modelId ?? DEFAULT_EMBEDDING_MODEL_ID;
    this.#dimensions = options.dimensions ?? 512;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (const inputText of texts) {
      const raw = await this.#transport.invokeJson(this.#modelId, {
        inputText,
        dimensions: this.#dimensions,
        normalize: true,
      });
      vectors.push(TitanEmbeddingResponseSchema.parse(raw).embedding);
    }
    return vectors;
  }
}

// ============================================
// Logging
// ============================================

interface LogCallParams {
  stepName: GenerationStep;
  modelId: string;
  attempt: number;
  maxAttempts: number;
  latencyMs: number;
  usage?: TokenUsage;
  reasoning: string;
  rawText: string;
}

const MAX_RAW_LOG_LENGTH = 5000;

function logCall(log: Logger, params: LogCallParams): void {
  const { stepName, modelId, attempt, maxAttempts, latencyMs, usage, reasoning, rawText } = params;

  log.info('bedrock_call', {
    step: stepName,
    model: modelId,
    attempt: `${attempt}/${maxAttempts}`,
    latencyMs,
    inputTokens: usage?.inputTokens ?? null,
    outputTokens: usage?.outputTokens ?? null,
    totalTokens: usage?.totalTokens ?? null,
  });

  if (reasoning) {
    log.debug('bedrock_reasoning', { step: stepName, reasoning });
  }

  log.debug('bedrock_raw_response', {
    step: stepName,
    truncated: rawText.length > MAX_RAW_LOG_LENGTH,
    rawText: rawText.length > MAX_RAW_LOG_LENGTH ? `${rawText.slice(0, MAX_RAW_LOG_LENGTH)}...` : rawText,
  });
}

// ============================================
// Helpers
// ============================================

/** Transport errors become GenerationFailure; latency is measured around the call. */
async function converse(
  transport: BedrockTransport,
  input: ConverseCommandInput,
  stepName: GenerationStep,
): Promise<ConverseReply & { latencyMs: number }> {
  const startMs = Date.now();
  try {
    const reply = await transport.converse(input);
    return { ...reply, latencyMs: Date.now() - startMs };
  } catch (err) {
    throw new GenerationFailure(stepName, `Bedrock request failed: ${describeError(err)}`, { cause: err });
  }
}

/** Extract text content from Bedrock Converse response content blocks */
function extractText(content?: ContentBlock[]): string {
  if (!content) return '';
  return content
    .map((block) => {
      if ('text' in block && typeof block.text === 'string') return block.text;
      return '';
    })
    .join('');
}

/**
 * Split a model response into reasoning preamble and JSON content.
 *
 * The model is encouraged to think before producing JSON. This function
 * finds the JSON portion and returns everything before it as reasoning.
 */
export function splitReasoningAndJson(text: string): { reasoning: string; jsonStr: string } {
  // Markdown-fenced JSON block; everything before the fence is reasoning
  const fenceMatch = text.match(/^([\s\S]*?)```(?:json)?\s*\n?([\s\S]*?)```/);
  if (fenceMatch) {
    return {
      reasoning: fenceMatch[1].trim(),
      jsonStr: fenceMatch[2].trim(),
    };
  }

  const objectStart = text.indexOf('{');
  const arrayStart = text.indexOf('[');

  let jsonStart = -1;
  if (objectStart >= 0 && arrayStart >= 0) {
    jsonStart = Math.min(objectStart, arrayStart);
  } else if (objectStart >= 0) {
    jsonStart = objectStart;
  } else if (arrayStart >= 0) {
    jsonStart = arrayStart;
  }

  if (jsonStart > 0) {
    const reasoning = text.slice(0, jsonStart).trim();
    const jsonStr = text.slice(jsonStart).trim();
    return { reasoning, jsonStr };
  }

  // No preamble found; treat the whole reply as JSON
  return { reasoning: '', jsonStr: text.trim() };
}
