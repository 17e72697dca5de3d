import { z } from 'zod';
import type { SessionSettings } from '../types/session';
import { ConfigError } from './errors';
import { GENERATION_STEPS, type GenerationModelConfig, type GenerationStep } from './generation-state';
import type { LogLevel } from './logger';

// ============================================
// Environment Schema
// ============================================

/** Blank variables count as unset, so defaults and optionals apply to them too. */
const fromEnv = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((raw) => (typeof raw === 'string' && raw.trim() === '' ? undefined : raw), schema);

const int = (min: number, max = Number.MAX_SAFE_INTEGER) => z.coerce.number().int().min(min).max(max);

const text = () => z.string().trim().min(1);

const toggle = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['on', 'off', 'true', 'false', '1', '0']))
  .transform((value) => value === 'on' || value === 'true' || value === '1');

const EnvSchema = z
  .object({
    MYSTERY_ENVIRONMENT: fromEnv(text().default('Victorian London mansion')),
    MYSTERY_ROSTER_SIZE: fromEnv(int(3, 15).default(5)),
    MYSTERY_GUESSES: fromEnv(int(1).default(3)),
    MYSTERY_ACTION_LIMIT: fromEnv(int(1).optional()),
    MYSTERY_MAX_TURNS_PER_VISIT: fromEnv(int(1).default(24)),
    MYSTERY_EXIT_TOKEN: fromEnv(text().default('EXIT')),

    MYSTERY_CACHE_MAX_SIZE: fromEnv(int(1).default(200)),
    MYSTERY_CACHE_TTL_SECONDS: fromEnv(int(0).default(7200)),

    MYSTERY_CHUNK_SIZE: fromEnv(int(1).default(500)),
    MYSTERY_CHUNK_OVERLAP: fromEnv(int(0).default(50)),
    MYSTERY_CHUNKS_PER_QUERY: fromEnv(int(1).default(3)),
    MYSTERY_CONTEXT_BUDGET: fromEnv(int(1).default(300)),
    MYSTERY_EMBEDDINGS: fromEnv(toggle.default('off')),

    BEDROCK_DEFAULT_MODEL_ID: fromEnv(text().default('haiku')),
    BEDROCK_STEP_MODELS: fromEnv(text().optional()),
    BEDROCK_EMBEDDING_MODEL_ID: fromEnv(text().default('amazon.titan-embed-text-v2:0')),
    BEDROCK_MAX_RETRIES: fromEnv(int(0, 10).default(2)),

    LOG_LEVEL: fromEnv(
      z.string().trim().toLowerCase().pipe(z.enum(['debug', 'info', 'warn', 'error', 'silent'])).default('warn'),
    ),
  })
  .superRefine((env, ctx) => {
    if (env.MYSTERY_CHUNK_OVERLAP >= env.MYSTERY_CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MYSTERY_CHUNK_OVERLAP'],
        message: `must be smaller than MYSTERY_CHUNK_SIZE (${env.MYSTERY_CHUNK_SIZE})`,
      });
    }
    if (env.BEDROCK_STEP_MODELS !== undefined) {
      for (const issue of parseStepModels(env.BEDROCK_STEP_MODELS).issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['BEDROCK_STEP_MODELS'], message: issue });
      }
    }
  });

// ============================================
// Resolved Configuration
// ============================================

export interface GameConfig {
  session: SessionSettings;
  maxTurnsPerVisit: number;
  exitToken: string;
  cache: {
    maxSize: number;
    ttlMs: number;
  };
  context: {
    chunkSize: number;
    chunkOverlap: number;
    maxChunksPerQuery: number;
    /** Size units of background per answer */
    budget: number;
    embeddings: boolean;
    embeddingModelId: string;
  };
  models: GenerationModelConfig;
  maxRetries: number;
  logLevel: LogLevel;
}

/**
 * Read the game configuration from environment variables. Every invalid
 * variable is reported at once in a ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GameConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`));
  }
  const e = parsed.data;

  const steps = e.BEDROCK_STEP_MODELS === undefined ? undefined : parseStepModels(e.BEDROCK_STEP_MODELS).steps;

  return {
    session: {
      environment: e.MYSTERY_ENVIRONMENT,
      rosterSize: e.MYSTERY_ROSTER_SIZE,
      guesses: e.MYSTERY_GUESSES,
      actionLimit: e.MYSTERY_ACTION_LIMIT,
    },
    maxTurnsPerVisit: e.MYSTERY_MAX_TURNS_PER_VISIT,
    exitToken: e.MYSTERY_EXIT_TOKEN,
    cache: {
      maxSize: e.MYSTERY_CACHE_MAX_SIZE,
      ttlMs: e.MYSTERY_CACHE_TTL_SECONDS * 1000,
    },
    context: {
      chunkSize: e.MYSTERY_CHUNK_SIZE,
      chunkOverlap: e.MYSTERY_CHUNK_OVERLAP,
      maxChunksPerQuery: e.MYSTERY_CHUNKS_PER_QUERY,
      budget: e.MYSTERY_CONTEXT_BUDGET,
      embeddings: e.MYSTERY_EMBEDDINGS,
      embeddingModelId: e.BEDROCK_EMBEDDING_MODEL_ID,
    },
    models: { default: e.BEDROCK_DEFAULT_MODEL_ID, steps },
    maxRetries: e.BEDROCK_MAX_RETRIES,
    logLevel: e.LOG_LEVEL,
  };
}

// ── Helpers ──────────────────────────────────────────────────────────

/** "askQuestion=haiku, answerQuestion=sonnet" -> per-step model overrides */
export function parseStepModels(raw: string): { steps: Partial<Record<GenerationStep, string>>; issues: string[] } {
  const steps: Partial<Record<GenerationStep, string>> = {};
  const issues: string[] = [];

  for (const pair of raw.split(',')) {
    if (pair.trim() === '') continue;
    const [name, model] = pair.split('=').map((part) => part.trim());
    const step = GENERATION_STEPS.find((s) => s === name);
    if (!step) {
      issues.push(`unknown generation step "${name}"`);
    } else if (!model) {
      issues.push(`missing model for step "${step}"`);
    } else {
      steps[step] = model;
    }
  }

  return { steps, issues };
}
