/**
 * Public entry point: the game core, its memory layer and the Bedrock backend.
 */

export * from './types/index';

export { CacheStore, deriveCacheKey } from './memory/cache-store';
export type { CacheStats, CacheStoreOptions } from './memory/cache-store';
export { GameContentCache } from './memory/game-content-cache';
export { ContextIndex, chunkText, cosineSimilarity, CHUNK_SEPARATOR, TRUNCATION_MARKER } from './memory/context-index';
export type {
  ContextIndexOptions,
  ContextIndexStats,
  Retrieval,
  RetrievalMode,
  SimilarityBackend,
  TextChunk,
} from './memory/context-index';

export { ConversationMachine, DEFAULT_CONTEXT_BUDGET, DEFAULT_EXIT_TOKEN } from './game/conversation-machine';
export type { ConversationDeps, ConversationOptions, VisitOptions, VisitResult } from './game/conversation-machine';
export { SessionMachine, createSessionState, isTerminal, DEFAULT_MAX_TURNS_PER_VISIT } from './game/session-machine';
export type { SessionDeps, SessionOptions } from './game/session-machine';
export type { CharacterSelection, Presenter, QuestionChoice, SessionNotice } from './game/presenter';
export { restoreConversation, restoreSession, serializeConversation, serializeSession } from './game/session-store';
export { persona, suspectsForAccusation } from './game/roster';

export {
  GENERATION_STEPS,
  CharacterSchema,
  RosterSchema,
  ScenarioSchema,
} from './shared/generation-state';
export type {
  ChatMessage,
  GenerationBackend,
  GenerationModelConfig,
  GenerationStep,
  StructuredRequest,
  TextRequest,
} from './shared/generation-state';
export {
  BedrockEmbeddings,
  BedrockGenerationBackend,
  createBedrockTransport,
  resolveModelId,
} from './shared/bedrock';
export type { BedrockTransport, ConverseReply } from './shared/bedrock';
export { ConfigError, GameError, GenerationFailure, InvalidAccusation, InvalidSelection, ErrorCodes } from './shared/errors';
export { loadConfig } from './shared/config';
export type { GameConfig } from './shared/config';
export { Logger, logger } from './shared/logger';
export type { LogLevel } from './shared/logger';
