/**
 * Barrel export for all shared types.
 *
 * Usage:
 *   import type { Character, Scenario } from '../types/index';
 */

export { CHARACTER_ROLES } from './character';
export type { Character, CharacterRole } from './character';
export type { Scenario } from './scenario';
export type {
  ConversationEndReason,
  ConversationPhase,
  ConversationState,
  Speaker,
  TranscriptMessage,
} from './conversation';
export { SESSION_PHASES } from './session';
export type {
  InvestigationProgress,
  SessionOutcome,
  SessionPhase,
  SessionSettings,
  SessionSnapshot,
  SessionState,
  TerminalPhase,
} from './session';
