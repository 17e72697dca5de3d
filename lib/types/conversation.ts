/**
 * Conversation types -- the state of a single character visit.
 */

import type { Character } from './character';
import type { Scenario } from './scenario';

/** Who produced a line in a transcript */
export type Speaker = 'narrator' | 'detective' | 'character';

export interface TranscriptMessage {
  speaker: Speaker;

  /** Character name for 'character' lines; absent otherwise */
  name?: string;

  text: string;
}

export type ConversationPhase = 'introducing' | 'asking' | 'answering' | 'ended';

/** Why a visit stopped */
export type ConversationEndReason = 'exit' | 'turn_limit' | 'generation_failure';

export interface ConversationState {
  character: Character;
  scenario: Scenario;

  /** Ordered transcript of this visit only */
  messageLog: TranscriptMessage[];

  /** Questions asked so far in this visit */
  turnCount: number;

  phase: ConversationPhase;
}
