/**
 * Session types -- one playthrough from case creation to a verdict.
 *
 * SessionState is owned and mutated by the SessionMachine only. Presenters and
 * persistence receive SessionSnapshot, its JSON-safe projection.
 */

import type { Character } from './character';
import type { TranscriptMessage } from './conversation';
import type { Scenario } from './scenario';

export const SESSION_PHASES = [
  'creating',
  'narrating',
  'selecting',
  'conversing',
  'accusing',
  'won',
  'lost',
] as const;

export type SessionPhase = typeof SESSION_PHASES[number];

export type TerminalPhase = Extract<SessionPhase, 'won' | 'lost'>;

/** Parameters supplied before creation and never revisited */
export interface SessionSettings {
  /** Setting of the story, e.g. "small harbor town" */
  environment: string;

  /** Number of characters to generate, victim and killer included */
  rosterSize: number;

  /** Accusation attempts */
  guesses: number;

  /** Optional cap on questions asked across all visits */
  actionLimit?: number;
}

export interface SessionState {
  environment: string;
  rosterSize: number;

  /** Empty until creation finishes */
  roster: Character[];

  /** Null until creation finishes */
  scenario: Scenario | null;

  /** Roster indices interviewed so far, in first-visit order */
  visited: Set<number>;

  /** Questions asked across all visits */
  totalActions: number;

  actionLimit?: number;

  guessesLeft: number;

  phase: SessionPhase;

  /** Roster index chosen for the visit in progress */
  selectedIndex: number | null;

  /** Narration plus every folded visit transcript, in order */
  messageLog: TranscriptMessage[];
}

/** JSON-safe copy of SessionState */
export interface SessionSnapshot extends Omit<SessionState, 'visited'> {
  visited: number[];
}

export interface InvestigationProgress {
  totalActions: number;
  actionLimit?: number;
  visitedCount: number;

  /** Characters that can be interviewed (everyone but the victim) */
  interviewableCount: number;

  guessesLeft: number;
}

export interface SessionOutcome {
  phase: TerminalPhase;
  killerName: string;
  guessesLeft: number;
  totalActions: number;
}
