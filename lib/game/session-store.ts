import { z } from 'zod';
import { CHARACTER_ROLES } from '../types/character';
import type { ConversationState } from '../types/conversation';
import { SESSION_PHASES, type SessionSnapshot, type SessionState } from '../types/session';
import { findRosterIssues, ScenarioSchema } from '../shared/generation-state';

// ============================================
// Snapshot Schemas
//
// Saved files are read back through these, so a hand-edited or truncated file
// fails with a zod error instead of a half-built session.
// ============================================

const StoredCharacterSchema = z.object({
  role: z.enum(CHARACTER_ROLES),
  name: z.string().min(1),
  backstory: z.string(),
});

const TranscriptMessageSchema = z.object({
  speaker: z.enum(['narrator', 'detective', 'character']),
  name: z.string().optional(),
  text: z.string(),
});

const SessionSnapshotSchema = z.object({
  environment: z.string(),
  rosterSize: z.number().int().positive(),
  roster: z.array(StoredCharacterSchema),
  scenario: ScenarioSchema.nullable(),
  visited: z.array(z.number().int().nonnegative()),
  totalActions: z.number().int().nonnegative(),
  actionLimit: z.number().int().nonnegative().optional(),
  guessesLeft: z.number().int().nonnegative(),
  phase: z.enum(SESSION_PHASES),
  selectedIndex: z.number().int().nonnegative().nullable(),
  messageLog: z.array(TranscriptMessageSchema),
}).superRefine((snapshot, ctx) => {
  const issue = (message: string, path: string) => ctx.addIssue({ code: z.ZodIssueCode.custom, message, path: [path] });
  const { roster } = snapshot;

  for (const index of snapshot.visited) {
    if (index >= roster.length) issue(`visited index ${index} is outside the roster`, 'visited');
    else if (roster[index].role === 'Victim') issue(`visited index ${index} is the victim`, 'visited');
  }

  const selected = snapshot.selectedIndex;
  if (selected !== null) {
    if (selected >= roster.length) issue(`selectedIndex ${selected} is outside the roster`, 'selectedIndex');
    else if (roster[selected].role === 'Victim') issue(`selectedIndex ${selected} is the victim`, 'selectedIndex');
  } else if (snapshot.phase === 'conversing') {
    issue('a conversing session needs a selected character', 'selectedIndex');
  }

  if (snapshot.phase !== 'creating') {
    for (const message of findRosterIssues(roster)) issue(message, 'roster');
    if (snapshot.scenario === null) issue(`phase ${snapshot.phase} needs a scenario`, 'scenario');
  }

  const over = snapshot.phase === 'won' || snapshot.phase === 'lost';
  if (!over && snapshot.guessesLeft === 0) {
    issue(`phase ${snapshot.phase} needs at least one guess left`, 'guessesLeft');
  }
});

const ConversationStateSchema = z.object({
  character: StoredCharacterSchema,
  scenario: ScenarioSchema,
  messageLog: z.array(TranscriptMessageSchema),
  turnCount: z.number().int().nonnegative(),
  phase: z.enum(['introducing', 'asking', 'answering', 'ended']),
});

// ============================================
// Session
// ============================================

export function serializeSession(state: SessionState | SessionSnapshot): string {
  return JSON.stringify({ ...state, visited: [...state.visited] }, null, 2);
}

/** Parse a saved session. `visited` keeps its saved order; repeated indices collapse. */
export function restoreSession(json: string): SessionState {
  const snapshot = SessionSnapshotSchema.parse(JSON.parse(json));
  return { ...snapshot, visited: new Set(snapshot.visited) };
}

// ============================================
// Conversation
// ============================================

export function serializeConversation(state: ConversationState): string {
  return JSON.stringify(state, null, 2);
}

export function restoreConversation(json: string): ConversationState {
  return ConversationStateSchema.parse(JSON.parse(json));
}
