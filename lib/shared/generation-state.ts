import { z } from 'zod';
import { CHARACTER_ROLES, type Character, type CharacterRole } from '../types/character';

// ============================================
// Generation Step Names
// ============================================

export const GENERATION_STEPS = [
  'createCharacters',
  'createScenario',
  'narrate',
  'introduceCharacter',
  'askQuestion',
  'answerQuestion',
] as const;

export type GenerationStep = typeof GENERATION_STEPS[number];

// ============================================
// Model Configuration
// ============================================

export interface GenerationModelConfig {
  /**
   * Fallback model for any step not listed in `steps`.
   * Use a full inference profile ID (e.g. us.anthropic.claude-haiku-4-5-20251001-v1:0)
   * or a shortcut: haiku, sonnet, sonnet4, opus, opus45, opus41.
   */
  default: string;
  /** Per-step overrides; same format (full ID or shortcut). */
  steps?: Partial<Record<GenerationStep, string>>;
}

// ============================================
// Generation Backend Contract
//
// The core never talks to a model directly. Structured requests carry the
// zod schema the result must satisfy; text requests carry a transcript in
// the model's own perspective (its lines are 'assistant').
// ============================================

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface StructuredRequest<T> {
  step: GenerationStep;
  systemPrompt: string;
  userPrompt: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface TextRequest {
  step: GenerationStep;
  systemPrompt: string;
  messages: ChatMessage[];
}

/**
 * Produces text for the game. Implementations own timeout and retry policy;
 * any failure must reject with a GenerationFailure.
 */
export interface GenerationBackend {
  generateStructured<T>(request: StructuredRequest<T>): Promise<T>;
  generateText(request: TextRequest): Promise<string>;
}

// ============================================
// Roster Rules
// ============================================

/**
 * Everything wrong with a roster: role counts other than one Killer and one
 * Victim, and duplicate names (names key the context index and the caches).
 */
export function findRosterIssues(characters: readonly Character[]): string[] {
  const issues: string[] = [];
  const count = (role: CharacterRole) => characters.filter((c) => c.role === role).length;

  const killers = count('Killer');
  const victims = count('Victim');
  if (killers !== 1) issues.push(`expected exactly 1 Killer, got ${killers}`);
  if (victims !== 1) issues.push(`expected exactly 1 Victim, got ${victims}`);

  const seen = new Set<string>();
  for (const character of characters) {
    const key = character.name.trim().toLowerCase();
    if (seen.has(key)) issues.push(`duplicate character name "${character.name}"`);
    seen.add(key);
  }

  return issues;
}

// ============================================
// Zod Schemas for LLM Output Validation
// ============================================

/** Accepts "killer", "VICTIM", " Suspect " and similar spellings of the three roles. */
const RoleSchema = z.preprocess((raw) => {
  if (typeof raw !== 'string') return raw;
  const lower = raw.trim().toLowerCase();
  return CHARACTER_ROLES.find((role) => role.toLowerCase() === lower) ?? raw;
}, z.enum(CHARACTER_ROLES));

export const CharacterSchema = z.object({
  role: RoleSchema,
  name: z.string().trim().min(1),
  backstory: z.string().trim().min(1),
});

export const RosterSchema = z
  .object({
    characters: z.array(CharacterSchema).min(3),
  })
  .superRefine((roster, ctx) => {
    for (const issue of findRosterIssues(roster.characters)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue, path: ['characters'] });
    }
  });

export type Roster = z.infer<typeof RosterSchema>;

export const ScenarioSchema = z.object({
  victimName: z.string().trim().min(1),
  timeOfDeath: z.string().min(1),
  locationFound: z.string().min(1),
  murderWeapon: z.string().min(1),
  causeOfDeath: z.string().min(1),
  crimeSceneDetails: z.string().min(1),
  witnesses: z.string().min(1),
  initialClues: z.string().min(1),
  characterBrief: z.string().min(1),
});
