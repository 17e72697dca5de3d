import type { Character } from '../types/character';
import { deriveCacheKey } from '../memory/cache-store';
import { GenerationFailure } from '../shared/errors';
import { findRosterIssues, type GenerationStep } from '../shared/generation-state';

/** Name, role and backstory as one block; computed on every read, never stored. */
export function persona(character: Character): string {
  return `Name: ${character.name}\nRole: ${character.role}\nBackstory: ${character.backstory}\n`;
}

/** Persona with the backstory replaced by the retrieved slice relevant to a question. */
export function focusedPersona(character: Character, relevantBackground: string): string {
  return `Name: ${character.name}\nRole: ${character.role}\nRelevant Background: ${relevantBackground}\n`;
}

/**
 * Key of a character's background in the context index. Sessions may share
 * one index, so the key covers the indexed text and not just the name.
 */
export function characterSourceId(character: Character): string {
  return deriveCacheKey('source', character.name, character.role, character.backstory);
}

export function findKiller(roster: readonly Character[]): Character {
  const killer = roster.find((c) => c.role === 'Killer');
  if (!killer) throw new Error('Roster has no Killer');
  return killer;
}

export function findVictim(roster: readonly Character[]): Character {
  const victim = roster.find((c) => c.role === 'Victim');
  if (!victim) throw new Error('Roster has no Victim');
  return victim;
}

/** Everyone but the victim, alphabetically; the list offered at accusation time. */
export function suspectsForAccusation(roster: readonly Character[]): Character[] {
  return roster
    .filter((c) => c.role !== 'Victim')
    .sort((a, b) => a.name.localeCompare(b.name));
}

export function interviewableCount(roster: readonly Character[]): number {
  return roster.filter((c) => c.role !== 'Victim').length;
}

/**
 * Enforce one Killer, one Victim and unique names on a generated roster.
 * A backend that ignores the schema still cannot start a broken session.
 */
export function assertPlayableRoster(roster: readonly Character[], step: GenerationStep = 'createCharacters'): void {
  const issues = findRosterIssues(roster);
  if (issues.length > 0) {
    throw new GenerationFailure(step, `unplayable roster: ${issues.join('; ')}`);
  }
}
