/**
 * Character -- a member of the generated cast.
 *
 * Every session has exactly one Killer and exactly one Victim; everyone else is
 * a Suspect the detective may interview. The role is hidden from the player and
 * only used to steer generation and to score the final accusation.
 */

export const CHARACTER_ROLES = ['Killer', 'Victim', 'Suspect'] as const;

export type CharacterRole = typeof CHARACTER_ROLES[number];

export interface Character {
  /** Killer, Victim or Suspect */
  role: CharacterRole;

  /** Display name, e.g. "Agnes Whitlock". Unique within a roster. */
  name: string;

  /**
   * Background, concerns and motives. Fixed once the roster is generated;
   * long backstories are chunked by the context index and only the relevant
   * slice is sent with each answer.
   */
  backstory: string;
}
