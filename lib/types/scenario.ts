/**
 * Scenario -- the crime the session revolves around.
 *
 * Generated once from the environment and the roster, then read-only for the
 * rest of the session.
 */

export interface Scenario {
  /** Must name the roster's Victim */
  victimName: string;

  /** Approximate time of death, e.g. "shortly after midnight" */
  timeOfDeath: string;

  /** Where the body was discovered */
  locationFound: string;

  /** The weapon or method */
  murderWeapon: string;

  /** Medical cause of death */
  causeOfDeath: string;

  /** Description of the scene and the evidence found there */
  crimeSceneDetails: string;

  /** Potential witnesses and last known sightings */
  witnesses: string;

  /** Clues available to the detective from the start */
  initialClues: string;

  /** Relationships between all characters. Never names the killer. */
  characterBrief: string;
}
