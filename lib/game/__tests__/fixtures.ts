import type { Character } from '../../types/character';
import type { Scenario } from '../../types/scenario';

/** A small harbor-town case: one killer, one victim, two suspects. */
export const HARBOR_ROSTER: Character[] = [
  {
    role: 'Victim',
    name: 'Silas Grey',
    backstory: 'Harbor master for twenty years. Kept a ledger of every debt owed on the docks.',
  },
  {
    role: 'Killer',
    name: 'Mara Quill',
    backstory: 'Runs the chandlery. Owed Silas more than she could repay. Was seen near the pier at midnight.',
  },
  {
    role: 'Suspect',
    name: 'Tobias Reed',
    backstory: 'Fisherman who lost his mooring rights after a dispute with Silas.',
  },
  {
    role: 'Suspect',
    name: 'Edna Voss',
    backstory: 'Innkeeper who hears every rumor in town and sells some of them.',
  },
];

export const HARBOR_SCENARIO: Scenario = {
  victimName: 'Silas Grey',
  timeOfDeath: 'Around midnight',
  locationFound: 'Under the north pier',
  murderWeapon: 'A boat hook',
  causeOfDeath: 'Blow to the head',
  crimeSceneDetails: 'Wet footprints lead toward the chandlery. The ledger is missing.',
  witnesses: 'A night watchman heard shouting.',
  initialClues: 'Tar on the boat hook; a torn page of the ledger.',
  characterBrief: 'Mara owed Silas money, Tobias blamed him for his lost mooring, Edna rented Silas a room.',
};

export const HARBOR_ENVIRONMENT = 'small harbor town';
