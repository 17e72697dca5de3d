import type { Character } from '../types/character';
import type { Scenario } from '../types/scenario';
import { CacheStore, deriveCacheKey, type CacheStats } from './cache-store';

const DEFAULT_TTL_MS = 2 * 60 * 60 * 1000;
const DEFAULT_MAX_SIZE = 200;

/**
 * Generated game text keyed by what it depends on.
 *
 * An introduction depends on who is speaking and whose death is being
 * investigated, never on how far the visit has got, so a second visit to the
 * same character reuses it. Narration depends on the whole scenario.
 */
export class GameContentCache {
  readonly #store: CacheStore<string>;

  constructor(store: CacheStore<string> = new CacheStore({ maxSize: DEFAULT_MAX_SIZE, defaultTtlMs: DEFAULT_TTL_MS })) {
    this.#store = store;
  }

  getIntroduction(character: Character, scenario: Scenario): string | undefined {
    return this.#store.get(introductionKey(character.name, scenario.victimName));
  }

  setIntroduction(character: Character, scenario: Scenario, text: string): void {
    this.#store.set(introductionKey(character.name, scenario.victimName), text);
  }

  getNarration(environment: string, scenario: Scenario): string | undefined {
    return this.#store.get(narrationKey(environment, scenario));
  }

  setNarration(environment: string, scenario: Scenario, text: string): void {
    this.#store.set(narrationKey(environment, scenario), text);
  }

  /** Forget everything cached for one character; returns the number of entries removed. */
  clearCharacter(name: string): number {
    const prefix = `intro:${name}|`;
    return this.#store.invalidateWhere((key) => key.startsWith(prefix));
  }

  cleanupExpired(): number {
    return this.#store.cleanupExpired();
  }

  clear(): void {
    this.#store.clear();
  }

  stats(): CacheStats {
    return this.#store.stats();
  }
}

function introductionKey(characterName: string, victimName: string): string {
  return `intro:${characterName}|${victimName}`;
}

function narrationKey(environment: string, scenario: Scenario): string {
  return deriveCacheKey(
    'narration',
    environment,
    scenario.victimName,
    scenario.timeOfDeath,
    scenario.locationFound,
    scenario.murderWeapon,
    scenario.causeOfDeath,
    scenario.crimeSceneDetails,
  );
}
