import { describe, expect, it } from 'vitest';

import { CacheStore } from '../cache-store';
import { GameContentCache } from '../game-content-cache';
import { HARBOR_ENVIRONMENT, HARBOR_ROSTER, HARBOR_SCENARIO } from '../../game/__tests__/fixtures';

const [, mara, tobias] = HARBOR_ROSTER;

describe('GameContentCache', () => {
  it('stores introductions per character and victim', () => {
    const cache = new GameContentCache();
    cache.setIntroduction(mara, HARBOR_SCENARIO, 'Evening, detective.');

    expect(cache.getIntroduction(mara, HARBOR_SCENARIO)).toBe('Evening, detective.');
    expect(cache.getIntroduction(tobias, HARBOR_SCENARIO)).toBeUndefined();
    expect(cache.getIntroduction(mara, { ...HARBOR_SCENARIO, victimName: 'Someone Else' })).toBeUndefined();
  });

  it('stores narration per environment and scenario', () => {
    const cache = new GameContentCache();
    cache.setNarration(HARBOR_ENVIRONMENT, HARBOR_SCENARIO, 'Fog rolls in over the pier.');

    expect(cache.getNarration(HARBOR_ENVIRONMENT, HARBOR_SCENARIO)).toBe('Fog rolls in over the pier.');
    expect(cache.getNarration('mountain lodge', HARBOR_SCENARIO)).toBeUndefined();
    expect(cache.getNarration(HARBOR_ENVIRONMENT, { ...HARBOR_SCENARIO, murderWeapon: 'An oar' })).toBeUndefined();
  });

  it('clears one character without touching the others', () => {
    const cache = new GameContentCache();
    cache.setIntroduction(mara, HARBOR_SCENARIO, 'Mara here.');
    cache.setIntroduction(tobias, HARBOR_SCENARIO, 'Tobias here.');
    cache.setNarration(HARBOR_ENVIRONMENT, HARBOR_SCENARIO, 'Fog.');

    expect(cache.clearCharacter(mara.name)).toBe(1);
    expect(cache.getIntroduction(mara, HARBOR_SCENARIO)).toBeUndefined();
    expect(cache.getIntroduction(tobias, HARBOR_SCENARIO)).toBe('Tobias here.');
    expect(cache.getNarration(HARBOR_ENVIRONMENT, HARBOR_SCENARIO)).toBe('Fog.');
  });

  it('expires entries through the underlying store', () => {
    let now = 0;
    const cache = new GameContentCache(new CacheStore({ defaultTtlMs: 50, now: () => now }));
    cache.setIntroduction(mara, HARBOR_SCENARIO, 'Mara here.');

    now = 51;

    expect(cache.cleanupExpired()).toBe(1);
    expect(cache.stats().size).toBe(0);
  });

  it('exposes hit and miss counts', () => {
    const cache = new GameContentCache();
    cache.setIntroduction(mara, HARBOR_SCENARIO, 'Mara here.');
    cache.getIntroduction(mara, HARBOR_SCENARIO);
    cache.getIntroduction(tobias, HARBOR_SCENARIO);

    expect(cache.stats()).toMatchObject({ hits: 1, misses: 1, maxSize: 200 });
  });
});
