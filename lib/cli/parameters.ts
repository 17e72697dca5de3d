import type { SessionSettings } from '../types/session';
import type { Terminal } from './console-presenter';

export const ROSTER_SIZE_RANGE = { min: 3, max: 15 } as const;

/**
 * Ask for the game parameters, offering the configured values as defaults.
 * An empty answer keeps the default; "none" clears the action limit.
 */
export async function promptSettings(terminal: Terminal, defaults: SessionSettings): Promise<SessionSettings> {
  const environment = (await terminal.question(`Setting [${defaults.environment}]: `)).trim() || defaults.environment;

  const rosterSize = await askInteger(
    terminal,
    `Number of characters (${ROSTER_SIZE_RANGE.min}-${ROSTER_SIZE_RANGE.max}) [${defaults.rosterSize}]: `,
    defaults.rosterSize,
    ROSTER_SIZE_RANGE.min,
    ROSTER_SIZE_RANGE.max,
  );

  const guesses = await askInteger(terminal, `Accusation attempts [${defaults.guesses}]: `, defaults.guesses, 1);

  const actionLimit = await askLimit(terminal, defaults.actionLimit);

  return { environment, rosterSize, guesses, actionLimit };
}

async function askInteger(terminal: Terminal, prompt: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): Promise<number> {
  for (;;) {
    const answer = (await terminal.question(prompt)).trim();
    if (answer === '') return fallback;
    const value = parseInteger(answer);
    if (value !== undefined && value >= min && value <= max) return value;
    terminal.write(max === Number.MAX_SAFE_INTEGER
      ? `Enter a whole number of at least ${min}.`
      : `Enter a whole number between ${min} and ${max}.`);
  }
}

async function askLimit(terminal: Terminal, fallback: number | undefined): Promise<number | undefined> {
  const shown = fallback === undefined ? 'none' : String(fallback);
  for (;;) {
    const answer = (await terminal.question(`Question limit across all interviews [${shown}]: `)).trim().toLowerCase();
    if (answer === '') return fallback;
    if (answer === 'none') return undefined;
    const value = parseInteger(answer);
    if (value !== undefined && value >= 1) return value;
    terminal.write('Enter a positive whole number, or "none".');
  }
}

function parseInteger(text: string): number | undefined {
  return /^\d+$/.test(text) ? Number(text) : undefined;
}
