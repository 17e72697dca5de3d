import { createInterface, type Interface } from 'node:readline/promises';
import type { Character } from '../types/character';
import type { InvestigationProgress, SessionOutcome, SessionSnapshot } from '../types/session';
import type { CharacterSelection, Presenter, QuestionChoice, SessionNotice } from '../game/presenter';

/** Line-based terminal I/O; swapped for a scripted fake in tests. */
export interface Terminal {
  question(prompt: string): Promise<string>;
  write(text: string): void;
  close(): void;
}

export function createTerminal(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Terminal {
  const rl: Interface = createInterface({ input, output });
  return {
    question: (prompt) => rl.question(prompt),
    write: (text) => {
      output.write(`${text}\n`);
    },
    close: () => rl.close(),
  };
}

const RULE = '-'.repeat(60);

/**
 * Plain-text presenter. Characters are numbered from 1; "a" moves on to the
 * accusation and an empty line at the question prompt lets the assistant
 * detective ask.
 */
export class ConsolePresenter implements Presenter {
  readonly #terminal: Terminal;

  constructor(terminal: Terminal) {
    this.#terminal = terminal;
  }

  render(snapshot: SessionSnapshot): void {
    if (snapshot.phase === 'conversing' && snapshot.selectedIndex !== null) {
      const character = snapshot.roster[snapshot.selectedIndex];
      this.#write(`\n${RULE}\nInterviewing ${character.name}\n${RULE}`);
    }
  }

  showNarration(text: string): void {
    this.#write(`\n${text}\n`);
  }

  showIntroduction(character: Character, text: string, cached: boolean): void {
    this.#write(`${character.name}${cached ? ' (again)' : ''}: ${text}`);
  }

  showQuestion(_character: Character, text: string): void {
    this.#write(`Detective: ${text}`);
  }

  showAnswer(character: Character, text: string): void {
    this.#write(`${character.name}: ${text}`);
  }

  showNotice(notice: SessionNotice): void {
    this.#write(formatNotice(notice));
  }

  showResult(outcome: SessionOutcome): void {
    const headline = outcome.phase === 'won'
      ? `Case closed! ${outcome.killerName} was the killer.`
      : `Out of guesses. The killer was ${outcome.killerName}.`;
    this.#write(`\n${RULE}\n${headline}\nQuestions asked: ${outcome.totalActions}\n${RULE}`);
  }

  async selectCharacter(
    roster: readonly Character[],
    visited: ReadonlySet<number>,
    progress: InvestigationProgress,
  ): Promise<CharacterSelection> {
    this.#write(`\n${formatProgress(progress)}`);
    roster.forEach((character, index) => {
      const mark = character.role === 'Victim' ? ' (victim)' : visited.has(index) ? ' *' : '';
      this.#write(`  ${index + 1}. ${character.name}${mark}`);
    });

    const answer = (await this.#terminal.question('Interview who? (number, or "a" to accuse) ')).trim();
    return parseSelection(answer);
  }

  async askOrType(character: Character): Promise<QuestionChoice> {
    const answer = await this.#terminal.question(`Ask ${character.name} (Enter to let your partner ask, EXIT to leave): `);
    return answer.trim() === '' ? { kind: 'generate' } : { kind: 'typed', text: answer };
  }

  async accuse(suspects: readonly Character[], guessesLeft: number): Promise<string> {
    this.#write(`\nWho is the killer? (${guesses(guessesLeft)} left)`);
    suspects.forEach((character, index) => this.#write(`  ${index + 1}. ${character.name}`));

    const answer = (await this.#terminal.question('Accuse (name or number): ')).trim();
    const picked = /^\d+$/.test(answer) ? suspects[Number(answer) - 1] : undefined;
    return picked ? picked.name : answer;
  }

  #write(text: string): void {
    this.#terminal.write(text);
  }
}

// ── Helpers ──────────────────────────────────────────────────────────

export function parseSelection(answer: string): CharacterSelection {
  if (answer.toLowerCase() === 'a' || answer.toLowerCase() === 'accuse') return { kind: 'accuse' };
  // Non-numbers become NaN and are rejected by the session as out of range.
  const index = /^\d+$/.test(answer) ? Number(answer) - 1 : Number.NaN;
  return { kind: 'character', index };
}

export function formatProgress(progress: InvestigationProgress): string {
  const actions = progress.actionLimit === undefined
    ? `${progress.totalActions} questions asked`
    : `${progress.totalActions}/${progress.actionLimit} questions asked`;
  return `${actions} | ${progress.visitedCount}/${progress.interviewableCount} interviewed | ${guesses(progress.guessesLeft)} left`;
}

export function formatNotice(notice: SessionNotice): string {
  switch (notice.kind) {
    case 'action_limit':
      return `You have used all ${notice.limit} questions. Time to name the killer.`;
    case 'invalid_selection':
      return notice.message;
    case 'invalid_question':
      return 'Type a question, or press Enter to let your partner ask.';
    case 'invalid_accusation':
      return notice.message;
    case 'incorrect_accusation':
      return `${notice.accused} is not the killer. ${guesses(notice.guessesLeft)} left.`;
    case 'visit_failed':
      return `The interview with ${notice.character} broke off: ${notice.message}`;
  }
}

function guesses(count: number): string {
  return `${count} ${count === 1 ? 'guess' : 'guesses'}`;
}
