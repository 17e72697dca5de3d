import type { Character } from '../types/character';
import type {
  InvestigationProgress,
  SessionOutcome,
  SessionSnapshot,
} from '../types/session';

/** A roster index to interview, or the move to the accusation phase. */
export type CharacterSelection =
  | { kind: 'character'; index: number }
  | { kind: 'accuse' };

/** Let the assistant detective phrase the next question, or use the player's own. */
export type QuestionChoice =
  | { kind: 'generate' }
  | { kind: 'typed'; text: string };

export type SessionNotice =
  | { kind: 'action_limit'; limit: number }
  | { kind: 'invalid_selection'; message: string }
  | { kind: 'invalid_question' }
  | { kind: 'invalid_accusation'; message: string }
  | { kind: 'incorrect_accusation'; accused: string; guessesLeft: number }
  | { kind: 'visit_failed'; character: string; message: string };

/**
 * Everything the session needs from a user interface. Input methods block
 * until the player answers; the machines validate what comes back and ask
 * again on bad input.
 */
export interface Presenter {
  /** Called after every session transition */
  render(snapshot: SessionSnapshot): void;

  showNarration(text: string): void;
  showIntroduction(character: Character, text: string, cached: boolean): void;
  showQuestion(character: Character, text: string): void;
  showAnswer(character: Character, text: string): void;
  showNotice(notice: SessionNotice): void;
  showResult(outcome: SessionOutcome): void;

  selectCharacter(
    roster: readonly Character[],
    visited: ReadonlySet<number>,
    progress: InvestigationProgress,
  ): Promise<CharacterSelection>;

  askOrType(character: Character): Promise<QuestionChoice>;

  /** Name of the accused, chosen from `suspects` */
  accuse(suspects: readonly Character[], guessesLeft: number): Promise<string>;
}
