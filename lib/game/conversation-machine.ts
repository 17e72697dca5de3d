import type { Character } from '../types/character';
import type {
  ConversationEndReason,
  ConversationState,
  TranscriptMessage,
} from '../types/conversation';
import type { Scenario } from '../types/scenario';
import { GenerationFailure } from '../shared/errors';
import type { GenerationBackend } from '../shared/generation-state';
import { logger as defaultLogger, type Logger } from '../shared/logger';
import type { ContextIndex } from '../memory/context-index';
import type { GameContentCache } from '../memory/game-content-cache';
import type { Presenter } from './presenter';
import { answerPrompt, introductionPrompt, questionPrompt } from './prompts';
import { characterSourceId } from './roster';

export const DEFAULT_EXIT_TOKEN = 'EXIT';

/** Size units of background handed to the model per answer */
export const DEFAULT_CONTEXT_BUDGET = 300;

export interface ConversationDeps {
  backend: GenerationBackend;
  cache: GameContentCache;
  context: ContextIndex;
  presenter: Presenter;
  logger?: Logger;
}

export interface ConversationOptions {
  /** A question containing this (any case) ends the visit. Defaults to "EXIT". */
  exitToken?: string;
  contextBudget?: number;
}

export interface VisitOptions {
  /** Questions allowed in this visit */
  maxTurns: number;
  /** Called each time a question is counted, before it is answered */
  onTurn?: (state: Readonly<ConversationState>) => void | Promise<void>;
}

export interface VisitResult {
  messages: TranscriptMessage[];
  turnCount: number;
  endedBy: ConversationEndReason;
  /** Set when endedBy is 'generation_failure' */
  failure?: GenerationFailure;
}

/**
 * One character interview:
 *
 *   introducing -> asking -> answering -> asking ... -> ended
 *
 * The turn cap is checked on every entry to `asking`, so a visit asks at most
 * `maxTurns` questions. Generation failures end the visit instead of
 * propagating; the turns asked so far still count.
 */
export class ConversationMachine {
  readonly #backend: GenerationBackend;
  readonly #cache: GameContentCache;
  readonly #context: ContextIndex;
  readonly #presenter: Presenter;
  readonly #logger: Logger;
  readonly #exitToken: string;
  readonly #contextBudget: number;

  constructor(deps: ConversationDeps, options: ConversationOptions = {}) {
    const exitToken = (options.exitToken ?? DEFAULT_EXIT_TOKEN).trim();
    if (exitToken.length === 0) {
      throw new Error('ConversationMachine requires a non-empty exit token');
    }
    this.#backend = deps.backend;
    this.#cache = deps.cache;
    this.#context = deps.context;
    this.#presenter = deps.presenter;
    this.#logger = deps.logger ?? defaultLogger;
    this.#exitToken = exitToken.toLowerCase();
    this.#contextBudget = options.contextBudget ?? DEFAULT_CONTEXT_BUDGET;
  }

  start(character: Character, scenario: Scenario): ConversationState {
    return { character, scenario, messageLog: [], turnCount: 0, phase: 'introducing' };
  }

  /** Drive a fresh visit until it ends. */
  async run(character: Character, scenario: Scenario, options: VisitOptions): Promise<VisitResult> {
    const state = this.start(character, scenario);
    this.#logger.info('visit_started', { character: character.name, maxTurns: options.maxTurns });

    let endedBy: ConversationEndReason | null = null;
    let failure: GenerationFailure | undefined;

    while (endedBy === null) {
      const turns = state.turnCount;
      try {
        endedBy = await this.step(state, options.maxTurns);
      } catch (err) {
        if (!(err instanceof GenerationFailure)) throw err;
        state.phase = 'ended';
        endedBy = 'generation_failure';
        failure = err;
        this.#logger.warn('visit_aborted', { character: character.name, step: err.step, error: err.message });
      }
      if (state.turnCount > turns && options.onTurn) await options.onTurn(state);
    }

    this.#logger.info('visit_ended', { character: character.name, turnCount: state.turnCount, endedBy });
    return { messages: state.messageLog, turnCount: state.turnCount, endedBy, failure };
  }

  /**
   * Perform one transition on `state`. Returns why the visit ended once it
   * reaches `ended`, otherwise null. Generation failures are thrown.
   */
  async step(state: ConversationState, maxTurns: number): Promise<ConversationEndReason | null> {
    switch (state.phase) {
      case 'introducing':
        await this.#introduce(state);
        state.phase = 'asking';
        return null;

      case 'asking': {
        if (state.turnCount >= maxTurns) {
          state.phase = 'ended';
          return 'turn_limit';
        }
        const question = await this.#ask(state);
        if (question === null) return null;
        if (question.toLowerCase().includes(this.#exitToken)) {
          state.phase = 'ended';
          return 'exit';
        }
        state.phase = 'answering';
        return null;
      }

      case 'answering':
        await this.#answer(state);
        state.phase = 'asking';
        return null;

      case 'ended':
        throw new Error('ConversationMachine.step requires a visit that has not ended');
    }
  }

  // ── Phases ─────────────────────────────────────────────────────────

  async #introduce(state: ConversationState): Promise<void> {
    const { character, scenario } = state;
    const cached = this.#cache.getIntroduction(character, scenario);

    let text = cached;
    if (text === undefined) {
      text = await this.#backend.generateText({
        step: 'introduceCharacter',
        ...introductionPrompt(character, scenario),
      });
      this.#cache.setIntroduction(character, scenario, text);
    }

    state.messageLog.push({ speaker: 'character', name: character.name, text });
    state.turnCount = 0;
    this.#presenter.showIntroduction(character, text, cached !== undefined);
  }

  /** The question asked, or null when the player typed nothing. */
  async #ask(state: ConversationState): Promise<string | null> {
    const { character, scenario } = state;
    const choice = await this.#presenter.askOrType(character);

    let question: string;
    if (choice.kind === 'typed') {
      question = choice.text.trim();
      if (question.length === 0) {
        this.#presenter.showNotice({ kind: 'invalid_question' });
        return null;
      }
    } else {
      question = (await this.#backend.generateText({
        step: 'askQuestion',
        ...questionPrompt(character, scenario, state.messageLog),
      })).trim();
    }

    state.turnCount += 1;
    state.messageLog.push({ speaker: 'detective', text: question });
    this.#presenter.showQuestion(character, question);
    return question;
  }

  async #answer(state: ConversationState): Promise<void> {
    const { character, scenario, messageLog } = state;
    const question = latestQuestion(messageLog);

    const retrieved = await this.#context.query(characterSourceId(character), question, this.#contextBudget);
    const background = retrieved.length > 0 ? retrieved : character.backstory;

    const text = await this.#backend.generateText({
      step: 'answerQuestion',
      ...answerPrompt(character, background, scenario, messageLog, question),
    });

    messageLog.push({ speaker: 'character', name: character.name, text });
    this.#presenter.showAnswer(character, text);
  }
}

function latestQuestion(log: readonly TranscriptMessage[]): string {
  for (let i = log.length - 1; i >= 0; i--) {
    if (log[i].speaker === 'detective') return log[i].text;
  }
  throw new Error('Answering requires a question in the transcript');
}
