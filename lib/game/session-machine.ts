import type { Character } from '../types/character';
import type { ConversationState } from '../types/conversation';
import type { Scenario } from '../types/scenario';
import type {
  InvestigationProgress,
  SessionOutcome,
  SessionSettings,
  SessionSnapshot,
  SessionState,
  TerminalPhase,
} from '../types/session';
import { describeError, InvalidAccusation, InvalidSelection } from '../shared/errors';
import { RosterSchema, ScenarioSchema, type GenerationBackend } from '../shared/generation-state';
import { logger as defaultLogger, type Logger } from '../shared/logger';
import type { ContextIndex } from '../memory/context-index';
import type { GameContentCache } from '../memory/game-content-cache';
import { ConversationMachine } from './conversation-machine';
import type { CharacterSelection, Presenter } from './presenter';
import { charactersPrompt, narrationPrompt, scenarioPrompt } from './prompts';
import {
  assertPlayableRoster,
  characterSourceId,
  findKiller,
  interviewableCount,
  suspectsForAccusation,
} from './roster';

export const DEFAULT_MAX_TURNS_PER_VISIT = 24;

export interface SessionDeps {
  backend: GenerationBackend;
  cache: GameContentCache;
  context: ContextIndex;
  presenter: Presenter;
  /** Built from the other deps when omitted */
  conversation?: ConversationMachine;
  logger?: Logger;
  /** Source of the case number that varies the cast between runs */
  random?: () => number;
}

export interface SessionOptions {
  maxTurnsPerVisit?: number;
  /** After a wrong accusation with guesses left, go back to interviews (default) or accuse again */
  returnToInvestigationOnMiss?: boolean;
  /**
   * Called with a snapshot after every transition, e.g. to save progress.
   * During a visit it is also called after each question, with that visit's
   * turns and transcript already folded in.
   */
  onTransition?: (snapshot: SessionSnapshot) => void | Promise<void>;
}

/** Fresh state for a session that still has to create its case. */
export function createSessionState(settings: SessionSettings): SessionState {
  return {
    environment: settings.environment,
    rosterSize: settings.rosterSize,
    roster: [],
    scenario: null,
    visited: new Set(),
    totalActions: 0,
    actionLimit: settings.actionLimit,
    guessesLeft: settings.guesses,
    phase: 'creating',
    selectedIndex: null,
    messageLog: [],
  };
}

export function isTerminal(phase: SessionState['phase']): phase is TerminalPhase {
  return phase === 'won' || phase === 'lost';
}

/**
 * Top-level controller for one playthrough:
 *
 *   creating -> narrating -> selecting <-> conversing
 *   selecting -> accusing -> selecting | accusing | won | lost
 *
 * Owns the session state; nothing else mutates it. Failures while creating or
 * narrating reject `run()`. Failures inside a visit end that visit only.
 */
export class SessionMachine {
  readonly #backend: GenerationBackend;
  readonly #cache: GameContentCache;
  readonly #context: ContextIndex;
  readonly #presenter: Presenter;
  readonly #conversation: ConversationMachine;
  readonly #logger: Logger;
  readonly #random: () => number;
  readonly #maxTurnsPerVisit: number;
  readonly #returnToInvestigationOnMiss: boolean;
  readonly #onTransition?: (snapshot: SessionSnapshot) => void | Promise<void>;
  readonly #state: SessionState;

  constructor(deps: SessionDeps, state: SessionState, options: SessionOptions = {}) {
    const maxTurnsPerVisit = options.maxTurnsPerVisit ?? DEFAULT_MAX_TURNS_PER_VISIT;
    if (!Number.isInteger(maxTurnsPerVisit) || maxTurnsPerVisit < 1) {
      throw new RangeError(`maxTurnsPerVisit must be a positive integer, got ${maxTurnsPerVisit}`);
    }
    if (!Number.isInteger(state.guessesLeft) || state.guessesLeft < 0) {
      throw new RangeError(`guessesLeft must be a non-negative integer, got ${state.guessesLeft}`);
    }

    this.#backend = deps.backend;
    this.#cache = deps.cache;
    this.#context = deps.context;
    this.#presenter = deps.presenter;
    this.#logger = deps.logger ?? defaultLogger;
    this.#conversation = deps.conversation ?? new ConversationMachine({
      backend: deps.backend,
      cache: deps.cache,
      context: deps.context,
      presenter: deps.presenter,
      logger: this.#logger,
    });
    this.#random = deps.random ?? Math.random;
    this.#maxTurnsPerVisit = maxTurnsPerVisit;
    this.#returnToInvestigationOnMiss = options.returnToInvestigationOnMiss ?? true;
    this.#onTransition = options.onTransition;
    this.#state = state;
  }

  get phase(): SessionState['phase'] {
    return this.#state.phase;
  }

  /** Play until the session is won or lost. */
  async run(): Promise<SessionOutcome> {
    await this.#reindexRoster();

    while (!isTerminal(this.#state.phase)) {
      await this.step();
    }

    const outcome = this.outcome();
    this.#logger.info('session_finished', { ...outcome });
    this.#presenter.showResult(outcome);
    return outcome;
  }

  /**
   * Perform one transition (or one re-prompt). Returns true when the state
   * changed, in which case the presenter and `onTransition` have seen it.
   */
  async step(): Promise<boolean> {
    const from = this.#state.phase;
    let changed = true;

    switch (from) {
      case 'creating':
        await this.#create();
        break;
      case 'narrating':
        await this.#narrate();
        break;
      case 'selecting':
        changed = await this.#select();
        break;
      case 'conversing':
        await this.#converse();
        break;
      case 'accusing':
        changed = await this.#accuse();
        break;
      case 'won':
      case 'lost':
        return false;
    }

    if (changed) {
      this.#logger.debug('session_transition', { from, to: this.#state.phase });
      const snapshot = this.snapshot();
      this.#presenter.render(snapshot);
      if (this.#onTransition) await this.#onTransition(snapshot);
    }
    return changed;
  }

  snapshot(): SessionSnapshot {
    const s = this.#state;
    return {
      environment: s.environment,
      rosterSize: s.rosterSize,
      roster: s.roster.map((c) => ({ ...c })),
      scenario: s.scenario ? { ...s.scenario } : null,
      visited: [...s.visited],
      totalActions: s.totalActions,
      actionLimit: s.actionLimit,
      guessesLeft: s.guessesLeft,
      phase: s.phase,
      selectedIndex: s.selectedIndex,
      messageLog: s.messageLog.map((m) => ({ ...m })),
    };
  }

  progress(): InvestigationProgress {
    const s = this.#state;
    return {
      totalActions: s.totalActions,
      actionLimit: s.actionLimit,
      visitedCount: s.visited.size,
      interviewableCount: interviewableCount(s.roster),
      guessesLeft: s.guessesLeft,
    };
  }

  outcome(): SessionOutcome {
    const { phase } = this.#state;
    if (!isTerminal(phase)) {
      throw new Error(`SessionMachine.outcome requires a finished session, phase is ${phase}`);
    }
    return {
      phase,
      killerName: findKiller(this.#state.roster).name,
      guessesLeft: this.#state.guessesLeft,
      totalActions: this.#state.totalActions,
    };
  }

  // ============================================
  // Creating
  // ============================================

  async #create(): Promise<void> {
    const s = this.#state;
    const caseNumber = 1000 + Math.floor(this.#random() * 9000);

    const { characters } = await this.#backend.generateStructured({
      step: 'createCharacters',
      ...charactersPrompt(s.environment, s.rosterSize, caseNumber),
      schema: RosterSchema,
    });
    assertPlayableRoster(characters);
    if (characters.length !== s.rosterSize) {
      this.#logger.warn('roster_size_mismatch', { requested: s.rosterSize, generated: characters.length });
    }

    for (const character of characters) {
      await this.#index(character);
    }

    const scenario = await this.#backend.generateStructured({
      step: 'createScenario',
      ...scenarioPrompt(s.environment, characters),
      schema: ScenarioSchema,
    });
    const victim = characters.find((c) => c.role === 'Victim');
    if (victim && victim.name !== scenario.victimName) {
      this.#logger.warn('scenario_victim_mismatch', { roster: victim.name, scenario: scenario.victimName });
    }

    s.roster = characters;
    s.scenario = scenario;
    s.phase = 'narrating';
    this.#logger.info('case_created', { environment: s.environment, characters: characters.length, caseNumber });
  }

  async #index(character: Character): Promise<void> {
    await this.#context.addSource(characterSourceId(character), character.backstory, {
      name: character.name,
      role: character.role,
    });
  }

  /**
   * A resumed session brings its roster but not the index built from it.
   * Source ids cover each character's text, so a present id is this roster's.
   */
  async #reindexRoster(): Promise<void> {
    for (const character of this.#state.roster) {
      if (!this.#context.has(characterSourceId(character))) {
        await this.#index(character);
      }
    }
  }

  // ============================================
  // Narrating
  // ============================================

  async #narrate(): Promise<void> {
    const s = this.#state;
    const scenario = this.#requireScenario();

    let text = this.#cache.getNarration(s.environment, scenario);
    if (text === undefined) {
      text = await this.#backend.generateText({ step: 'narrate', ...narrationPrompt(scenario) });
      this.#cache.setNarration(s.environment, scenario, text);
    }

    s.messageLog.push({ speaker: 'narrator', text });
    this.#presenter.showNarration(text);
    s.phase = 'selecting';
  }

  // ============================================
  // Selecting
  // ============================================

  async #select(): Promise<boolean> {
    const s = this.#state;

    if (s.actionLimit !== undefined && s.totalActions >= s.actionLimit) {
      this.#presenter.showNotice({ kind: 'action_limit', limit: s.actionLimit });
      s.phase = 'accusing';
      return true;
    }

    const selection = await this.#presenter.selectCharacter(s.roster, s.visited, this.progress());
    if (selection.kind === 'accuse') {
      s.phase = 'accusing';
      return true;
    }

    try {
      this.#validateSelection(selection);
    } catch (err) {
      if (!(err instanceof InvalidSelection)) throw err;
      this.#presenter.showNotice({ kind: 'invalid_selection', message: err.message });
      return false;
    }

    s.selectedIndex = selection.index;
    s.phase = 'conversing';
    return true;
  }

  #validateSelection(selection: Extract<CharacterSelection, { kind: 'character' }>): void {
    const { roster } = this.#state;
    const { index } = selection;
    if (!Number.isInteger(index) || index < 0 || index >= roster.length) {
      throw new InvalidSelection(`Choose a number between 1 and ${roster.length}`);
    }
    if (roster[index].role === 'Victim') {
      throw new InvalidSelection(`${roster[index].name} is the victim and cannot be interviewed`);
    }
  }

  // ============================================
  // Conversing
  // ============================================

  async #converse(): Promise<void> {
    const s = this.#state;
    const scenario = this.#requireScenario();
    const index = s.selectedIndex;
    if (index === null) {
      throw new Error('SessionMachine requires a selected character to start a visit');
    }
    const character = s.roster[index];

    const remaining = s.actionLimit === undefined
      ? Number.POSITIVE_INFINITY
      : Math.max(0, s.actionLimit - s.totalActions);
    const maxTurns = Math.min(this.#maxTurnsPerVisit, remaining);

    const onTurn = this.#onTransition
      ? (visit: Readonly<ConversationState>) => this.#checkpoint(index, visit)
      : undefined;
    const result = await this.#conversation.run(character, scenario, { maxTurns, onTurn });

    s.visited.add(index);
    s.totalActions += result.turnCount;
    s.messageLog.push(...result.messages);
    s.selectedIndex = null;
    s.phase = 'selecting';

    if (result.failure) {
      this.#presenter.showNotice({
        kind: 'visit_failed',
        character: character.name,
        message: describeError(result.failure),
      });
    }
  }

  /** A resumed checkpoint restarts the visit but keeps the questions already asked charged. */
  async #checkpoint(index: number, visit: Readonly<ConversationState>): Promise<void> {
    if (!this.#onTransition) return;
    const snapshot = this.snapshot();
    if (!snapshot.visited.includes(index)) snapshot.visited.push(index);
    snapshot.totalActions += visit.turnCount;
    snapshot.messageLog.push(...visit.messageLog.map((m) => ({ ...m })));
    await this.#onTransition(snapshot);
  }

  // ============================================
  // Accusing
  // ============================================

  async #accuse(): Promise<boolean> {
    const s = this.#state;
    const suspects = suspectsForAccusation(s.roster);
    const answer = await this.#presenter.accuse(suspects, s.guessesLeft);

    let accused: Character;
    try {
      accused = matchSuspect(suspects, answer);
    } catch (err) {
      if (!(err instanceof InvalidAccusation)) throw err;
      this.#presenter.showNotice({ kind: 'invalid_accusation', message: err.message });
      return false;
    }

    if (accused.role === 'Killer') {
      s.phase = 'won';
      return true;
    }

    s.guessesLeft -= 1;
    this.#logger.info('accusation_missed', { accused: accused.name, guessesLeft: s.guessesLeft });
    if (s.guessesLeft <= 0) {
      s.guessesLeft = 0;
      s.phase = 'lost';
      return true;
    }

    this.#presenter.showNotice({ kind: 'incorrect_accusation', accused: accused.name, guessesLeft: s.guessesLeft });
    s.phase = this.#returnToInvestigationOnMiss ? 'selecting' : 'accusing';
    return true;
  }

  #requireScenario(): Scenario {
    const { scenario, phase } = this.#state;
    if (!scenario || this.#state.roster.length === 0) {
      throw new Error(`SessionMachine phase ${phase} requires a roster and scenario`);
    }
    return scenario;
  }
}

function matchSuspect(suspects: readonly Character[], answer: string): Character {
  const wanted = answer.trim().toLowerCase();
  const match = suspects.find((c) => c.name.toLowerCase() === wanted);
  if (!match) {
    throw new InvalidAccusation(`"${answer.trim()}" is not one of the suspects`);
  }
  return match;
}
