import { describe, expect, it } from 'vitest';

import { ConversationMachine } from '../conversation-machine';
import { characterSourceId } from '../roster';
import { ContextIndex } from '../../memory/context-index';
import { GameContentCache } from '../../memory/game-content-cache';
import { GenerationFailure } from '../../shared/errors';
import { Logger } from '../../shared/logger';
import { FakeBackend, ScriptedPresenter, type FakeBackendOptions, type PresenterScript } from './fakes';
import { HARBOR_ROSTER, HARBOR_SCENARIO } from './fixtures';

const silent = new Logger('silent');
const mara = HARBOR_ROSTER[1];

function setup(script: PresenterScript, backendOptions: FakeBackendOptions = {}, cache = new GameContentCache()) {
  const backend = new FakeBackend(backendOptions);
  const presenter = new ScriptedPresenter(script);
  const context = new ContextIndex({ logger: silent });
  const machine = new ConversationMachine({ backend, cache, context, presenter, logger: silent });
  return { backend, presenter, context, cache, machine };
}

describe('ConversationMachine', () => {
  it('introduces, asks, answers and ends on the exit token', async () => {
    const { machine } = setup({
      questions: [{ kind: 'generate' }, { kind: 'typed', text: 'That will do. Exit' }],
    });

    const result = await machine.run(mara, HARBOR_SCENARIO, { maxTurns: 24 });

    expect(result.endedBy).toBe('exit');
    expect(result.turnCount).toBe(2);
    expect(result.failure).toBeUndefined();
    expect(result.messages).toEqual([
      { speaker: 'character', name: 'Mara Quill', text: 'Evening, detective.' },
      { speaker: 'detective', text: 'Where were you at midnight?' },
      { speaker: 'character', name: 'Mara Quill', text: 'Asleep, I swear it.' },
      { speaker: 'detective', text: 'That will do. Exit' },
    ]);
  });

  it('stops at the turn cap before asking again', async () => {
    const { machine, backend } = setup({
      questions: [{ kind: 'generate' }, { kind: 'typed', text: 'And the ledger?' }],
    });

    const result = await machine.run(mara, HARBOR_SCENARIO, { maxTurns: 2 });

    expect(result.endedBy).toBe('turn_limit');
    expect(result.turnCount).toBe(2);
    expect(result.messages).toHaveLength(5);
    expect(backend.calls('answerQuestion')).toBe(2);
  });

  it('ends straight after the introduction with no turns left', async () => {
    const { machine } = setup({});

    const result = await machine.run(mara, HARBOR_SCENARIO, { maxTurns: 0 });

    expect(result).toEqual({
      messages: [{ speaker: 'character', name: 'Mara Quill', text: 'Evening, detective.' }],
      turnCount: 0,
      endedBy: 'turn_limit',
      failure: undefined,
    });
  });

  it('re-prompts on an empty typed question without counting a turn', async () => {
    const { machine, presenter } = setup({
      questions: [{ kind: 'typed', text: '   ' }, { kind: 'typed', text: 'EXIT' }],
    });

    const result = await machine.run(mara, HARBOR_SCENARIO, { maxTurns: 24 });

    expect(presenter.notices).toEqual([{ kind: 'invalid_question' }]);
    expect(result.turnCount).toBe(1);
    expect(result.endedBy).toBe('exit');
  });

  it('reports each counted question before it is answered', async () => {
    const { machine } = setup({
      questions: [{ kind: 'typed', text: '  ' }, { kind: 'generate' }, { kind: 'typed', text: 'exit' }],
    });
    const turns: Array<[number, string]> = [];

    await machine.run(mara, HARBOR_SCENARIO, {
      maxTurns: 24,
      onTurn: (state) => {
        turns.push([state.turnCount, state.messageLog[state.messageLog.length - 1].text]);
      },
    });

    expect(turns).toEqual([
      [1, 'Where were you at midnight?'],
      [2, 'exit'],
    ]);
  });

  it('reuses a cached introduction on the next visit', async () => {
    const cache = new GameContentCache();
    const first = setup({ questions: [{ kind: 'typed', text: 'exit' }] }, {}, cache);
    const second = setup({ questions: [{ kind: 'typed', text: 'exit' }] }, {}, cache);

    await first.machine.run(mara, HARBOR_SCENARIO, { maxTurns: 24 });
    await second.machine.run(mara, HARBOR_SCENARIO, { maxTurns: 24 });

    expect(first.presenter.introductions).toEqual([{ name: 'Mara Quill', text: 'Evening, detective.', cached: false }]);
    expect(second.presenter.introductions).toEqual([{ name: 'Mara Quill', text: 'Evening, detective.', cached: true }]);
    expect(second.backend.calls('introduceCharacter')).toBe(0);
  });

  it('answers from the retrieved slice of the background', async () => {
    const { machine, backend, context } = setup({
      questions: [{ kind: 'typed', text: 'What about the ledger?' }, { kind: 'typed', text: 'exit' }],
    });
    await context.addSource(characterSourceId(mara), 'Kept the ledger hidden.');

    await machine.run(mara, HARBOR_SCENARIO, { maxTurns: 24 });

    const answer = backend.textRequests.find((r) => r.step === 'answerQuestion');
    expect(answer?.systemPrompt).toContain('Relevant Background: Kept the ledger hidden.\n');
    expect(answer?.systemPrompt).toContain('Question: What about the ledger?');
    expect(answer?.messages).toEqual([
      { role: 'assistant', content: 'Evening, detective.' },
      { role: 'user', content: 'What about the ledger?' },
    ]);
  });

  it('falls back to the full backstory for a character that was never indexed', async () => {
    const { machine, backend } = setup({
      questions: [{ kind: 'typed', text: 'Why the pier?' }, { kind: 'typed', text: 'exit' }],
    });

    await machine.run(mara, HARBOR_SCENARIO, { maxTurns: 24 });

    const answer = backend.textRequests.find((r) => r.step === 'answerQuestion');
    expect(answer?.systemPrompt).toContain(`Relevant Background: ${mara.backstory}\n`);
  });

  it('gives the question generator the detective perspective', async () => {
    const { machine, backend } = setup({
      questions: [{ kind: 'generate' }, { kind: 'typed', text: 'exit' }],
    });

    await machine.run(mara, HARBOR_SCENARIO, { maxTurns: 24 });

    const ask = backend.textRequests.find((r) => r.step === 'askQuestion');
    expect(ask?.messages).toEqual([{ role: 'user', content: 'Evening, detective.' }]);
  });

  it('ends the visit on a generation failure and keeps the turns asked', async () => {
    const { machine } = setup(
      { questions: [{ kind: 'typed', text: 'Where is the ledger?' }] },
      { failing: ['answerQuestion'] },
    );

    const result = await machine.run(mara, HARBOR_SCENARIO, { maxTurns: 24 });

    expect(result.endedBy).toBe('generation_failure');
    expect(result.turnCount).toBe(1);
    expect(result.failure).toBeInstanceOf(GenerationFailure);
    expect(result.failure?.step).toBe('answerQuestion');
    expect(result.messages.map((m) => m.speaker)).toEqual(['character', 'detective']);
  });

  it('lets presenter errors propagate', async () => {
    const { machine } = setup({});

    await expect(machine.run(mara, HARBOR_SCENARIO, { maxTurns: 24 })).rejects.toThrow('script has no question left');
  });

  it('advances one transition per step', async () => {
    const { machine } = setup({ questions: [{ kind: 'typed', text: 'exit' }] });
    const state = machine.start(mara, HARBOR_SCENARIO);

    expect(await machine.step(state, 24)).toBeNull();
    expect(state.phase).toBe('asking');
    expect(await machine.step(state, 24)).toBe('exit');
    expect(state.phase).toBe('ended');
    await expect(machine.step(state, 24)).rejects.toThrow('has not ended');
  });
});
