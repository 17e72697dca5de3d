import type { ConverseCommandInput } from '@aws-sdk/client-bedrock-runtime';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import {
  BedrockEmbeddings,
  BedrockGenerationBackend,
  MODEL_SHORTCUTS,
  resolveModelId,
  splitReasoningAndJson,
  toConverseMessages,
  type BedrockTransport,
  type ConverseReply,
} from '../bedrock';
import { GenerationFailure } from '../errors';
import { RosterSchema } from '../generation-state';
import { Logger } from '../logger';

const silent = new Logger('silent');

interface RecordedCall {
  modelId?: string;
  system?: string;
  messageCount: number;
  lastUserText?: string;
}

/** Replies from a script, one per converse call; an Error entry is thrown. */
function scriptedTransport(script: Array<string | Error>) {
  const calls: RecordedCall[] = [];
  const embeddings: unknown[] = [];
  const transport: BedrockTransport = {
    async converse(input: ConverseCommandInput): Promise<ConverseReply> {
      const messages = input.messages ?? [];
      const last = messages[messages.length - 1];
      calls.push({
        modelId: input.modelId,
        system: input.system?.[0]?.text,
        messageCount: messages.length,
        lastUserText: last?.content?.[0]?.text,
      });
      const next = script.shift();
      if (next === undefined) throw new Error('script exhausted');
      if (next instanceof Error) throw next;
      return { text: next, usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 } };
    },
    async invokeJson(_modelId, body) {
      embeddings.push(body);
      return { embedding: [0.5, 0.5] };
    },
  };
  return { transport, calls, embeddings };
}

const validRoster = JSON.stringify({
  characters: [
    { role: 'victim', name: 'Silas Grey', backstory: 'Harbor master.' },
    { role: 'KILLER', name: 'Mara Quill', backstory: 'Chandler.' },
    { role: 'Suspect', name: 'Tobias Reed', backstory: 'Fisherman.' },
  ],
});

describe('BedrockGenerationBackend', () => {
  it('parses fenced JSON after a reasoning preamble', async () => {
    const { transport } = scriptedTransport([`Let me think about the harbor.\n\`\`\`json\n${validRoster}\n\`\`\``]);
    const backend = new BedrockGenerationBackend(transport, { logger: silent });

    const roster = await backend.generateStructured({
      step: 'createCharacters',
      systemPrompt: 'system',
      userPrompt: 'Generate the cast of characters.',
      schema: RosterSchema,
    });

    expect(roster.characters.map((c) => c.role)).toEqual(['Victim', 'Killer', 'Suspect']);
  });

  it('asks for a correction when the output fails validation', async () => {
    const twoKillers = JSON.stringify({
      characters: [
        { role: 'Killer', name: 'A', backstory: 'a' },
        { role: 'Killer', name: 'B', backstory: 'b' },
        { role: 'Victim', name: 'C', backstory: 'c' },
      ],
    });
    const { transport, calls } = scriptedTransport([twoKillers, validRoster]);
    const backend = new BedrockGenerationBackend(transport, { logger: silent });

    const roster = await backend.generateStructured({
      step: 'createCharacters',
      systemPrompt: 'system',
      userPrompt: 'go',
      schema: RosterSchema,
    });

    expect(roster.characters).toHaveLength(3);
    expect(calls).toHaveLength(2);
    expect(calls[1].messageCount).toBe(3);
    expect(calls[1].lastUserText).toContain('expected exactly 1 Killer, got 2');
  });

  it('throws GenerationFailure once every attempt is rejected', async () => {
    const { transport, calls } = scriptedTransport(['not json', 'still not json']);
    const backend = new BedrockGenerationBackend(transport, { maxRetries: 1, logger: silent });

    const attempt = backend.generateStructured({
      step: 'createScenario',
      systemPrompt: 'system',
      userPrompt: 'go',
      schema: z.object({ victimName: z.string() }),
    });

    await expect(attempt).rejects.toBeInstanceOf(GenerationFailure);
    await expect(attempt).rejects.toThrow('[createScenario] structured output failed after 2 attempts');
    expect(calls).toHaveLength(2);
  });

  it('wraps transport errors in GenerationFailure', async () => {
    const { transport } = scriptedTransport([new Error('ThrottlingException')]);
    const backend = new BedrockGenerationBackend(transport, { logger: silent });

    await expect(backend.generateText({ step: 'narrate', systemPrompt: 's', messages: [] }))
      .rejects.toThrow('[narrate] Bedrock request failed: ThrottlingException');
  });

  it('returns trimmed text and rejects an empty reply', async () => {
    const { transport } = scriptedTransport(['  Evening, detective.  ', '   ']);
    const backend = new BedrockGenerationBackend(transport, { logger: silent });
    const request = { step: 'introduceCharacter' as const, systemPrompt: 's', messages: [] };

    expect(await backend.generateText(request)).toBe('Evening, detective.');
    await expect(backend.generateText(request)).rejects.toBeInstanceOf(GenerationFailure);
  });

  it('uses the per-step model override', async () => {
    const { transport, calls } = scriptedTransport(['Where were you at midnight?']);
    const backend = new BedrockGenerationBackend(transport, {
      modelConfig: { default: 'haiku', steps: { askQuestion: 'sonnet' } },
      logger: silent,
    });

    await backend.generateText({ step: 'askQuestion', systemPrompt: 'ask', messages: [] });

    expect(calls[0].modelId).toBe(MODEL_SHORTCUTS.sonnet);
    expect(calls[0].system).toBe('ask');
  });
});

describe('resolveModelId', () => {
  it('expands shortcuts and passes full ids through', () => {
    expect(resolveModelId('narrate', { default: 'Haiku' })).toBe(MODEL_SHORTCUTS.haiku);
    expect(resolveModelId('narrate', { default: 'custom.model-v1' })).toBe('custom.model-v1');
  });
});

describe('toConverseMessages', () => {
  it('merges consecutive turns from the same side', () => {
    expect(toConverseMessages([
      { role: 'user', content: 'Hello.' },
      { role: 'user', content: 'Anyone here?' },
      { role: 'assistant', content: 'Yes.' },
    ])).toEqual([
      { role: 'user', content: [{ text: 'Hello.\n\nAnyone here?' }] },
      { role: 'assistant', content: [{ text: 'Yes.' }] },
    ]);
  });

  it('opens with a user turn', () => {
    expect(toConverseMessages([{ role: 'assistant', content: 'Good evening.' }])).toEqual([
      { role: 'user', content: [{ text: 'Begin.' }] },
      { role: 'assistant', content: [{ text: 'Good evening.' }] },
    ]);
    expect(toConverseMessages([])).toEqual([{ role: 'user', content: [{ text: 'Begin.' }] }]);
  });
});

describe('splitReasoningAndJson', () => {
  it('separates a preamble from a bare object', () => {
    expect(splitReasoningAndJson('Thinking first. {"a": 1}')).toEqual({ reasoning: 'Thinking first.', jsonStr: '{"a": 1}' });
  });

  it('treats text without a preamble as JSON', () => {
    expect(splitReasoningAndJson(' {"a": 1} ')).toEqual({ reasoning: '', jsonStr: '{"a": 1}' });
  });

  it('prefers a fenced block', () => {
    expect(splitReasoningAndJson('Plan.\n```json\n{"a": [1]}\n```\nDone.')).toEqual({ reasoning: 'Plan.', jsonStr: '{"a": [1]}' });
  });
});

describe('BedrockEmbeddings', () => {
  it('requests one normalized embedding per text', async () => {
    const { transport, embeddings } = scriptedTransport([]);
    const similarity = new BedrockEmbeddings(transport, { dimensions: 256 });

    const vectors = await similarity.embed(['tide', 'boat']);

    expect(vectors).toEqual([[0.5, 0.5], [0.5, 0.5]]);
    expect(embeddings).toEqual([
      { inputText: 'tide', dimensions: 256, normalize: true },
      { inputText: 'boat', dimensions: 256, normalize: true },
    ]);
  });
});
