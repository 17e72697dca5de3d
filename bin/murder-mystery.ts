#!/usr/bin/env node
import 'dotenv/config';
import { readFileSync, writeFileSync } from 'node:fs';
import { parseArgs } from 'node:util';
import { ConsolePresenter, createTerminal } from '../lib/cli/console-presenter';
import { promptSettings } from '../lib/cli/parameters';
import { ConversationMachine } from '../lib/game/conversation-machine';
import { createSessionState, SessionMachine } from '../lib/game/session-machine';
import { restoreSession, serializeSession } from '../lib/game/session-store';
import { CacheStore } from '../lib/memory/cache-store';
import { ContextIndex } from '../lib/memory/context-index';
import { GameContentCache } from '../lib/memory/game-content-cache';
import { BedrockEmbeddings, BedrockGenerationBackend, createBedrockTransport } from '../lib/shared/bedrock';
import { loadConfig } from '../lib/shared/config';
import { describeError } from '../lib/shared/errors';
import { logger } from '../lib/shared/logger';

const USAGE = 'Usage: murder-mystery [--yes] [--save <file>] [--resume <file>]';

async function main(argv: string[]): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      yes: { type: 'boolean', short: 'y', default: false },
      save: { type: 'string' },
      resume: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
  if (values.help) {
    process.stdout.write(`${USAGE}\n`);
    return;
  }

  const config = loadConfig();
  logger.setLevel(config.logLevel);

  // Bedrock: one client for chat and embeddings
  const transport = createBedrockTransport();
  const backend = new BedrockGenerationBackend(transport, {
    modelConfig: config.models,
    maxRetries: config.maxRetries,
  });

  // Memory
  const cache = new GameContentCache(new CacheStore({
    maxSize: config.cache.maxSize,
    defaultTtlMs: config.cache.ttlMs,
  }));
  const context = new ContextIndex({
    chunkSize: config.context.chunkSize,
    chunkOverlap: config.context.chunkOverlap,
    maxChunksPerQuery: config.context.maxChunksPerQuery,
    similarity: config.context.embeddings
      ? new BedrockEmbeddings(transport, { modelId: config.context.embeddingModelId })
      : undefined,
  });

  const terminal = createTerminal();
  try {
    const presenter = new ConsolePresenter(terminal);
    const conversation = new ConversationMachine(
      { backend, cache, context, presenter },
      { exitToken: config.exitToken, contextBudget: config.context.budget },
    );

    const state = values.resume
      ? restoreSession(readFileSync(values.resume, 'utf8'))
      : createSessionState(values.yes ? config.session : await promptSettings(terminal, config.session));

    const savePath = values.save;
    const session = new SessionMachine(
      { backend, cache, context, presenter, conversation },
      state,
      {
        maxTurnsPerVisit: config.maxTurnsPerVisit,
        onTransition: savePath
          ? (snapshot) => writeFileSync(savePath, serializeSession(snapshot))
          : undefined,
      },
    );

    if (state.phase === 'creating') {
      terminal.write(`Creating a mystery in: ${state.environment} ...`);
    }
    await session.run();
    logger.info('cache_stats', { ...cache.stats() });
  } finally {
    terminal.close();
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  logger.debug('fatal_error', { stack: err instanceof Error ? err.stack : undefined });
  process.stderr.write(`murder-mystery: ${describeError(err)}\n`);
  process.exitCode = 1;
});
