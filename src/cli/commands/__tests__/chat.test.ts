/**
 * Tests for chat command
 *
 * The readline loop itself is not driven here; the REPL commands and the
 * per-question handler carry the behavior.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import type Database from 'better-sqlite3';
import {
  createChatCommand,
  createLineQueue,
  handleQuestion,
  parseREPLCommand,
  REPL_COMMANDS,
  type ChatState,
} from '../chat.js';
import { createAdvisor } from '../../../agent/index.js';
import { DEFAULT_CONFIG } from '../../../config/defaults.js';
import { createIngestPipeline } from '../../../ingest/index.js';
import {
  ScriptedGenerator,
  createTestDatabase,
  createVocabularyEmbedder,
  deferred,
} from '../../../test-utils/index.js';
import { REVIEW_ROWS, VOCABULARY, createTestContext, type TestContext } from './helpers.js';

describe('parseREPLCommand', () => {
  it('returns null for a regular question', () => {
    expect(parseREPLCommand('Which blender is quiet?')).toBeNull();
  });

  it('parses a command with arguments', () => {
    const parsed = parseREPLCommand('/thread kitchen');

    expect(parsed?.command.name).toBe('thread');
    expect(parsed?.args).toEqual(['kitchen']);
  });

  it('resolves aliases case-insensitively', () => {
    expect(parseREPLCommand('/C')?.command.name).toBe('clear');
    expect(parseREPLCommand('/?')?.command.name).toBe('help');
  });

  it('treats bare exit and quit as the exit command', () => {
    expect(parseREPLCommand('exit')?.command.name).toBe('exit');
    expect(parseREPLCommand('  QUIT ')?.command.name).toBe('exit');
  });

  it('treats unknown slash commands as questions', () => {
    expect(parseREPLCommand('/kettle')).toBeNull();
  });
});

describe('chat session', () => {
  let db: Database.Database;
  let generator: ScriptedGenerator;
  let state: ChatState;
  let test: TestContext;

  const runREPLCommand = async (input: string): Promise<boolean> => {
    const parsed = parseREPLCommand(input);
    if (!parsed) {
      throw new Error(`not a REPL command: ${input}`);
    }
    return parsed.command.handler(parsed.args, state, test.ctx);
  };

  beforeEach(async () => {
    chalk.level = 0;
    const testDb = createTestDatabase();
    db = testDb.db;
    const embedder = createVocabularyEmbedder(VOCABULARY);
    const pipeline = await createIngestPipeline(DEFAULT_CONFIG, { embedder, database: testDb.ops });
    await pipeline.ingest(REVIEW_ROWS);

    generator = new ScriptedGenerator('Try the Blender [1].');
    const advisor = await createAdvisor(DEFAULT_CONFIG, {
      embedder,
      generator,
      database: testDb.ops,
    });
    test = createTestContext();
    state = { advisor, threadId: 'default', providerInfo: { name: 'openai', model: 'scripted-v1' } };
  });

  afterEach(() => {
    db.close();
  });

  it('has the expected name and options', () => {
    const command = createChatCommand(() => test.ctx);

    expect(command.name()).toBe('chat');
    expect(command.options.map((o) => o.long)).toEqual(['--thread', '--model']);
  });

  describe('handleQuestion', () => {
    it('prints the answer and records the exchange in the thread', async () => {
      await handleQuestion('quiet blender', state, test.ctx);

      expect(test.logs).toEqual([
        '',
        'Try the Blender [1].',
        '',
        'Sources:',
        '[1] Blender (0.95)',
        '',
      ]);
      expect(state.advisor.conversations.getThread('default')?.messages.map((m) => m.role)).toEqual([
        'user',
        'assistant',
      ]);
      expect(state.pending).toBeUndefined();
    });

    it('cancels the pending turn and rolls back the question', async () => {
      const answer = deferred<string>();
      generator.reply(() => answer.promise);

      const pending = handleQuestion('quiet blender', state, test.ctx);
      await vi.waitFor(() => expect(generator.calls).toHaveLength(1));
      state.pending?.abort();
      answer.resolve('too late');
      await pending;

      expect(test.logs).toEqual(['Cancelled.']);
      expect(state.advisor.conversations.getThread('default')?.messages).toEqual([]);
    });
  });

  describe('createLineQueue', () => {
    it('holds a second question until the pending turn settles', async () => {
      const first = deferred<string>();
      generator.reply(() => first.promise);
      const onError = vi.fn();
      const enqueue = createLineQueue((line) => handleQuestion(line, state, test.ctx), onError);

      const firstDone = enqueue('quiet blender');
      const secondDone = enqueue('quiet kettle');
      await vi.waitFor(() => expect(generator.calls).toHaveLength(1));

      state.pending?.abort();
      first.resolve('too late');
      await Promise.all([firstDone, secondDone]);

      expect(test.logs[0]).toBe('Cancelled.');
      expect(generator.calls).toHaveLength(2);
      expect(
        state.advisor.conversations.getThread('default')?.messages.map((m) => m.content)
      ).toEqual(['quiet kettle', 'Try the Blender [1].']);
      expect(state.pending).toBeUndefined();
      expect(onError).not.toHaveBeenCalled();
    });

    it('keeps going after a line fails', async () => {
      const handled: string[] = [];
      const onError = vi.fn();
      const enqueue = createLineQueue(async (line) => {
        if (line === 'bad') {
          throw new Error('boom');
        }
        handled.push(line);
      }, onError);

      await Promise.all([enqueue('one'), enqueue('bad'), enqueue('two')]);

      expect(handled).toEqual(['one', 'two']);
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0]?.[0]).toEqual(new Error('boom'));
    });
  });

  describe('REPL commands', () => {
    it('lists every command in /help', async () => {
      await expect(runREPLCommand('/help')).resolves.toBe(true);

      for (const cmd of REPL_COMMANDS) {
        expect(test.logs.some((line) => line.startsWith(`  /${cmd.name}`))).toBe(true);
      }
    });

    it('clears the current thread', async () => {
      await handleQuestion('quiet blender', state, test.ctx);

      await runREPLCommand('/clear');

      expect(state.advisor.conversations.getThread('default')?.messages).toEqual([]);
      expect(test.logs.at(-1)).toBe('Thread "default" cleared.');
    });

    it('shows and switches threads', async () => {
      await handleQuestion('quiet blender', state, test.ctx);

      await runREPLCommand('/thread');
      expect(test.logs.at(-1)).toBe('Thread: default (2 messages)');

      await runREPLCommand('/t kitchen');
      expect(state.threadId).toBe('kitchen');
      expect(test.logs.at(-1)).toBe('Switched to thread "kitchen".');
    });

    it('reports when there is no summary yet', async () => {
      await runREPLCommand('/summary');

      expect(test.logs).toEqual(['No summary yet.']);
    });

    it('ends the session on /exit', async () => {
      await expect(runREPLCommand('/exit')).resolves.toBe(false);
      expect(test.logs).toEqual(['Goodbye!']);
    });
  });
});
