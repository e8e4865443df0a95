/**
 * @fileoverview End-to-end tests for the CLI dispatcher against a temporary database
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { runCli } from '../run.js';

const env = { ACTION_ENGINE_LOG_LEVEL: 'silent', ACTION_ENGINE_EPSILON: '0' };

describe('runCli', () => {
  let dir: string;
  let dbPath: string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  const logged = (): string[] => logSpy.mock.calls.map((call) => String(call[0]));
  const errors = (): string[] => errorSpy.mock.calls.map((call) => String(call[0]));
  const run = (...args: string[]) => runCli([...args, '--db', dbPath], { env });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'engine-cli-'));
    dbPath = path.join(dir, 'learning.db');
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('prints the version', async () => {
    expect(await runCli(['--version'], { env })).toBe(0);
    expect(logged()).toEqual(['action-engine 1.0.0']);
  });

  it('prints the main help without a command', async () => {
    expect(await runCli([], { env })).toBe(0);
    expect(logged()[0]?.startsWith('Action Engine CLI')).toBe(true);
  });

  it('prints command help', async () => {
    expect(await runCli(['help', 'prune'], { env })).toBe(0);
    expect(logged()).toEqual([
      'action-engine prune [--days N]\n\nDelete action records older than N days (default: retentionDays from config).',
    ]);
  });

  it('rejects an unknown command with a suggestion', async () => {
    expect(await run('explode')).toBe(2);
    expect(errors()).toEqual([
      'Error [UNKNOWN_COMMAND]: Unknown command: explode\n\nSuggestion: Run `action-engine help` to list the available commands.',
    ]);
  });

  it('rejects an unknown option', async () => {
    expect(await run('stats', '--bogus')).toBe(2);
    expect(errors()[0]?.startsWith('Error [INVALID_ARGUMENT]:')).toBe(true);
  });

  it('records an outcome and reports it in the stats', async () => {
    expect(await run('record', 'tired', 'dnd.on')).toBe(0);
    expect(logged()).toEqual(['Recorded success for tired -> dnd.on']);

    logSpy.mockClear();
    expect(await run('stats', '--json')).toBe(0);
    const stats = JSON.parse(logged()[0] ?? 'null');
    expect(stats.knn.totalActions).toBe(1);
    expect(stats.reinforcement.totalValues).toBe(1);
    expect(stats.fewShot.totalExamples).toBe(0);
    expect(stats.topSituations).toEqual([{ situation: 'tired', count: 1 }]);
    expect(stats.topValues).toHaveLength(1);
    expect(stats.topValues[0].action).toBe('dnd.on');
  });

  it('prints the stats as text', async () => {
    await run('record', 'tired', 'dnd.on');
    logSpy.mockClear();

    expect(await run('stats')).toBe(0);
    const lines = logged();
    expect(lines[0]).toBe('Action Engine Statistics');
    expect(lines).toContain('  Actions         : 1');
    expect(lines).toContain('  Success rate    : 100%');
  });

  it('rejects an invalid outcome', async () => {
    expect(await run('record', 'tired', 'dnd.on', '--outcome', 'maybe')).toBe(2);
    expect(errors()[0]).toContain("--outcome must be one of success, failure, canceled, got 'maybe'");
  });

  it('suggests from the learned value and asks when unsure', async () => {
    await run('record', 'tired', 'dnd.on');
    logSpy.mockClear();

    expect(await run('suggest', 'tired', '--actions', 'dnd.on,music.pause', '--json')).toBe(0);
    const decision = JSON.parse(logged()[0] ?? 'null');
    expect(decision.action).toBe('dnd.on');
    expect(decision.source).toBe('reinforcement_learning');
    expect(decision.askUser).toBe(true);
    expect(decision.params).toEqual({});
  });

  it('falls back to the first candidate on an empty history', async () => {
    expect(await run('suggest', 'tired', '--actions', 'dnd.on')).toBe(0);
    expect(logged()[0]).toBe('Suggested: dnd.on (0%, reinforcement_learning)');
  });

  it('requires candidate actions for a suggestion', async () => {
    expect(await run('suggest', 'tired')).toBe(2);
    expect(errors()[0]?.startsWith('Error [INVALID_ARGUMENT]: --actions needs at least one action')).toBe(true);
  });

  it('prunes with an explicit window and validates it', async () => {
    await run('record', 'tired', 'dnd.on');
    logSpy.mockClear();

    expect(await run('prune', '--days', '30')).toBe(0);
    expect(logged()).toEqual(['Pruned 0 records older than 30 days']);
    expect(await run('prune', '--days', '0')).toBe(2);
  });

  it('clears the value table', async () => {
    await run('record', 'tired', 'dnd.on');
    logSpy.mockClear();

    expect(await run('reset-values')).toBe(0);
    expect(logged()).toEqual(['Cleared 1 learned values']);
  });

  it('detects a recurring workflow', async () => {
    for (const action of ['lights.dim', 'music.play', 'dnd.on', 'lights.dim', 'music.play']) {
      await run('record', 'evening', action);
    }
    logSpy.mockClear();

    expect(await run('workflow', '--min', '1')).toBe(0);
    expect(logged()).toEqual(['After lights.dim -> music.play you usually do dnd.on (100%, 1 times)']);
  });

  it('fails with a config error for an invalid config file', async () => {
    const configPath = path.join(dir, 'engine.yaml');
    await fs.writeFile(configPath, 'reinforcement:\n  epsilon: 2\n');

    expect(await run('stats', '--config', configPath)).toBe(3);
    expect(errors()[0]?.startsWith('Error [CONFIG_INVALID]:')).toBe(true);
  });
});
