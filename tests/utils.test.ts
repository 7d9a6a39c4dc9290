import { describe, it, expect, afterEach, vi } from 'vitest';
import { OperationTimeoutError, ToolArgumentError } from '../src/errors.js';
import { createConsoleLogger, errorMessage } from '../src/logger.js';
import { isExpectedError, toolFailure, toolOperation, ToolResponse, withTimeout } from '../src/utils.js';
import { createRecordingLogger, textOf } from './fakes.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('tool helpers', () => {
  it('labels operations with their arguments', () => {
    expect(toolOperation('list_topic_views')).toBe('list_topic_views');
    expect(toolOperation('set_roles_for_named_sessions', 'ADMIN', 'CLIENT')).toBe('set_roles_for_named_sessions : ADMIN , CLIENT');
  });

  it('builds line-oriented reports', () => {
    expect(new ToolResponse().addLine('a').addLine().addLine('b').toString()).toBe('a\n\nb\n');
  });

  it('reads messages from errors and error reports', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage({ message: 'refused', id: 7 })).toBe('refused');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('withTimeout', () => {
  it('passes a prompt result through', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1_000)).resolves.toBe('done');
  });

  it('rejects once the time is up', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<string>(() => {}), 2_500);
    const assertion = expect(pending).rejects.toThrow('Operation timed out after 2.5 seconds');

    await vi.advanceTimersByTimeAsync(2_500);
    await assertion;
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe('toolFailure', () => {
  it('treats refusals and timeouts as expected', () => {
    expect(isExpectedError(new Error('Permission denied'))).toBe(true);
    expect(isExpectedError(new OperationTimeoutError(1_000))).toBe(true);
    expect(isExpectedError(new ToolArgumentError('bad'))).toBe(true);
    expect(isExpectedError(new TypeError('x is undefined'))).toBe(false);
  });

  it('logs expected failures as warnings', () => {
    const logger = createRecordingLogger();

    const result = toolFailure('remove_topics : >a//', new Error('Permission denied'), logger);

    expect(textOf(result)).toBe('Error remove_topics : >a//: Permission denied');
    expect(logger.records).toEqual([
      { level: 'warn', message: 'tool_failed', context: { operation: 'remove_topics : >a//', error: 'Permission denied' } },
    ]);
  });

  it('logs defects as errors with the stack', () => {
    const logger = createRecordingLogger();

    toolFailure('fetch_topics', new TypeError('x is undefined'), logger);

    expect(logger.records[0].level).toBe('error');
    expect(logger.records[0].message).toBe('tool_failed_unexpectedly');
    expect(logger.records[0].context?.stack).toEqual(expect.stringContaining('TypeError: x is undefined'));
  });
});

describe('console logger', () => {
  it('writes timestamped lines with their context', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));
    const lines: string[] = [];
    const logger = createConsoleLogger('info', (line) => lines.push(line));

    logger.info('session_connected', { callerId: 'stdio' });
    logger.warn('sweep_started');

    expect(lines).toEqual([
      '[2026-01-02T03:04:05.000Z] INFO session_connected {"callerId":"stdio"}',
      '[2026-01-02T03:04:05.000Z] WARN sweep_started',
    ]);
  });

  it('drops lines below the minimum level', () => {
    const lines: string[] = [];
    const logger = createConsoleLogger('warn', (line) => lines.push(line));

    logger.debug('a');
    logger.info('b');
    logger.error('c');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/ ERROR c$/);
  });
});
