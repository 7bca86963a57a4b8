import { afterEach, describe, expect, it } from '@jest/globals';
import { installAbortHandlers } from '../../../src/runner/abort-handler';
import { LogLevel } from '../../../src/utils/logger';
import { recordingLogger } from '../../helpers/fake-tools';

let remove: (() => void) | null = null;

afterEach(() => {
  remove?.();
  remove = null;
});

describe('installAbortHandlers', () => {
  it('aborts on the first signal and ignores repeats', () => {
    const controller = new AbortController();
    const { logger, lines } = recordingLogger(LogLevel.DEBUG);
    const written: string[] = [];
    remove = installAbortHandlers(controller, logger, (text) => written.push(text));

    process.emit('SIGINT', 'SIGINT');
    process.emit('SIGTERM', 'SIGTERM');

    expect(controller.signal.aborted).toBe(true);
    expect(written).toEqual(['\n']);
    expect(lines).toEqual(['[debug] got signal SIGINT', '[debug] ignoring repeated SIGTERM']);
  });

  it('stops listening once removed', () => {
    const controller = new AbortController();
    const before = process.listenerCount('SIGTERM');
    const removeHandlers = installAbortHandlers(controller, recordingLogger(LogLevel.DEBUG).logger, () => undefined);
    expect(process.listenerCount('SIGTERM')).toBe(before + 1);
    removeHandlers();
    expect(process.listenerCount('SIGTERM')).toBe(before);
  });
});
