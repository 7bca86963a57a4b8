import { describe, expect, it } from '@jest/globals';
import { spawn, type ChildProcess } from 'child_process';
import { exitStatus, killWithEscalation } from '../../../src/utils/process-utils';

function exited(child: ChildProcess): Promise<[number | null, NodeJS.Signals | null]> {
  return new Promise((resolve) => {
    child.once('exit', (code, signal) => resolve([code, signal]));
  });
}

/** A shell that ignores SIGTERM and says when it is ready */
function stubbornProcess(): Promise<ChildProcess> {
  const child = spawn('sh', ['-c', "trap '' TERM; echo ready; exec sleep 5"], {
    stdio: ['ignore', 'pipe', 'ignore'],
  });
  return new Promise((resolve) => {
    child.stdout?.once('data', () => resolve(child));
  });
}

describe('exitStatus', () => {
  it('passes exit codes through', () => {
    expect(exitStatus(0, null)).toBe(0);
    expect(exitStatus(2, null)).toBe(2);
  });

  it('maps signals the way a shell does', () => {
    expect(exitStatus(null, 'SIGTERM')).toBe(143);
    expect(exitStatus(null, 'SIGKILL')).toBe(137);
  });

  it('treats an unexplained end as failure', () => {
    expect(exitStatus(null, null)).toBe(1);
  });
});

describe('killWithEscalation', () => {
  it('stops a process with SIGTERM', async () => {
    const child = spawn('sleep', ['5'], { stdio: 'ignore' });
    const done = exited(child);
    killWithEscalation(child, 1000);
    expect(await done).toEqual([null, 'SIGTERM']);
  });

  it('falls back to SIGKILL when SIGTERM is ignored', async () => {
    const child = await stubbornProcess();
    const done = exited(child);
    killWithEscalation(child, 50);
    expect(await done).toEqual([null, 'SIGKILL']);
  });
});
