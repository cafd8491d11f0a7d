import pc from 'picocolors';

import { CliError, type ProcessIo } from '../../errors';
import { defineFlags } from '../../schema/flagStruct';
import { int } from '../../values/argValues';
import { runApp } from '../app';

class ExitCalled extends Error {
  constructor(readonly code: number) {
    super(`exit ${code}`);
  }
}

function captureIo() {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const io: ProcessIo = {
    stdout: (text) => stdout.push(text),
    stderr: (text) => stderr.push(text),
    exit: (code) => {
      throw new ExitCalled(code);
    },
  };
  return { io, stdout, stderr };
}

type Counter = { level: number };
const Counter = defineFlags<Counter>('Counter', () => ({ level: 0 })).flag('level', int(), { letter: 'l' });

describe('runApp', () => {
  test('hands parsed flags to main and returns its code', async () => {
    const { io } = captureIo();
    const seen: Counter[] = [];
    const code = await runApp(
      Counter,
      (flags) => {
        seen.push(flags);
        return 5;
      },
      { argv: ['-l', '3'], exe: 'counter', io },
    );
    expect(code).toBe(5);
    expect(seen).toEqual([{ level: 3 }]);
  });

  test('help exits 0 after printing usage', async () => {
    const { io, stdout } = captureIo();
    await expect(runApp(Counter, () => 1, { argv: ['-h'], exe: 'counter', io })).rejects.toEqual(new ExitCalled(0));
    expect(stdout).toEqual([Counter.usage('counter').replace(/\n$/, '')]);
  });

  test('parse errors exit with badExit', async () => {
    const { io, stderr } = captureIo();
    await expect(runApp(Counter, () => 0, { argv: ['-l'], exe: 'counter', io, badExit: 2 })).rejects.toEqual(
      new ExitCalled(2),
    );
    expect(stderr).toEqual([pc.red('counter: fatal: expected argument after -l')]);
  });
});

describe('CliError', () => {
  test('exit codes follow fatality', () => {
    expect(CliError.fatal('x').exitCode()).toBe(128);
    expect(CliError.fatal('x').exitCode(1)).toBe(1);
    expect(CliError.info('usage').exitCode()).toBe(0);
  });
});
