import path from 'node:path';

import { processIo, type ProcessIo } from '../errors';
import type { FlagStruct } from '../schema/flagStruct';

export type RunAppOptions = {
  /** Arguments after the executable; defaults to process.argv.slice(2). */
  argv?: readonly string[];
  /** Executable name; defaults to the basename of the running script without its extension. */
  exe?: string;
  io?: ProcessIo;
  /** Exit code for parse errors. */
  badExit?: number;
};

function defaultExe(): string {
  const script = process.argv[1] ?? 'app';
  return path.basename(script, path.extname(script));
}

/**
 * Parses the command line into a fresh T and hands it to `main`. Help requests
 * print usage and exit 0; parse errors print to stderr and exit with badExit.
 * The returned code is whatever `main` returns.
 */
export async function runApp<T>(
  flags: FlagStruct<T>,
  main: (parsed: T) => number | Promise<number>,
  opts: RunAppOptions = {},
): Promise<number> {
  const io = opts.io ?? processIo;
  const parsed = flags.parse(opts.exe ?? defaultExe(), opts.argv ?? process.argv.slice(2));
  if (!parsed.ok) return parsed.error.printAndExit(opts.badExit ?? 128, io);
  return main(parsed.value);
}
