#!/usr/bin/env node

import { runApp } from '../cli/app';
import { processIo } from '../errors';
import { stableStringify } from '../util/deterministicJson';
import { ToyFlags } from './toyFlags';

/** Prints the parsed flags as JSON. */
export function printFlags(flags: ToyFlags, io = processIo): number {
  io.stdout(stableStringify(flags).replace(/\n$/, ''));
  return 0;
}

if (require.main === module) {
  runApp(ToyFlags, (flags) => printFlags(flags)).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      processIo.stderr(String(e));
      process.exitCode = 2;
    },
  );
}
