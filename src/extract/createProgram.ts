import ts from 'typescript';
import path from 'node:path';

import { loadTsConfig } from './loadTsConfig';

export type CreateProgramOptions = {
  projectRoot: string;
  /** Absolute paths of the files to analyze. */
  rootNames: string[];
  tsconfigPath?: string;
};

export type CreatedProgram = {
  configPath?: string;
  program: ts.Program;
  checker: ts.TypeChecker;
};

/**
 * Creates a program over scanner-selected files, with compiler options from
 * tsconfig.json when one is found. Emit is always disabled.
 */
export function createExtractProgram(opts: CreateProgramOptions): CreatedProgram {
  const loaded = loadTsConfig(path.resolve(opts.projectRoot), opts.tsconfigPath);
  const options: ts.CompilerOptions = { ...(loaded?.options ?? { strict: true }), noEmit: true };
  const program = ts.createProgram({ rootNames: opts.rootNames, options });
  return { configPath: loaded?.tsconfigPath, program, checker: program.getTypeChecker() };
}
