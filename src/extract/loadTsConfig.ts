import ts from 'typescript';
import path from 'node:path';

export type LoadedTsConfig = {
  tsconfigPath: string;
  options: ts.CompilerOptions;
};

/** TS18003: the config's include globs matched nothing. The extractor supplies its own root files. */
const NO_INPUTS = 18003;

function flatten(diagnostics: readonly ts.Diagnostic[]): string {
  return diagnostics.map((d) => ts.flattenDiagnosticMessageText(d.messageText, '\n')).join('\n');
}

/**
 * Reads compiler options from an explicit tsconfig path, or from the nearest
 * tsconfig.json above projectRoot. Returns undefined only when nothing was
 * asked for and nothing was found.
 */
export function loadTsConfig(projectRoot: string, tsconfigPath?: string): LoadedTsConfig | undefined {
  const resolved = tsconfigPath
    ? path.resolve(projectRoot, tsconfigPath)
    : ts.findConfigFile(projectRoot, ts.sys.fileExists, 'tsconfig.json');
  if (!resolved) return undefined;
  if (!ts.sys.fileExists(resolved)) {
    throw new Error(`tsconfig not found: ${resolved}`);
  }

  const read = ts.readConfigFile(resolved, ts.sys.readFile);
  if (read.error) {
    throw new Error(`Failed to read tsconfig: ${resolved}\n${flatten([read.error])}`);
  }

  const parsed = ts.parseJsonConfigFileContent(read.config, ts.sys, path.dirname(resolved), undefined, resolved);
  const errors = parsed.errors.filter((e) => e.code !== NO_INPUTS);
  if (errors.length > 0) {
    throw new Error(`Failed to parse tsconfig: ${resolved}\n${flatten(errors)}`);
  }

  return { tsconfigPath: resolved, options: parsed.options };
}
