import pc from 'picocolors';

/**
 * A mistake in a flag struct definition: bad or reserved names, duplicate keys,
 * misplaced positionals. Raised while the schema is built, never while parsing.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type ProcessIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  exit: (code: number) => never;
};

export const processIo: ProcessIo = {
  // eslint-disable-next-line no-console
  stdout: (text) => console.log(text),
  // eslint-disable-next-line no-console
  stderr: (text) => console.error(text),
  exit: (code) => process.exit(code),
};

/**
 * An error from parsing flags. Help requests travel through the same channel
 * as parse failures but are not fatal: the caller prints the message to stdout
 * and exits 0. Fatal errors go to stderr with a non-zero exit code.
 */
export class CliError extends Error {
  readonly isFatal: boolean;

  constructor(message: string, isFatal: boolean) {
    super(message);
    this.name = 'CliError';
    this.isFatal = isFatal;
  }

  static fatal(message: string): CliError {
    return new CliError(message, true);
  }

  static info(message: string): CliError {
    return new CliError(message, false);
  }

  /** Exit code this error should terminate the program with. */
  exitCode(badExit = 128): number {
    return this.isFatal ? badExit : 0;
  }

  /** Prints the message where it belongs and returns the exit code, without exiting. */
  report(io: ProcessIo = processIo, badExit = 128): number {
    // Usage text already ends in a newline; the sinks add their own.
    const text = this.message.replace(/\n$/, '');
    if (this.isFatal) {
      io.stderr(pc.red(text));
    } else {
      io.stdout(text);
    }
    return this.exitCode(badExit);
  }

  printAndExit(badExit = 128, io: ProcessIo = processIo): never {
    return io.exit(this.report(io, badExit));
  }
}
