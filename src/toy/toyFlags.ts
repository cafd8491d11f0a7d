import { defineFlags } from '../schema/flagStruct';
import { bool, int, list, optional, str } from '../values/argValues';

/** Flags for poking at every parser feature by hand. */

export type DeployFlags = {
  replicas: number;
  target: string;
};

export const DeployFlags = defineFlags<DeployFlags>('DeployFlags', () => ({ replicas: 0, target: '' }))
  .flag('replicas', int(), { letter: 'r', arg: 'INT', help: 'how many copies to start' })
  .positional('target', str(), { name: 'TARGET', help: 'where to deploy' });

export type TuningFlags = {
  width: number;
  depth: number;
  jitter: number;
  anOptionWithAnUnreasonablyLongName: number;
};

export const TuningFlags = defineFlags<TuningFlags>('TuningFlags', () => ({
  width: 0,
  depth: 0,
  jitter: 0,
  anOptionWithAnUnreasonablyLongName: 0,
}))
  .flag('width', int(), { letter: 'w', arg: 'INT', help: 'a tuning integer' })
  .flag('depth', int(), { letter: 'e', arg: 'INT', help: 'another tuning integer' })
  .flag('jitter', int(), { letter: 'j', arg: 'INT', help: 'a third tuning integer' })
  .flag('anOptionWithAnUnreasonablyLongName', int(), { arg: 'INT', help: 'long enough to push help onto its own line' });

export type ToyFlags = {
  level: number;
  ports: number[];
  retries: number | null;
  user: string;
  home: string;
  quiet: boolean | null;
  color: boolean | null;
  force: boolean | null;
  dryRun: boolean | null;
  secret: number;
  deploy: DeployFlags;
  rollout: DeployFlags;
  tuning: TuningFlags;
  extra: TuningFlags;
  input: string;
  rest: string[];
};

export const ToyFlags = defineFlags<ToyFlags>(
  'ToyFlags',
  () => ({
    level: 0,
    ports: [],
    retries: null,
    user: '',
    home: '',
    quiet: null,
    color: null,
    force: null,
    dryRun: null,
    secret: 0,
    deploy: DeployFlags.defaults(),
    rollout: DeployFlags.defaults(),
    tuning: TuningFlags.defaults(),
    extra: TuningFlags.defaults(),
    input: '',
    rest: [],
  }),
  {
    name: 'toy',
    authors: 'the flagstruct authors',
    about: 'a test binary for trying out\nevery flag feature',
    version: '1.0.0',
    url: 'https://example.com/flagstruct',
    copyrightYear: 2024,
    license: 'MIT',
  },
)
  .flag('level', int(), { letter: 'l', arg: 'INT', count: 'REPEATED', help: 'an integer' })
  .flag('ports', list(int()), { arg: 'INT', help: 'repeated integer' })
  .flag('retries', optional(int()), { help: 'an optional integer' })
  .flag('user', str(), { visibility: 'HIDDEN', help: 'your user name', aliases: [{ name: 'login' }] })
  .flag('home', str(), { visibility: 'HIDDEN', help: 'your home directory', aliases: [{ name: 'home-dir' }] })
  .flag('quiet', optional(bool()), { letter: 'q', help: 'say less\nmuch less' })
  .flag('color', optional(bool()), { letter: 'c', count: 'REPEATED', help: 'colorize output' })
  .flag('force', optional(bool()), {
    letter: 'F',
    help: 'skip safety checks',
    aliases: [{ name: 'yes' }, { name: 'assume-yes', visibility: 'HIDDEN' }],
  })
  .flag('dryRun', optional(bool()), { letter: 'n', help: 'print what would happen' })
  .flag('secret', int(), { visibility: 'INVISIBLE' })
  .subcommand('deploy', DeployFlags, {
    help: 'a subcommand',
    about: 'longer help for deploy\nspread over two lines',
  })
  .subcommand('rollout', DeployFlags, {
    help: 'the same as `deploy`\nwith different help',
    about: 'longer help for rollout\nspread over two lines',
    aliases: [{ name: 'ship' }],
  })
  .group('tuning', TuningFlags, { name: 'tune', letter: 'X', help: 'extra options behind the -X flag' })
  .group('extra', TuningFlags)
  .positional('input', str(), { name: 'INPUT', count: 'REQUIRED', help: 'the input file' })
  .positional('rest', list(str()), { help: 'anything else' });
