import type { ProcessIo } from '../../errors';
import { printFlags } from '../main';
import { ToyFlags } from '../toyFlags';

function parseToy(argv: string[]): ToyFlags {
  const parsed = ToyFlags.parse('toy', argv);
  if (!parsed.ok) throw new Error(parsed.error.message);
  return parsed.value;
}

const tuningDefaults = { width: 0, depth: 0, jitter: 0, anOptionWithAnUnreasonablyLongName: 0 };

describe('toy', () => {
  test('exercises letters, aliases, lists, groups and positionals', () => {
    const flags = parseToy([
      '-qc',
      '-l',
      '1',
      '-l2',
      '--ports',
      '80',
      '--ports=81',
      '--login',
      'me',
      '-Xw',
      '3',
      '--tune.depth=4',
      '-e',
      '5',
      'in.txt',
      'x',
      'y',
    ]);

    expect(flags).toEqual({
      level: 2,
      ports: [80, 81],
      retries: null,
      user: 'me',
      home: '',
      quiet: true,
      color: true,
      force: null,
      dryRun: null,
      secret: 0,
      deploy: { replicas: 0, target: '' },
      rollout: { replicas: 0, target: '' },
      tuning: { ...tuningDefaults, width: 3, depth: 4 },
      extra: { ...tuningDefaults, depth: 5 },
      input: 'in.txt',
      rest: ['x', 'y'],
    });
  });

  test('subcommand aliases share the subcommand storage', () => {
    const flags = parseToy(['--yes', 'ship', '-r', '2', 'prod']);
    expect(flags.force).toBe(true);
    expect(flags.rollout).toEqual({ replicas: 2, target: 'prod' });
    expect(flags.deploy).toEqual({ replicas: 0, target: '' });
  });

  test('usage line lists letters, subcommands and positionals', () => {
    expect(ToyFlags.usage('toy').split('\n')[0]).toBe(
      'Usage: toy -FXcehjlnqw [OPTIONS] [deploy|rollout|ship] <INPUT> [ARG2]...',
    );
  });

  test('printFlags writes deterministic JSON', () => {
    const stdout: string[] = [];
    const io: ProcessIo = {
      stdout: (text) => stdout.push(text),
      stderr: () => undefined,
      exit: (code) => {
        throw new Error(`exit ${code}`);
      },
    };
    expect(printFlags(parseToy(['a']), io)).toBe(0);
    expect(JSON.parse(stdout[0]).input).toBe('a');
    expect(stdout[0].startsWith('{\n  "color": null,\n  "deploy": {\n')).toBe(true);
  });
});
