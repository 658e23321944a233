/**
 * Command-line arguments of the sweep CLI
 */

export interface CliArgs {
  configPath: string | null;
  seed?: number;
  randomRuns?: number;
  outFile?: string;
  scenarioId?: number;
  quiet: boolean;
  help: boolean;
}

export const USAGE = [
  'Usage: npm run sweep -- <experiment.json> [options]',
  '',
  'Options:',
  '  --seed N        base seed for the Random strategy',
  '  --runs N        Random strategy repetitions per scenario',
  '  --out FILE      results CSV path',
  '  --scenario ID   print a full trace of one scenario instead of sweeping',
  '  --quiet         no progress output',
  '  --help          show this help'
].join('\n');

function integerArg(flag: string, value: string | undefined): number {
  const parsed = value === undefined ? NaN : Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${flag} expects an integer, got '${value ?? ''}'`);
  }
  return parsed;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { configPath: null, quiet: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--seed':
        args.seed = integerArg(arg, argv[++i]);
        break;
      case '--runs':
        args.randomRuns = integerArg(arg, argv[++i]);
        if (args.randomRuns < 1) throw new Error(`--runs must be >= 1, got ${args.randomRuns}`);
        break;
      case '--out': {
        const value = argv[++i];
        if (!value) throw new Error('--out expects a file path');
        args.outFile = value;
        break;
      }
      case '--scenario':
        args.scenarioId = integerArg(arg, argv[++i]);
        break;
      case '--quiet':
        args.quiet = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        if (arg.startsWith('-')) throw new Error(`Unknown option '${arg}'`);
        if (args.configPath !== null) throw new Error(`Unexpected argument '${arg}'`);
        args.configPath = arg;
    }
  }

  return args;
}
