import { AnalysisConfigInput } from '../config/analysis';

export interface CliOptions {
  file: string | null;
  configInput: AnalysisConfigInput;
  json: boolean;
  help: boolean;
}

export const CLI_USAGE = `Usage: npm run analyze -- <telemetry.csv> [options]

Options:
  --segments N             number of equal-width track segments (default 4)
  --max-dt SECONDS         drop deltas above this as telemetry dropouts
  --brake-threshold B      brake input counted as braking, 0-1 (default 0.15)
  --throttle-threshold T   throttle input counted as applied, 0-1 (default 0.25)
  --json                   print the report as JSON
  -h, --help               show this help`;

const VALUE_FLAGS: Record<string, keyof AnalysisConfigInput> = {
  '--segments': 'segments',
  '--n-segments': 'n_segments',
  '--max-dt': 'max_dt',
  '--brake-threshold': 'brake_threshold',
  '--throttle-threshold': 'throttle_threshold'
};

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Parse argv (without node and script path). Accepts `--flag value` and
 * `--flag=value`. Values are left as strings for resolveAnalysisConfig.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { file: null, configInput: {}, json: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--json') {
      options.json = true;
      continue;
    }
    if (arg === '-h' || arg === '--help') {
      options.help = true;
      continue;
    }

    if (arg.startsWith('--')) {
      const [flag, inline] = arg.split('=', 2);
      const key = VALUE_FLAGS[flag];
      if (!key) {
        throw new CliUsageError(`Unknown option: ${flag}`);
      }
      const value = inline ?? argv[i + 1];
      if (value === undefined) {
        throw new CliUsageError(`Missing value for ${flag}`);
      }
      if (inline === undefined) {
        i++;
      }
      options.configInput[key] = value;
      continue;
    }

    if (options.file !== null) {
      throw new CliUsageError(`Unexpected argument: ${arg}`);
    }
    options.file = arg;
  }

  return options;
}
