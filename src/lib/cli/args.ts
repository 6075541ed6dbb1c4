import { ConfigError } from '../errors.js';
import type { ConfigOverrides } from '../config.js';
import { parseFilterLevel } from '../pipeline/filter.js';

export interface DailyArgs {
  overrides: ConfigOverrides;
  dryRun: boolean;
  json: boolean;
  help: boolean;
}

export const DAILY_USAGE = `Usage: npm run daily -- [category] [options]

Arguments:
  category                     arXiv category (default: eess.AS, or digest.category in config.yml)

Options:
  --user-interest <text>       Interests to score relevance against; empty = no scoring
  --filter-level <level>       none | low (score >= 0) | mid (>= 1) | high (>= 2)
  --language <name>            Summary language (default: English)
  --max-papers-split <n>       Max papers per webhook message (1-50, default 10)
  --dry-run                    Print the messages instead of posting them
  --json                       Print the run summary as JSON only
  -h, --help                   Show this help`;

// Long flags that take a value; snake_case spellings are accepted too.
const VALUE_FLAGS = new Map<string, keyof ConfigOverrides>([
  ['user-interest', 'userInterest'],
  ['filter-level', 'filterLevel'],
  ['language', 'language'],
  ['max-papers-split', 'maxPapersPerMessage'],
]);

function setOverride(overrides: ConfigOverrides, key: keyof ConfigOverrides, raw: string): void {
  if (key === 'maxPapersPerMessage') {
    const n = Number.parseInt(raw, 10);
    if (Number.isNaN(n) || String(n) !== raw.trim()) {
      throw new ConfigError(`--max-papers-split expects an integer, got "${raw}"`);
    }
    overrides.maxPapersPerMessage = n;
    return;
  }
  if (key === 'filterLevel') {
    overrides.filterLevel = parseFilterLevel(raw);
    return;
  }
  overrides[key] = raw;
}

export function parseDailyArgs(argv: readonly string[]): DailyArgs {
  const overrides: ConfigOverrides = {};
  let dryRun = false;
  let json = false;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '--dry-run') {
      dryRun = true;
    } else if (arg === '--json') {
      json = true;
    } else if (arg === '-h' || arg === '--help') {
      help = true;
    } else if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const name = (eq === -1 ? arg.slice(2) : arg.slice(2, eq)).replace(/_/g, '-');
      const key = VALUE_FLAGS.get(name);
      if (!key) throw new ConfigError(`Unknown option: ${arg}`);

      let value: string | undefined;
      if (eq !== -1) {
        value = arg.slice(eq + 1);
      } else {
        value = argv[i + 1];
        i += 1;
      }
      if (value === undefined) throw new ConfigError(`Option --${name} needs a value`);
      setOverride(overrides, key, value);
    } else if (overrides.category === undefined) {
      overrides.category = arg;
    } else {
      throw new ConfigError(`Unexpected argument: ${arg}`);
    }
  }

  return { overrides, dryRun, json, help };
}
