/**
 * Command line parsing
 *
 * Accepts `--mode status`, `--mode=status` and `-m status` alike. Anything
 * unrecognised is rejected so a typo never falls through to a full crawl.
 */

export type Mode = 'crawl' | 'status' | 'export';

export const MODES: readonly Mode[] = ['crawl', 'status', 'export'];

export interface CliOptions {
  mode: Mode;
  report: boolean;
  service: boolean;
  index?: string;
  out?: string;
}

type ValueOption = 'mode' | 'index' | 'out';

const VALUE_FLAGS = new Map<string, ValueOption>([
  ['--mode', 'mode'],
  ['-m', 'mode'],
  ['--index', 'index'],
  ['--out', 'out'],
]);

function parseMode(value: string): Mode {
  const mode = MODES.find((m) => m === value);
  if (!mode) {
    throw new Error(`Unknown mode "${value}", expected one of: ${MODES.join(', ')}`);
  }
  return mode;
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const values: Partial<Record<ValueOption, string>> = {};
  let report = true;
  let service = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--no-report') {
      report = false;
      continue;
    }
    if (arg === '--service') {
      service = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const option = VALUE_FLAGS.get(flag);
    if (!option) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    if (eq > 0) {
      values[option] = arg.slice(eq + 1);
      continue;
    }

    const next = argv[i + 1];
    if (next === undefined || next.startsWith('-')) {
      throw new Error(`Missing value for ${flag}`);
    }
    values[option] = next;
    i++;
  }

  return {
    mode: parseMode(values.mode ?? 'crawl'),
    report,
    service,
    ...(values.index !== undefined ? { index: values.index } : {}),
    ...(values.out !== undefined ? { out: values.out } : {}),
  };
}
