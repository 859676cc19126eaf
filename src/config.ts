import { parseArgs } from 'node:util';
import { resolve } from 'node:path';

export interface AppConfig {
  /** Absolute path of the JSON data file */
  dataFile: string;
}

export const DEFAULT_DATA_FILE = 'flashcards.json';
export const DATA_FILE_ENV = 'FLASHCARDS_FILE';

export const USAGE = `Usage: flashcards [options]

Options:
  -f, --file <path>  Data file (default: ./${DEFAULT_DATA_FILE}, or $${DATA_FILE_ENV})
  -h, --help         Show this help`;

export function getDefaultConfig(cwd: string = process.cwd()): AppConfig {
  return {
    dataFile: resolve(cwd, DEFAULT_DATA_FILE),
  };
}

export type ConfigResult =
  | { kind: 'run'; config: AppConfig }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

/**
 * Build the configuration from command line arguments and environment.
 * Precedence: --file, then FLASHCARDS_FILE, then the default.
 */
export function resolveConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ConfigResult {
  let values: { file?: string; help?: boolean };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        file: { type: 'string', short: 'f' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (e) {
    return { kind: 'error', message: e instanceof Error ? e.message : String(e) };
  }

  if (values.help) {
    return { kind: 'help' };
  }

  const config = getDefaultConfig(cwd);
  const fromEnv = env[DATA_FILE_ENV]?.trim();
  const file = values.file?.trim() || fromEnv;
  if (file) {
    config.dataFile = resolve(cwd, file);
  }
  return { kind: 'run', config };
}
