/**
 * Research query CLI
 * Positional words form the query; --json prints the outcome as JSON;
 * --save[=text|json] also writes it under ./query_results.
 * Exit code 0 whenever the query ran (zero results included), 1 when the
 * query is missing or setup fails.
 */

import { loadConfig, type AppConfig } from './services/config';
import { createLogger, type Logger } from './services/logger';
import {
  createDefaultPipeline,
  formatOutcome,
  saveOutcome,
  toJson,
  type PipelineHandle,
  type SaveFormat,
} from './services/research-query';

export const CLI_USAGE = 'Usage: research-query [--json] [--save[=text|json]] <query words...>';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliDeps {
  loadConfig?: () => AppConfig;
  createPipeline?: (config: AppConfig, logger: Logger) => PipelineHandle;
  io?: CliIO;
  /** Directory for --save; defaults to ./query_results */
  resultsDir?: string;
  now?: () => Date;
}

export interface CliArgs {
  query: string;
  json: boolean;
  /** null unless --save was given */
  save: SaveFormat | null;
}

function parseSaveFlag(flags: readonly string[]): SaveFormat | null {
  let save: SaveFormat | null = null;
  for (const flag of flags) {
    if (flag === '--save') save = 'text';
    else if (flag.startsWith('--save=')) save = flag.slice('--save='.length) === 'json' ? 'json' : 'text';
  }
  return save;
}

export function parseCliArgs(args: readonly string[]): CliArgs {
  const flags = args.filter((arg) => arg.startsWith('--'));
  const words = args.filter((arg) => !arg.startsWith('--'));
  return {
    query: words.join(' ').trim(),
    json: flags.includes('--json'),
    save: parseSaveFlag(flags),
  };
}

const defaultIO: CliIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

export async function runCli(args: readonly string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? defaultIO;
  const { query, json, save } = parseCliArgs(args);

  if (!query) {
    io.stderr(CLI_USAGE);
    return 1;
  }

  let pipeline: PipelineHandle;
  try {
    const config = (deps.loadConfig ?? loadConfig)();
    // JSON output stays clean on stdout; progress lines only at warn and above
    const logger = createLogger('Query', json ? 'warn' : config.logging.level);
    pipeline = (deps.createPipeline ?? createDefaultPipeline)(config, logger);
  } catch (error) {
    io.stderr(`Setup failed: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  try {
    const outcome = await pipeline.run(query);
    io.stdout(json ? toJson(outcome) : formatOutcome(outcome));
    if (save) {
      const filePath = await saveOutcome(outcome, { format: save, dir: deps.resultsDir, now: deps.now?.() });
      io.stderr(`Results saved to ${filePath}`);
    }
    return 0;
  } finally {
    await pipeline.close();
  }
}
