import { Command, CommanderError } from 'commander';
import type { CliCommand } from './types/command.js';
import type { TransportMode } from './lib/transport-mode.js';
import { preprocessArgv } from './lib/flag-preprocessor.js';
import { setLogLevel } from './lib/logger.js';
import { ReadlinePrompter, type Prompter } from './lib/prompt.js';
import { createApiClient } from './lib/api-client.js';
import { StopCache } from './services/stop-cache.js';
import { getConfigService, type ConfigService } from './services/config.js';
import type { DepartureSource, PlaceSearch } from './services/api.js';
import { createContext } from './commands/context.js';
import { dispatch } from './commands/index.js';

export const VERSION = '0.3.0';

export interface CliOptions {
  version?: boolean;
  list?: boolean;
  info?: string[];
  rename?: string[];
  delete?: string[];
  clearCache?: boolean;
  raw?: boolean;
  bus?: boolean;
  metro?: boolean;
  tram?: boolean;
  water?: boolean;
  train?: boolean;
  air?: boolean;
  force?: boolean;
  json?: boolean;
}

const MODE_FLAGS: Array<[keyof CliOptions, TransportMode]> = [
  ['bus', 'bus'],
  ['metro', 'metro'],
  ['tram', 'tram'],
  ['train', 'train'],
  ['water', 'ferry'],
  ['air', 'air'],
];

/**
 * Build a fresh program; commander keeps parse state on the instance
 */
export function createProgram(): Command {
  return new Command()
    .name('reise')
    .usage('[options] [stop...]')
    .description(
      'Small CLI for Norwegian public transport using the Entur API.\n' +
        'Search stops, cache them, rename or delete entries, and filter\n' +
        'departures by mode of transport.'
    )
    .argument('[stop...]', 'name of stop (multi-word allowed) or cache index')
    .option('-v, --version', 'print version number and exit')
    .option('-l, --list', 'list all cached stops')
    .option('-i, --info <stop...>', 'show info about a cached stop')
    .option('-n, --rename <words...>', "rename a cached stop: <old> : <new>")
    .option('-d, --delete <stop...>', 'delete stops from cache, by name or indices')
    .option('-c, --clear-cache', 'clear all cached stops')
    .option('-x, --raw', 'skip the cache and search again')
    .option('-b, --bus', 'only show buses')
    .option('-m, --metro', 'only show metro')
    .option('-t, --tram', 'only show trams')
    .option('-w, --water', 'only show water/ferry')
    .option('-r, --train', 'only show train/rail')
    .option('-a, --air', 'only show air')
    .option('-f, --force', 'skip confirmation prompts (delete/clear)')
    .option('--json', 'print list, info and departures as JSON')
    .addHelpText(
      'after',
      '\nTip: flags combine in any order, and can be used together\n' +
        'example:\n' +
        '\treise -rb oslo lufthavn\n' +
        '\treise skøyen -mw\n' +
        '\treise -df 0 2\n'
    )
    .exitOverride();
}

/**
 * Map parsed options onto exactly one command. Precedence: version, list,
 * clear, delete, info, rename, departures; nothing usable means help.
 */
export function toCommand(opts: CliOptions, args: string[]): CliCommand {
  const json = opts.json === true;
  const force = opts.force === true;

  if (opts.version) return { kind: 'version' };
  if (opts.list) return { kind: 'list', json };
  if (opts.clearCache) return { kind: 'clear', force };
  if (opts.delete) return { kind: 'delete', tokens: opts.delete, force };
  if (opts.info) return { kind: 'info', tokens: opts.info, json };
  if (opts.rename) return { kind: 'rename', tokens: opts.rename };

  const name = args.join(' ').trim();
  if (name) {
    const modes = MODE_FLAGS.filter(([flag]) => opts[flag] === true).map(([, mode]) => mode);
    return { kind: 'search', name, modes, raw: opts.raw === true, json };
  }

  return { kind: 'help' };
}

export interface CliDeps {
  config?: ConfigService;
  cache?: StopCache;
  prompter?: Prompter;
  api?: PlaceSearch & DepartureSource;
  color?: boolean;
}

/**
 * Parse argv (without node and script) and run the command
 * @returns process exit code
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const program = createProgram();
  const tokens = preprocessArgv(argv);

  if (tokens.length === 0) {
    program.outputHelp();
    return 0;
  }

  try {
    program.parse(tokens, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const command = toCommand(program.opts<CliOptions>(), program.args);
  if (command.kind === 'help') {
    program.outputHelp();
    return 0;
  }
  if (command.kind === 'version') {
    console.log(`reise version ${VERSION}`);
    return 0;
  }

  const config = deps.config ?? getConfigService();
  setLogLevel(config.getLogLevel());

  const prompter = deps.prompter ?? new ReadlinePrompter();
  try {
    const ctx = createContext({
      cache: deps.cache ?? StopCache.load(config.getCacheFile()),
      api: deps.api ?? createApiClient(config),
      prompter,
      color: deps.color ?? config.useColor(),
    });
    return await dispatch(ctx, command);
  } finally {
    if (!deps.prompter) {
      prompter.close();
    }
  }
}
