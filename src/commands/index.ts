/**
 * Command dispatch
 */

import type { CliCommand } from '../types/command.js';
import { isReiseError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import type { CommandContext } from './context.js';
import { runList } from './list.js';
import { runInfo } from './info.js';
import { runRename } from './rename.js';
import { runDelete } from './delete.js';
import { runClear } from './clear.js';
import { runDepartures } from './departures.js';

export type ContextCommand = Exclude<CliCommand, { kind: 'help' } | { kind: 'version' }>;

function execute(ctx: CommandContext, command: ContextCommand): number | Promise<number> {
  switch (command.kind) {
    case 'list':
      return runList(ctx, command.json);
    case 'info':
      return runInfo(ctx, command.tokens, command.json);
    case 'rename':
      return runRename(ctx, command.tokens);
    case 'delete':
      return runDelete(ctx, command.tokens, command.force);
    case 'clear':
      return runClear(ctx, command.force);
    case 'search':
      return runDepartures(ctx, command.name, {
        modes: command.modes,
        raw: command.raw,
        json: command.json,
      });
    default: {
      const unreachable: never = command;
      throw new Error(`Unhandled command: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Run a command and turn failures into an exit code. Known errors are
 * printed for the user; anything else is logged with its stack.
 */
export async function dispatch(ctx: CommandContext, command: ContextCommand): Promise<number> {
  try {
    return await execute(ctx, command);
  } catch (error) {
    if (isReiseError(error)) {
      console.error(error.message);
      if (error.hint) {
        console.error(error.hint);
      }
      return 1;
    }
    loggers.cli.error(
      'Unexpected failure',
      error instanceof Error ? error : new Error(String(error)),
      { command: command.kind }
    );
    console.error(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
