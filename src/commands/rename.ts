/**
 * Rename Command
 * reise --rename <old words> : <new words>
 */

import { parseRenameTokens } from '../lib/cache-mutator.js';
import type { CommandContext } from './context.js';

/**
 * @throws InvalidSyntaxError | NotFoundError | OutOfRangeError | CollisionError | PersistenceError
 */
export function runRename(ctx: CommandContext, tokens: string[]): number {
  const { oldName, newName } = parseRenameTokens(tokens);
  const { from, to } = ctx.mutator.rename(oldName, newName);
  console.log(`Renamed '${from}' -> '${to}'`);
  return 0;
}
