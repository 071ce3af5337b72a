/**
 * Delete Command
 * reise --delete <stop...>
 */

import { InvalidSyntaxError } from '../lib/errors.js';
import { isIndexToken } from '../lib/normalize.js';
import type { CommandContext } from './context.js';

/**
 * Digit-only arguments delete by position as one batch; anything else is
 * joined into one name. Mixed lists are names.
 * @throws InvalidSyntaxError | NotFoundError | OutOfRangeError | PersistenceError
 */
export async function runDelete(ctx: CommandContext, tokens: string[], force: boolean): Promise<number> {
  const words = tokens.map((t) => t.trim()).filter(Boolean);
  if (words.length === 0) {
    throw new InvalidSyntaxError('Delete needs a stop name or index');
  }

  if (!words.every(isIndexToken)) {
    const outcome = await ctx.mutator.deleteByName(words.join(' '), force);
    console.log(outcome.status === 'deleted' ? `Deleted '${outcome.key}'` : 'Canceled');
    return 0;
  }

  const outcome = await ctx.mutator.deleteByIndices(words, force);
  for (const failure of outcome.failures) {
    console.error(failure.message);
  }
  if (outcome.canceled) {
    console.log('Canceled');
  }
  for (const key of outcome.deleted) {
    console.log(`Deleted '${key}'`);
  }
  return outcome.failures.length > 0 ? 1 : 0;
}
