/**
 * Clear Command
 * reise --clear-cache
 */

import type { CommandContext } from './context.js';

export async function runClear(ctx: CommandContext, force: boolean): Promise<number> {
  const outcome = await ctx.mutator.clear(force);
  switch (outcome.status) {
    case 'empty':
      console.log('Cache already empty');
      break;
    case 'canceled':
      console.log('Canceled');
      break;
    case 'cleared':
      console.log('Cache cleared');
      break;
  }
  return 0;
}
