/**
 * List Command
 * reise --list
 */

import { outputData, renderStopList } from '../lib/output-formatter.js';
import type { CommandContext } from './context.js';

export function runList(ctx: CommandContext, json: boolean): number {
  const entries = ctx.cache.list();

  if (json) {
    outputData(
      entries.map(([key, record], index) => ({ index, key, ...record })),
      'json',
      () => ''
    );
    return 0;
  }

  if (entries.length === 0) {
    console.log('No cached stops');
    return 0;
  }

  console.log(renderStopList(entries, ctx.render));
  return 0;
}
