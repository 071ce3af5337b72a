/**
 * Info Command
 * reise --info <stop...>
 */

import { InvalidSyntaxError, OutOfRangeError } from '../lib/errors.js';
import { isIndexToken } from '../lib/normalize.js';
import { outputData, renderStopInfo } from '../lib/output-formatter.js';
import type { CommandContext } from './context.js';

/**
 * All-digit arguments are positions and each one is shown; anything else is
 * joined into a single name.
 * @throws InvalidSyntaxError | NotFoundError | OutOfRangeError
 */
export function runInfo(ctx: CommandContext, tokens: string[], json: boolean): number {
  const words = tokens.map((t) => t.trim()).filter(Boolean);
  if (words.length === 0) {
    throw new InvalidSyntaxError('Info needs a stop name or index');
  }

  const keys: string[] = [];
  let failed = false;

  if (words.length > 1 && words.every(isIndexToken)) {
    for (const word of words) {
      const key = ctx.resolver.resolve(word);
      if (key === undefined) {
        console.error(new OutOfRangeError(Number(word), ctx.cache.size).message);
        failed = true;
      } else {
        keys.push(key);
      }
    }
  } else {
    keys.push(ctx.resolver.require(words.join(' ')).key);
  }

  const shown = keys.flatMap((key) => {
    const record = ctx.cache.get(key);
    return record ? [{ key, record }] : [];
  });

  outputData(
    shown.map(({ key, record }) => ({ key, ...record })),
    json ? 'json' : 'table',
    () => shown.map(({ key, record }) => renderStopInfo(key, record, ctx.render)).join('\n')
  );

  return failed ? 1 : 0;
}
