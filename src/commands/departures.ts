/**
 * Departures Command
 * reise <stop...> [mode filters] [--raw]
 */

import { filterByModes, type TransportMode } from '../lib/transport-mode.js';
import { outputData, renderDepartures } from '../lib/output-formatter.js';
import type { CommandContext } from './context.js';

export interface DeparturesOptions {
  modes: TransportMode[];
  raw: boolean;
  json: boolean;
}

/**
 * Resolve the stop (cache or search), then show its departures
 * @throws OutOfRangeError | RemoteError | PersistenceError
 */
export async function runDepartures(ctx: CommandContext, name: string, options: DeparturesOptions): Promise<number> {
  const outcome = await ctx.lookup.lookup(name, { raw: options.raw });

  if (outcome.status === 'no-results') {
    return 1;
  }
  if (outcome.status === 'canceled') {
    return 0;
  }

  const key = outcome.status === 'unsaved' ? null : outcome.key;
  const { stopName, departures } = await ctx.departures.getDepartures(outcome.record.id);
  const shown = filterByModes(departures, options.modes);

  if (options.json) {
    outputData(
      { stop: { key, id: outcome.record.id, name: stopName }, departures: shown },
      'json',
      () => ''
    );
    return 0;
  }

  if (departures.length === 0) {
    console.log(`No upcoming departures from ${stopName}`);
    return 0;
  }
  if (shown.length === 0) {
    console.log(`No ${options.modes.join(', ')} departures`);
    return 0;
  }

  console.log(renderDepartures(stopName, shown, ctx.render));
  return 0;
}
