/**
 * Command Context
 * Everything a command needs, built once per invocation
 */

import type { StopCache } from '../services/stop-cache.js';
import type { DepartureSource, PlaceSearch } from '../services/api.js';
import { CacheMutator } from '../lib/cache-mutator.js';
import { StopLookup } from '../lib/stop-lookup.js';
import { StopResolver } from '../lib/stop-resolver.js';
import type { Prompter } from '../lib/prompt.js';
import type { RenderOptions } from '../lib/output-formatter.js';

export interface CommandContext {
  cache: StopCache;
  resolver: StopResolver;
  mutator: CacheMutator;
  lookup: StopLookup;
  departures: DepartureSource;
  render: RenderOptions;
}

export interface ContextDeps {
  cache: StopCache;
  api: PlaceSearch & DepartureSource;
  prompter: Prompter;
  color?: boolean;
}

export function createContext(deps: ContextDeps): CommandContext {
  const render: RenderOptions = { color: deps.color === true };
  const resolver = new StopResolver(deps.cache);
  const mutator = new CacheMutator(deps.cache, resolver, deps.prompter);
  const lookup = new StopLookup({
    cache: deps.cache,
    resolver,
    mutator,
    search: deps.api,
    prompter: deps.prompter,
    render,
  });

  return {
    cache: deps.cache,
    resolver,
    mutator,
    lookup,
    departures: deps.api,
    render,
  };
}
