/**
 * Parsed command variants
 * The CLI layer turns commander's option bag into exactly one of these.
 */

import type { TransportMode } from '../lib/transport-mode.js';

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'list'; json: boolean }
  | { kind: 'info'; tokens: string[]; json: boolean }
  | { kind: 'rename'; tokens: string[] }
  | { kind: 'delete'; tokens: string[]; force: boolean }
  | { kind: 'clear'; force: boolean }
  | { kind: 'search'; name: string; modes: TransportMode[]; raw: boolean; json: boolean };
