/**
 * @module monitor/signals
 * Health signal kinds and their numeric codes.
 */

import type { SignalKind } from '../types.js';

export const SIGNAL_CODES: Readonly<Record<SignalKind, number>> = {
  NETWORK: 101,
  POWER: 102,
  CPU: 103,
  MEMORY: 104,
  STORAGE: 105,
};

export const SIGNAL_KINDS: readonly SignalKind[] = ['NETWORK', 'POWER', 'CPU', 'MEMORY', 'STORAGE'];

export function signalKindForCode(code: number): SignalKind | undefined {
  return SIGNAL_KINDS.find((kind) => SIGNAL_CODES[kind] === code);
}
