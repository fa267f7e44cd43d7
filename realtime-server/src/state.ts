import type { SocketLike } from './network';

// Spectators (watch-only connections)
export const spectators = new Set<SocketLike>();

let nextConnectionNumber = 1;
let nextWatcherNumber = 1;

/** Sequential number used in generated agent names */
export function takeConnectionNumber(): number {
  return nextConnectionNumber++;
}

export function takeWatcherNumber(): number {
  return nextWatcherNumber++;
}
