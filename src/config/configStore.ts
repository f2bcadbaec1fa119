/**
 * Configuration snapshot store.
 *
 * Holds the current immutable Config. Reloads replace the whole snapshot in
 * one assignment, so a request that already read a snapshot keeps using it.
 *
 * @module config/configStore
 */

import type { Config } from './receiverConfig.js';

export interface ConfigStore {
  current(): Config;
  replace(next: Config): void;
}

export function createConfigStore(initial: Config): ConfigStore {
  let snapshot = initial;
  return {
    current(): Config {
      return snapshot;
    },
    replace(next: Config): void {
      snapshot = next;
    },
  };
}
