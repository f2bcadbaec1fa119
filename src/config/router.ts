/**
 * Receiver Router
 *
 * Resolves the receiver named in a webhook payload against the current
 * configuration snapshot. No patterns and no fallback receiver.
 *
 * @module config/router
 */

import { err, ok, type ReceiverConfig, type Result } from '../types/index.js';
import type { ConfigStore } from './configStore.js';

export interface ReceiverNotFound {
  readonly kind: 'receiver-not-found';
  readonly receiver: string;
  readonly message: string;
}

export interface ReceiverRouter {
  resolve(receiverName: string): Result<ReceiverConfig, ReceiverNotFound>;
}

export function createReceiverRouter(store: ConfigStore): ReceiverRouter {
  return {
    resolve(receiverName: string): Result<ReceiverConfig, ReceiverNotFound> {
      const receiver = store.current().receiverByName(receiverName);
      if (!receiver) {
        return err({
          kind: 'receiver-not-found',
          receiver: receiverName,
          message: `receiver missing: ${receiverName}`,
        });
      }
      return ok(receiver);
    },
  };
}
