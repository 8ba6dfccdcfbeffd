// ================================================================================================
// EVENT BUS: typed event emitter for committed ledger logs
//
// The ledger buffers logs while a transaction runs and publishes them here on commit,
// so subscribers never observe effects of a call that was rolled back.
// ================================================================================================

import { EventEmitter } from 'events';
import type { Logger } from '@/utils';
import type { LedgerLog, LedgerLogType } from './types';

export interface EventBusInput {
  logger: Logger;
}

type LogOfType<T extends LedgerLogType> = Extract<LedgerLog, { type: T }>;

function isLogOfType<T extends LedgerLogType>(entry: LedgerLog, type: T): entry is LogOfType<T> {
  return entry.type === type;
}

export class EventBus extends EventEmitter {
  private readonly logger: Logger;

  constructor(input: EventBusInput) {
    super();
    this.logger = input.logger;
    this.setMaxListeners(256);
  }

  // ── Emission ──

  publish(entry: LedgerLog): void {
    this.logger.debug(`📣 ${entry.type}`, entry);
    this.emit('log', entry);
  }

  // ── Subscriptions (return unsubscribe fn) ──

  onLog(cb: (entry: LedgerLog) => void): () => void {
    this.on('log', cb);
    return () => this.off('log', cb);
  }

  onLogType<T extends LedgerLogType>(type: T, cb: (entry: LogOfType<T>) => void): () => void {
    const listener = (entry: LedgerLog) => {
      if (isLogOfType(entry, type)) cb(entry);
    };
    this.on('log', listener);
    return () => this.off('log', listener);
  }

  destroy(): void {
    this.removeAllListeners();
  }
}
