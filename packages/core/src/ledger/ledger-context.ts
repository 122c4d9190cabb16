/**
 * Ledger Context
 *
 * Owns the store, configuration, event sink and logger for one ledger
 * instance. Operations never touch the store directly: they run inside
 * transaction(), which stages every write and event and applies them only
 * when the operation succeeds.
 */

import { logger as rootLogger } from '@tokenledger/observability';
import type { Logger } from '@tokenledger/observability';
import { loadLedgerConfig } from './ledger-config.js';
import type { LedgerConfig } from './ledger-config.js';
import { LedgerEventRecorder } from './ledger-events.js';
import type { LedgerEvent, LedgerEventSink } from './ledger-events.js';
import { InMemoryLedgerStore, StagedLedgerStore } from './ledger-store.js';
import type { LedgerStore } from './ledger-store.js';
import type { LedgerResult } from './ledger-types.js';

export interface LedgerContextOptions {
  store?: LedgerStore;
  config?: LedgerConfig;
  events?: LedgerEventSink;
  logger?: Logger;
}

export class LedgerTransaction {
  readonly store: StagedLedgerStore;
  private pendingEvents: LedgerEvent[] = [];

  constructor(
    parent: LedgerStore,
    readonly config: LedgerConfig
  ) {
    this.store = new StagedLedgerStore(parent);
  }

  stage(event: LedgerEvent): void {
    this.pendingEvents.push(event);
  }

  /**
   * Apply staged writes and hand back the staged events, oldest first
   */
  commit(): LedgerEvent[] {
    this.store.commit();
    const events = this.pendingEvents;
    this.pendingEvents = [];
    return events;
  }
}

export class LedgerContext {
  readonly store: LedgerStore;
  readonly config: LedgerConfig;
  readonly events: LedgerEventSink;
  readonly logger: Logger;

  constructor(options: LedgerContextOptions = {}) {
    this.logger = options.logger ?? rootLogger;
    this.store = options.store ?? new InMemoryLedgerStore();
    this.config = options.config ?? loadLedgerConfig();
    this.events = options.events ?? new LedgerEventRecorder(this.logger);
  }

  /**
   * Run one state transition atomically
   *
   * Writes and events staged by `operation` are applied only for an ok
   * result. A failed result, or an exception, leaves the store untouched.
   * Once committed the result stands: a sink that throws is logged and the
   * remaining events are still delivered.
   */
  transaction<T>(operation: (tx: LedgerTransaction) => LedgerResult<T>): LedgerResult<T> {
    const tx = new LedgerTransaction(this.store, this.config);
    const result = operation(tx);
    if (result.ok) {
      this.deliver(tx.commit());
    }
    return result;
  }

  private deliver(events: LedgerEvent[]): void {
    for (const event of events) {
      try {
        this.events.record(event);
      } catch (err) {
        this.logger.error({ err, event }, 'Ledger event sink error');
      }
    }
  }
}

/**
 * Stage an event in the running transaction
 */
export function depositEvent(tx: LedgerTransaction, event: LedgerEvent): void {
  tx.stage(event);
}
