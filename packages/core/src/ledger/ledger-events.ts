/**
 * Ledger events handed to the host's event log
 *
 * Approval is reused for two meanings: the delta granted by approve, and
 * the amount consumed by transferFrom. Neither carries the new total.
 */

import { logger as rootLogger } from '@tokenledger/observability';
import type { Logger } from '@tokenledger/observability';
import type { LedgerEventResponse } from '@tokenledger/types';
import type { AccountId } from './ledger-types.js';

export interface TransferEvent {
  type: 'Transfer';
  from: AccountId;
  to: AccountId;
  value: bigint;
}

export interface ApprovalEvent {
  type: 'Approval';
  owner: AccountId;
  spender: AccountId;
  value: bigint;
}

export type LedgerEvent = TransferEvent | ApprovalEvent;

export type LedgerEventType = LedgerEvent['type'];

/**
 * Host-side receiver for committed events
 */
export interface LedgerEventSink {
  record(event: LedgerEvent): void;
}

export type LedgerEventHandler = (event: LedgerEvent) => void;

/**
 * Default sink: keeps committed events in order until the host drains them
 * and fans each one out to registered handlers
 */
export class LedgerEventRecorder implements LedgerEventSink {
  private handlers: LedgerEventHandler[] = [];
  private recorded: LedgerEvent[] = [];
  private readonly logger: Logger;

  constructor(logger: Logger = rootLogger) {
    this.logger = logger.child({ module: 'ledger-events' });
  }

  on(handler: LedgerEventHandler): void {
    this.handlers.push(handler);
  }

  record(event: LedgerEvent): void {
    this.recorded.push(event);

    // A failing handler must not stop the others or undo the commit
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (err) {
        this.logger.error({ err, event }, 'Ledger event handler error');
      }
    }
  }

  /**
   * Events recorded since the last drain, oldest first
   */
  peek(): readonly LedgerEvent[] {
    return [...this.recorded];
  }

  /**
   * Hand over every recorded event and forget them
   */
  drain(): LedgerEvent[] {
    const events = this.recorded;
    this.recorded = [];
    return events;
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers(): void {
    this.handlers = [];
  }
}

export function toLedgerEventResponse(event: LedgerEvent): LedgerEventResponse {
  switch (event.type) {
    case 'Transfer':
      return { type: 'Transfer', from: event.from, to: event.to, value: event.value.toString() };
    case 'Approval':
      return {
        type: 'Approval',
        owner: event.owner,
        spender: event.spender,
        value: event.value.toString(),
      };
  }
}
