import { EventEmitter } from 'events';
import type { CycleInvoiceStatus, TransactionType } from '@shared/schema';

export interface BillingEventMap {
  cycleClosed: {
    userId: string;
    totalProfit: string;
    feePercentage: string;
    feeAmount: string;
    status: CycleInvoiceStatus;
  };
  transactionDetected: {
    userId: string;
    type: TransactionType;
    amount: string;
    balanceBefore: string;
    balanceAfter: string;
  };
  tradesBackfilled: {
    userId: string;
    insertedCount: number;
    totalPnl: string;
    totalFees: string;
  };
  paymentConfirmed: {
    userId: string;
    chargeId: string;
    amount: string;
  };
  invoiceSent: {
    userId: string;
    chargeId: string;
    amount: string;
    hostedUrl: string | null;
    reason: "reissued" | "resent";
  };
  invoiceCancelled: {
    userId: string;
    chargeId: string;
    amount: string;
  };
}

export type BillingEventName = keyof BillingEventMap;

/**
 * Typed bus for notification glue (emails, dashboards). Listener errors are
 * logged and never reach the engine that emitted.
 */
export class BillingEvents {
  private readonly emitter = new EventEmitter();

  on<K extends BillingEventName>(event: K, listener: (payload: BillingEventMap[K]) => void | Promise<void>): () => void {
    const wrapped = (payload: BillingEventMap[K]) => {
      try {
        Promise.resolve(listener(payload)).catch((error: unknown) => {
          console.error(`[BillingEvents] ❌ Listener for ${event} failed:`, error);
        });
      } catch (error) {
        console.error(`[BillingEvents] ❌ Listener for ${event} failed:`, error);
      }
    };
    this.emitter.on(event, wrapped);
    return () => {
      this.emitter.off(event, wrapped);
    };
  }

  emit<K extends BillingEventName>(event: K, payload: BillingEventMap[K]): void {
    this.emitter.emit(event, payload);
  }
}
