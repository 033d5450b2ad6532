import type { Response } from "express";
import type { LedgerStore } from "../storage";
import type { BillingCycleService } from "../services/billing/billingCycleService";
import type { BalanceReconcilerService } from "../services/portfolio/balanceReconcilerService";
import type { TradeReconciliationService } from "../services/portfolio/tradeReconciliationService";
import type { StripeInvoicingProvider } from "../services/payments/stripeInvoicingProvider";
import {
    CredentialDecryptionError, ExchangeGatewayError, InvoicingError, NotFoundError, ValidationError, errorMessage,
} from "../services/errors";

export interface RouteServices {
    store: LedgerStore;
    billing: BillingCycleService;
    balance: BalanceReconcilerService;
    trades: TradeReconciliationService;
    invoicing: StripeInvoicingProvider | null;
    adminPassword: string | undefined;
}

export function sendServiceError(res: Response, error: unknown, context: string): void {
    if (error instanceof ValidationError) {
        res.status(400).json({ message: error.message });
        return;
    }
    if (error instanceof NotFoundError) {
        res.status(404).json({ message: error.message });
        return;
    }
    if (error instanceof CredentialDecryptionError) {
        res.status(422).json({ message: error.message });
        return;
    }
    if (error instanceof ExchangeGatewayError || error instanceof InvoicingError) {
        console.error(`[${context}] Upstream error:`, error.message);
        res.status(502).json({ message: error.message });
        return;
    }
    console.error(`[${context}] Error:`, error);
    res.status(500).json({ message: errorMessage(error) });
}
