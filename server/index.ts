import { loadConfig } from "./config";
import { createDatabase } from "./db";
import { DbLedgerStore } from "./storage";
import { createApp } from "./app";
import { log } from "./log";
import { BillingEvents } from "./services/billingEvents";
import { EncryptionService } from "./services/encryptionService";
import { KrakenGateway } from "./services/exchange/krakenGateway";
import { StripeInvoicingProvider } from "./services/payments/stripeInvoicingProvider";
import { BillingCycleService } from "./services/billing/billingCycleService";
import { BalanceReconcilerService } from "./services/portfolio/balanceReconcilerService";
import { TradeReconciliationService } from "./services/portfolio/tradeReconciliationService";
import { SchedulerService } from "./services/scheduler";
import { formatUsd } from "./services/billing/money";

const config = loadConfig();
const database = createDatabase(config.databaseUrl);
const store = new DbLedgerStore(database.db);

const events = new BillingEvents();
const vault = new EncryptionService(config.encryptionKey);
const gateway = new KrakenGateway({ timeoutMs: config.exchange.timeoutMs });

let invoicing: StripeInvoicingProvider | null = null;
if (config.stripeSecretKey) {
  invoicing = new StripeInvoicingProvider({
    secretKey: config.stripeSecretKey,
    webhookSecret: config.stripeWebhookSecret,
    publicBaseUrl: config.publicBaseUrl,
  });
} else {
  log('[WARN] STRIPE_SECRET_KEY not set - cycles that owe a fee will stay open until payments are configured');
}

const billing = new BillingCycleService({
  store,
  invoicing,
  events,
  options: { cycleDays: config.billing.cycleDays, feeTierRates: config.billing.feeTierRates },
});
const balance = new BalanceReconcilerService({
  store,
  gateway,
  vault,
  events,
  options: { thresholdUsd: config.balanceCheck.thresholdUsd },
});
const trades = new TradeReconciliationService({
  store,
  gateway,
  vault,
  events,
  options: {
    lookbackDays: config.tradeReconciliation.lookbackDays,
    dedupToleranceMs: config.tradeReconciliation.dedupToleranceMs,
    feeTierRates: config.billing.feeTierRates,
  },
});

events.on('cycleClosed', (e) => {
  log(`cycle closed for ${e.userId}: ${e.status}, fee ${formatUsd(e.feeAmount)}`, 'events');
});
events.on('transactionDetected', (e) => {
  log(`${e.type} of ${formatUsd(e.amount)} detected for ${e.userId}`, 'events');
});
events.on('invoiceSent', (e) => {
  log(`invoice ${e.chargeId} (${formatUsd(e.amount)}) ${e.reason} for ${e.userId}: ${e.hostedUrl ?? 'no link'}`, 'events');
});
events.on('invoiceCancelled', (e) => {
  log(`fee of ${formatUsd(e.amount)} waived for ${e.userId}`, 'events');
});

const scheduler = new SchedulerService(billing, balance, {
  billingIntervalMs: config.billing.checkIntervalMs,
  balanceIntervalMs: config.balanceCheck.intervalMs,
  balanceStartupDelayMs: config.balanceCheck.startupDelayMs,
});

const { server } = createApp({
  store,
  billing,
  balance,
  trades,
  invoicing,
  adminPassword: config.adminPassword,
});

server.listen({ port: config.port, host: "0.0.0.0" }, () => {
  log(`serving on port ${config.port}`);
  log('[INFO] Starting background services...');
  scheduler.start();
});

let shuttingDown = false;
const shutdown = async (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  log(`[INFO] ${signal} received, shutting down services...`);
  scheduler.stop();
  server.close();
  try {
    await database.close();
  } catch (error) {
    console.error('[DB] Error closing pool:', error);
  }
  log('[INFO] All services stopped');
  process.exit(0);
};

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
