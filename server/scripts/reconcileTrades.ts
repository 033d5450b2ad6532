/**
 * Rebuilds trade history from exchange fills.
 *
 *   npm run reconcile:trades              # every user with credentials
 *   npm run reconcile:trades -- <userId>  # one user
 */
import { loadConfig } from "../config";
import { createDatabase } from "../db";
import { DbLedgerStore } from "../storage";
import { BillingEvents } from "../services/billingEvents";
import { EncryptionService } from "../services/encryptionService";
import { KrakenGateway } from "../services/exchange/krakenGateway";
import { TradeReconciliationService } from "../services/portfolio/tradeReconciliationService";
import { formatUsd } from "../services/billing/money";

async function main(): Promise<number> {
  const config = loadConfig();
  const database = createDatabase(config.databaseUrl);

  try {
    const vault = new EncryptionService(config.encryptionKey);
    if (!vault.isConfigured()) {
      return 1;
    }

    const service = new TradeReconciliationService({
      store: new DbLedgerStore(database.db),
      gateway: new KrakenGateway({ timeoutMs: config.exchange.timeoutMs }),
      vault,
      events: new BillingEvents(),
      options: {
        lookbackDays: config.tradeReconciliation.lookbackDays,
        dedupToleranceMs: config.tradeReconciliation.dedupToleranceMs,
        feeTierRates: config.billing.feeTierRates,
      },
    });

    console.log("=".repeat(60));
    console.log("🔄 TRADE RECONCILIATION");
    console.log("=".repeat(60));

    const userId = process.argv[2];
    if (userId) {
      const result = await service.reconcileUser(userId);
      console.log(`✅ ${result.inserted} inserted, ${result.skipped} skipped, P&L ${formatUsd(result.totalPnl)}, fees ${formatUsd(result.totalFees)}`);
      return 0;
    }

    const summary = await service.reconcileAllUsers();
    console.log("=".repeat(60));
    console.log(`✅ ${summary.users} users, ${summary.inserted} trades inserted, ${summary.skipped} duplicates, ${summary.failed} failed`);
    console.log(`   Total P&L: ${formatUsd(summary.totalPnl)} | Total fees: ${formatUsd(summary.totalFees)}`);
    return summary.failed > 0 ? 1 : 0;
  } finally {
    await database.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error("❌ Trade reconciliation failed:", error);
    process.exit(1);
  });
