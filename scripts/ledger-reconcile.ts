import { config } from 'dotenv';
import { closePool } from '../src/db';
import { runInventoryLedgerReconcile } from '../src/jobs/inventoryLedgerReconcile.job';

config();

async function run() {
  const tenantId = process.env.TENANT_ID;
  const strict = process.argv.includes('--strict');
  const summaries = await runInventoryLedgerReconcile({
    tenantIds: tenantId ? [tenantId] : undefined,
    mode: 'report'
  });

  for (const summary of summaries) {
    console.log(
      JSON.stringify(
        {
          tenantId: summary.tenantId,
          positionCount: summary.positionCount,
          mismatchCount: summary.mismatchCount,
          mismatched: summary.reports.filter((report) => report.mismatches.length > 0 || report.replayError)
        },
        null,
        2
      )
    );
  }

  const failed = summaries.some((summary) => summary.mismatchCount > 0);
  await closePool();
  process.exit(strict && failed ? 2 : 0);
}

run().catch((err) => {
  console.error(err);
  process.exit(1);
});
