/**
 * Prints the performance report from the data directory and saves a
 * copy next to it.
 *
 *   npx ts-node scripts/report.ts [days]
 */
import 'dotenv/config';
import { BANKROLL_USDC, DATA_DIR } from '../src/config';
import { PerformanceTracker } from '../src/tracker';

function main() {
  const arg  = Number(process.argv[2] ?? 30);
  const days = Number.isInteger(arg) && arg > 0 ? arg : 30;

  const tracker = new PerformanceTracker(DATA_DIR);
  console.log(tracker.generateReport(days));
  console.log(`ROI:          ${(tracker.getRoi(BANKROLL_USDC) * 100).toFixed(2)}%`);
  console.log(`Sharpe:       ${tracker.getSharpeRatio().toFixed(2)}`);
  console.log(`Max drawdown: ${(tracker.getMaxDrawdown() * 100).toFixed(2)}%`);
  tracker.saveReport(undefined, days);
}

main();
