/**
 * Quality report for one market, plus what a Kelly bet would look like
 * at a given probability estimate.
 *
 *   npx ts-node scripts/check-market.ts <conditionId> [estimatedProb]
 */
import 'dotenv/config';
import { BANKROLL_USDC, CHAIN_ID, CLOB_HOST, GAMMA_HOST, RISK_CONFIG } from '../src/config';
import { ClobExchange } from '../src/exchange';
import { analyzeMarketQuality } from '../src/quality';
import { kellyBetSize } from '../src/sizing';

async function main() {
  const conditionId = process.argv[2];
  if (!conditionId) {
    console.log('Usage: ts-node scripts/check-market.ts <conditionId> [estimatedProb]');
    process.exitCode = 1;
    return;
  }

  const exchange = new ClobExchange({ clobHost: CLOB_HOST, gammaHost: GAMMA_HOST, chainId: CHAIN_ID });
  const result   = await analyzeMarketQuality(exchange, conditionId);

  if ('reason' in result) {
    console.log(`❌ ${conditionId}: ${result.reason}`);
    return;
  }

  console.log(`📊 ${result.question}`);
  console.log(`   Quality:   ${result.quality_score}/100 ${result.tradeable ? '✅ tradeable' : '⚠️  not tradeable'}`);
  console.log(`   Volume:    $${result.volume.toFixed(0)}`);
  console.log(`   Spread:    ${result.spread.toFixed(3)}`);
  console.log(`   Liquidity: ${result.liquidity.toFixed(0)} shares`);

  if (result.current_price === null) return;
  console.log(`   Midpoint:  ${result.current_price.toFixed(3)}`);

  const estimate = process.argv[3] === undefined ? null : Number(process.argv[3]);
  if (estimate === null || !Number.isFinite(estimate)) return;

  const bet = kellyBetSize(estimate, result.current_price, BANKROLL_USDC, RISK_CONFIG.kelly_fraction);
  console.log(`\n🎲 Kelly (${RISK_CONFIG.kelly_fraction}x) at p=${estimate}: $${bet.toFixed(2)} of $${BANKROLL_USDC}`);
}

main().catch(console.error);
