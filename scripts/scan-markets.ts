/**
 * Read-only market scan: arbitrage, high-volume markets and the ranked
 * list the trader would act on. Places no orders.
 *
 *   npx ts-node scripts/scan-markets.ts [marketLimit]
 */
import 'dotenv/config';
import { CHAIN_ID, CLOB_HOST, GAMMA_HOST, SCAN_CONFIG } from '../src/config';
import { ClobExchange } from '../src/exchange';
import { fetchActiveMarkets, findArbitrageOpportunities, findHighLiquidityMarkets } from '../src/scanner';
import { findHighQualityOpportunities, rankOpportunities } from '../src/ranker';
import { Opportunity } from '../src/types';

async function main() {
  const limit    = Number(process.argv[2] ?? SCAN_CONFIG.market_scan_limit);
  const exchange = new ClobExchange({ clobHost: CLOB_HOST, gammaHost: GAMMA_HOST, chainId: CHAIN_ID });
  const config   = { ...SCAN_CONFIG, market_scan_limit: Number.isFinite(limit) ? limit : SCAN_CONFIG.market_scan_limit };

  console.log(`🔍 Fetching up to ${config.market_scan_limit} active markets...`);
  const markets = await fetchActiveMarkets(exchange, config.market_scan_limit);
  console.log(`   ${markets.length} markets\n`);

  const arbs = await findArbitrageOpportunities(exchange, { minProfitPct: config.min_arb_profit_pct, markets });
  console.log('💎 Arbitrage');
  if (arbs.length === 0) console.log('   none');
  for (const a of arbs.slice(0, 10)) {
    console.log(`   +${a.profit_pct.toFixed(2)}%  ${a.yes_price.toFixed(3)} + ${a.no_price.toFixed(3)}  max ${a.max_position.toFixed(0)} sh  ${a.question.slice(0, 60)}`);
  }

  const liquid = await findHighLiquidityMarkets(exchange, { minVolume: config.min_quality_volume, markets });
  console.log(`\n🌊 High-volume markets (${liquid.length})`);
  for (const l of liquid.slice(0, 10)) {
    const price = l.current_price === null ? '  n/a' : l.current_price.toFixed(3);
    console.log(`   $${l.market.volume.toFixed(0).padStart(10)}  mid ${price}  spread ${l.summary.spread.toFixed(3)}  ${l.market.question.slice(0, 50)}`);
  }

  const quality = await findHighQualityOpportunities(exchange, config, markets);
  const ranked  = rankOpportunities<Opportunity>([...arbs, ...quality], config.max_opportunities);
  console.log(`\n📋 Ranked (${ranked.length})`);
  ranked.forEach((o, i) => {
    console.log(`   ${String(i + 1).padStart(2)}. [${o.type}] p${o.priority} ev ${o.expected_value.toFixed(2)}  ${o.question.slice(0, 60)}`);
  });
}

main().catch(console.error);
