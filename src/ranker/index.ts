/**
 * Opportunity ranker — merges the arbitrage scan with quality-filtered
 * liquid markets into one bounded list.
 *
 * Ordering: ascending priority (arbitrage 1, high-quality 2), then
 * descending expected_value. Mispriced opportunities are not merged here;
 * they depend on estimates that are not always present.
 */
import { assessMarketQuality } from '../quality';
import { fetchActiveMarkets, findArbitrageOpportunities, findHighLiquidityMarkets } from '../scanner';
import { MarketDataSource } from '../exchange/types';
import { HighQualityOpportunity, Market, Opportunity, ScanConfig } from '../types';
import { DEFAULT_SCAN_CONFIG } from '../config';

export function rankOpportunities<T extends Opportunity>(opps: T[], limit: number): T[] {
  return [...opps]
    .sort((a, b) => a.priority - b.priority || b.expected_value - a.expected_value)
    .slice(0, limit);
}

export async function findHighQualityOpportunities(
  source:   MarketDataSource,
  config:   ScanConfig = DEFAULT_SCAN_CONFIG,
  markets?: Market[],
): Promise<HighQualityOpportunity[]> {
  const liquid = await findHighLiquidityMarkets(source, {
    minVolume:   config.min_quality_volume,
    marketLimit: config.market_scan_limit,
    markets,
  });

  const found: HighQualityOpportunity[] = [];
  for (const candidate of liquid.slice(0, config.quality_candidates)) {
    const quality = assessMarketQuality(candidate.market, candidate.summary, candidate.current_price);
    if (!quality.tradeable || quality.quality_score < config.min_ranked_quality) continue;

    found.push({
      type:           'high_quality',
      market_id:      candidate.market.condition_id,
      question:       candidate.market.question,
      token_id:       candidate.token_id,
      quality_score:  quality.quality_score,
      current_price:  candidate.current_price,
      volume:         candidate.market.volume,
      spread:         candidate.summary.spread,
      bid_volume:     candidate.summary.bid_volume,
      ask_volume:     candidate.summary.ask_volume,
      priority:       2,
      expected_value: quality.quality_score / 10,
    });
  }
  return found;
}

export async function getBestOpportunities(
  source: MarketDataSource,
  config: ScanConfig = DEFAULT_SCAN_CONFIG,
): Promise<Opportunity[]> {
  // One listing shared by both strategies so they rank the same snapshot.
  const markets   = await fetchActiveMarkets(source, config.market_scan_limit);
  const arbitrage = await findArbitrageOpportunities(source, {
    minProfitPct: config.min_arb_profit_pct,
    markets,
  });
  const quality = await findHighQualityOpportunities(source, config, markets);

  const ranked = rankOpportunities<Opportunity>([...arbitrage, ...quality], config.max_opportunities);
  console.log(`📋 Ranked ${ranked.length} opportunit${ranked.length === 1 ? 'y' : 'ies'} (${arbitrage.length} arb, ${quality.length} quality)`);
  return ranked;
}
