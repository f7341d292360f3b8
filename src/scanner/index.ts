/**
 * Opportunity scanner — walks the active market set and emits typed
 * opportunity records:
 *
 *   arbitrage   YES ask + NO ask < $1.00 on a binary market
 *   mispriced   YES midpoint far from an externally supplied estimate
 *   liquid      high-volume markets, fed to the quality filter by the ranker
 *
 * A failure on one market is logged and that market skipped; the scan
 * carries on with the rest.
 */
import { fetchPriceSummary } from '../depth';
import { MarketDataSource } from '../exchange/types';
import { ArbitrageOpportunity, Market, MispricedOpportunity, TokenPriceSummary } from '../types';
import { errorMessage } from '../utils/errors';

const PAGE_SIZE           = 100;
const MIN_MISPRICING_PCT  = 5;
export const MISPRICED_PRIORITY = 3;

// ── Page through active markets ───────────────────────────────
export async function fetchActiveMarkets(source: MarketDataSource, max: number): Promise<Market[]> {
  const markets: Market[] = [];
  let offset = 0;

  while (markets.length < max) {
    let batch: Market[];
    try {
      batch = await source.listMarkets(Math.min(PAGE_SIZE, max - markets.length), offset);
    } catch (err) {
      console.error(`⚠️  Market listing failed at offset ${offset}: ${errorMessage(err)}`);
      break;
    }
    if (batch.length === 0) break;

    markets.push(...batch);
    if (batch.length < PAGE_SIZE) break;
    offset += batch.length;
  }

  return markets.slice(0, max);
}

// ── Arbitrage: buy both sides when YES + NO < 1 ───────────────
export interface ArbitrageScanOptions {
  minProfitPct?: number;
  marketLimit?:  number;
  markets?:      Market[];   // pre-fetched snapshot; listed fresh when absent
}

async function checkArbitrage(
  source:       MarketDataSource,
  market:       Market,
  minProfitPct: number,
): Promise<ArbitrageOpportunity | null> {
  const [yes, no] = market.tokens;
  const yesDepth  = await fetchPriceSummary(source, yes.token_id);
  const noDepth   = await fetchPriceSummary(source, no.token_id);
  if (!yesDepth || !noDepth) return null;
  // an empty ask side summarises to best_ask 1 with no volume
  if (yesDepth.ask_volume <= 0 || noDepth.ask_volume <= 0) return null;

  const yesPrice     = yesDepth.best_ask;
  const noPrice      = noDepth.best_ask;
  const combinedCost = yesPrice + noPrice;
  if (combinedCost >= 1.0) return null;

  const profit    = 1.0 - combinedCost;
  const profitPct = (profit / combinedCost) * 100;
  if (profitPct < minProfitPct) return null;

  return {
    type:           'arbitrage',
    market_id:      market.condition_id,
    question:       market.question,
    yes_token:      yes.token_id,
    no_token:       no.token_id,
    yes_price:      yesPrice,
    no_price:       noPrice,
    combined_cost:  combinedCost,
    profit,
    profit_pct:     profitPct,
    max_position:   Math.min(yesDepth.ask_volume, noDepth.ask_volume),
    priority:       1,
    expected_value: profitPct,
  };
}

export async function findArbitrageOpportunities(
  source: MarketDataSource,
  opts:   ArbitrageScanOptions = {},
): Promise<ArbitrageOpportunity[]> {
  const minProfitPct = opts.minProfitPct ?? 1.0;
  const markets      = opts.markets ?? await fetchActiveMarkets(source, opts.marketLimit ?? 500);
  const found: ArbitrageOpportunity[] = [];

  for (const market of markets) {
    if (!market.active || market.tokens.length !== 2) continue;
    try {
      const opp = await checkArbitrage(source, market, minProfitPct);
      if (opp) found.push(opp);
    } catch (err) {
      console.error(`⚠️  Arb check failed for ${market.condition_id}: ${errorMessage(err)}`);
    }
  }

  found.sort((a, b) => b.profit_pct - a.profit_pct);
  if (found.length > 0) console.log(`💎 Found ${found.length} arbitrage opportunit${found.length === 1 ? 'y' : 'ies'}`);
  return found;
}

// ── Mispricing vs external probability estimates ──────────────
async function checkMispricing(
  source:        MarketDataSource,
  marketId:      string,
  estimatedProb: number,
): Promise<MispricedOpportunity | null> {
  const market = await source.getMarket(marketId);
  if (!market || !market.active || market.tokens.length < 1) return null;

  const tokenId     = market.tokens[0].token_id;
  const marketPrice = await source.getMidpoint(tokenId);
  if (!marketPrice || marketPrice <= 0) return null;

  const edge    = estimatedProb - marketPrice;
  const edgePct = (edge / marketPrice) * 100;
  if (Math.abs(edgePct) < MIN_MISPRICING_PCT) return null;

  const depth = await fetchPriceSummary(source, tokenId);
  if (!depth) return null;

  const side = edge > 0 ? 'BUY' : 'SELL';
  return {
    type:             'mispriced',
    market_id:        marketId,
    question:         market.question,
    token_id:         tokenId,
    market_price:     marketPrice,
    estimated_prob:   estimatedProb,
    edge,
    edge_pct:         edgePct,
    recommended_side: side,
    liquidity:        side === 'BUY' ? depth.ask_volume : depth.bid_volume,
    priority:         MISPRICED_PRIORITY,
    expected_value:   Math.abs(edgePct),
  };
}

export async function findMispricedMarkets(
  source:    MarketDataSource,
  estimates: ReadonlyMap<string, number> | null | undefined,
): Promise<MispricedOpportunity[]> {
  if (!estimates || estimates.size === 0) return [];

  const found: MispricedOpportunity[] = [];
  for (const [marketId, estimatedProb] of estimates) {
    try {
      const opp = await checkMispricing(source, marketId, estimatedProb);
      if (opp) found.push(opp);
    } catch (err) {
      console.error(`⚠️  Mispricing check failed for ${marketId}: ${errorMessage(err)}`);
    }
  }

  found.sort((a, b) => Math.abs(b.edge_pct) - Math.abs(a.edge_pct));
  if (found.length > 0) console.log(`🎯 Found ${found.length} potentially mispriced market(s)`);
  return found;
}

// ── High-volume markets for the quality filter ────────────────
export interface LiquidMarket {
  market:        Market;
  token_id:      string;
  summary:       TokenPriceSummary;
  current_price: number | null;
}

export interface LiquidityScanOptions {
  minVolume?:   number;
  marketLimit?: number;
  markets?:     Market[];
}

export async function findHighLiquidityMarkets(
  source: MarketDataSource,
  opts:   LiquidityScanOptions = {},
): Promise<LiquidMarket[]> {
  const minVolume = opts.minVolume ?? 10_000;
  const markets   = opts.markets ?? await fetchActiveMarkets(source, opts.marketLimit ?? 500);
  const liquid: LiquidMarket[] = [];

  for (const market of markets) {
    if (!market.active || market.volume < minVolume || market.tokens.length < 1) continue;
    const tokenId = market.tokens[0].token_id;
    try {
      const summary = await fetchPriceSummary(source, tokenId);
      if (!summary) continue;
      const currentPrice = await source.getMidpoint(tokenId);
      liquid.push({ market, token_id: tokenId, summary, current_price: currentPrice });
    } catch (err) {
      console.error(`⚠️  Liquidity check failed for ${market.condition_id}: ${errorMessage(err)}`);
    }
  }

  return liquid.sort((a, b) => b.market.volume - a.market.volume);
}

// Momentum needs a historical price series, which is not tracked.
export function findMomentumOpportunities(): [] {
  return [];
}
