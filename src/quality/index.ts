/**
 * Market quality scorer — a 0–100 tradeability heuristic.
 *
 *   volume    0–30   lifetime USD traded
 *   spread    0–30   best ask − best bid on the YES token
 *   liquidity 0–40   min(bid volume, ask volume)
 *
 * Axes are scored independently and summed.
 */
import { fetchPriceSummary } from '../depth';
import { MarketDataSource } from '../exchange/types';
import { Market, TokenPriceSummary } from '../types';
import { errorMessage } from '../utils/errors';

export const MIN_TRADEABLE_SCORE = 40;

export interface QualityInputs {
  volume:    number;
  spread:    number;
  liquidity: number;
}

export interface QualityBreakdown {
  volume:    number;
  spread:    number;
  liquidity: number;
  total:     number;
}

export interface QualityReport {
  market_id:     string;
  question:      string;
  quality_score: number;
  tradeable:     boolean;
  active:        boolean;
  volume:        number;
  spread:        number;
  liquidity:     number;
  current_price: number | null;
}

export type QualityResult =
  | QualityReport
  | { market_id: string; quality_score: 0; tradeable: false; reason: string };

function volumePoints(volume: number): number {
  if (volume > 100_000) return 30;
  if (volume > 50_000)  return 25;
  if (volume > 10_000)  return 20;
  if (volume > 1_000)   return 10;
  return 0;
}

function spreadPoints(spread: number): number {
  if (spread < 0.01) return 30;
  if (spread < 0.02) return 25;
  if (spread < 0.05) return 15;
  if (spread < 0.10) return 5;
  return 0;
}

function liquidityPoints(liquidity: number): number {
  if (liquidity > 10_000) return 40;
  if (liquidity > 5_000)  return 30;
  if (liquidity > 1_000)  return 20;
  if (liquidity > 100)    return 10;
  return 0;
}

export function scoreMarketQuality(inputs: QualityInputs): QualityBreakdown {
  const volume    = volumePoints(inputs.volume);
  const spread    = spreadPoints(inputs.spread);
  const liquidity = liquidityPoints(inputs.liquidity);
  return { volume, spread, liquidity, total: volume + spread + liquidity };
}

export function isTradeable(score: number, active: boolean): boolean {
  return score >= MIN_TRADEABLE_SCORE && active;
}

// ── Score an already-fetched snapshot ─────────────────────────
export function assessMarketQuality(
  market:       Market,
  summary:      TokenPriceSummary,
  currentPrice: number | null,
): QualityReport {
  const liquidity = Math.min(summary.bid_volume, summary.ask_volume);
  const { total } = scoreMarketQuality({ volume: market.volume, spread: summary.spread, liquidity });

  return {
    market_id:     market.condition_id,
    question:      market.question,
    quality_score: total,
    tradeable:     isTradeable(total, market.active),
    active:        market.active,
    volume:        market.volume,
    spread:        summary.spread,
    liquidity,
    current_price: currentPrice,
  };
}

// ── Fetch + score a single market by ID ───────────────────────
export async function analyzeMarketQuality(
  source:   MarketDataSource,
  marketId: string,
): Promise<QualityResult> {
  const reject = (reason: string): QualityResult =>
    ({ market_id: marketId, quality_score: 0, tradeable: false, reason });

  try {
    const market = await source.getMarket(marketId);
    if (!market) return reject('market not found');
    if (market.tokens.length < 1) return reject('no tokens');

    const yesToken = market.tokens[0].token_id;
    const summary  = await fetchPriceSummary(source, yesToken);
    if (!summary) return reject('order book unavailable');

    const price = await source.getMidpoint(yesToken);
    return assessMarketQuality(market, summary, price);
  } catch (err) {
    console.error(`⚠️  Quality analysis for ${marketId} failed: ${errorMessage(err)}`);
    return reject(errorMessage(err));
  }
}
