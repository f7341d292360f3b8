/**
 * Position sizing. Every branch is a min() over three caps: the fixed
 * position cap, a liquidity-derived cap where the opportunity carries
 * one, and a fraction of bankroll.
 */
import { Opportunity, RiskConfig } from '../types';

const MAX_BANKROLL_FRACTION = 0.10;

function arbitrageSize(profitPct: number, maxPosition: number, bankroll: number, cap: number): number {
  const liquidityCap = maxPosition * 100;
  if (profitPct >= 2.0) return Math.min(cap,       liquidityCap, bankroll * 0.15);
  if (profitPct >= 1.0) return Math.min(cap * 0.7, liquidityCap, bankroll * 0.10);
  return Math.min(cap * 0.5, liquidityCap, bankroll * 0.05);
}

function qualitySize(score: number, bankroll: number, cap: number): number {
  if (score >= 80) return Math.min(cap * 0.6, bankroll * 0.08);
  if (score >= 60) return Math.min(cap * 0.4, bankroll * 0.05);
  return Math.min(cap * 0.2, bankroll * 0.03);
}

// ── Dollar size for an opportunity ────────────────────────────
export function calculatePositionSize(
  opportunity: Opportunity,
  bankroll:    number,
  config:      RiskConfig,
): number {
  const cap = config.max_position_size;
  let size: number;

  switch (opportunity.type) {
    case 'arbitrage':
      size = arbitrageSize(opportunity.profit_pct, opportunity.max_position, bankroll, cap);
      break;

    case 'mispriced': {
      const edge = Math.abs(opportunity.edge_pct) / 100;
      if (edge < config.min_edge) return 0;
      const kelly = bankroll * edge * config.kelly_fraction;
      size = Math.min(kelly, cap, bankroll * MAX_BANKROLL_FRACTION);
      break;
    }

    case 'high_quality':
      size = qualitySize(opportunity.quality_score, bankroll, cap);
      break;

    default:
      // Records that arrive from outside the type system (persisted / hand-built)
      size = Math.min(cap * 0.3, bankroll * 0.03);
  }

  return Number.isFinite(size) ? Math.max(0, size) : 0;
}

// ── General fractional Kelly for a binary contract ────────────
export function kellyBetSize(
  probability:   number,
  marketPrice:   number,
  bankroll:      number,
  kellyFraction = 0.25,
): number {
  if (marketPrice <= 0 || marketPrice >= 1) return 0;

  const edge = probability - marketPrice;
  if (edge <= 0) return 0;

  const kellyPct = (edge / (1 - marketPrice)) * kellyFraction;
  const betSize  = Math.min(bankroll * kellyPct, bankroll * MAX_BANKROLL_FRACTION);
  return Math.max(0, betSize);
}
