/**
 * Risk gate — daily loss circuit breaker, open-position cap and the
 * voluntary daily-target stop, evaluated before every trade attempt.
 *
 * RiskState is shared with the position manager. This module only mutates
 * it through resetDailyStats(); entries and closes belong to the manager.
 */
import { PortfolioSummary, Position, RiskConfig, RiskState } from '../types';

export const RiskReasons = {
  OK:                 'OK',
  DAILY_LOSS_LIMIT:   'daily loss limit reached',
  MAX_OPEN_POSITIONS: 'max open positions reached',
  DAILY_TARGET:       'daily target reached',
} as const;

export type RiskReason = typeof RiskReasons[keyof typeof RiskReasons];

export interface RiskCheckResult {
  allowed: boolean;
  reason:  RiskReason;
}

// Local calendar day, YYYY-MM-DD.
export function localDateKey(now: Date = new Date()): string {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, '0');
  const d = String(now.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function createRiskState(startingBalance: number, now: Date = new Date()): RiskState {
  return {
    open_positions:       new Map(),
    daily_pnl:            0,
    daily_trades:         0,
    start_of_day_balance: startingBalance,
    last_reset_date:      localDateKey(now),
  };
}

// ── Lazy daily reset — call at the start of every cycle ───────
export function resetDailyStats(state: RiskState, currentBalance: number, now: Date = new Date()): boolean {
  const today = localDateKey(now);
  if (today === state.last_reset_date) return false;

  state.daily_pnl            = 0;
  state.daily_trades         = 0;
  state.start_of_day_balance = currentBalance;
  state.last_reset_date      = today;
  console.log(`🌅 Daily stats reset for ${today} (start balance $${currentBalance.toFixed(2)})`);
  return true;
}

// ── Can we open another position? ─────────────────────────────
export function canTrade(state: RiskState, config: RiskConfig): RiskCheckResult {
  if (state.daily_pnl <= -config.max_daily_loss) {
    return { allowed: false, reason: RiskReasons.DAILY_LOSS_LIMIT };
  }

  if (state.open_positions.size >= config.max_open_positions) {
    return { allowed: false, reason: RiskReasons.MAX_OPEN_POSITIONS };
  }

  if (state.start_of_day_balance > 0) {
    const dailyReturn = state.daily_pnl / state.start_of_day_balance;
    if (dailyReturn >= config.target_daily_return) {
      return { allowed: false, reason: RiskReasons.DAILY_TARGET };
    }
  }

  return { allowed: true, reason: RiskReasons.OK };
}

// Dollars committed to a position.
export function positionExposure(pos: Position): number {
  return pos.type === 'arbitrage' ? pos.cost : pos.size;
}

export function getPortfolioSummary(
  state:          RiskState,
  config:         RiskConfig,
  currentBalance: number,
): PortfolioSummary {
  let totalExposure = 0;
  for (const pos of state.open_positions.values()) totalExposure += positionExposure(pos);

  const dailyReturnPct = state.start_of_day_balance > 0
    ? (state.daily_pnl / state.start_of_day_balance) * 100
    : 0;

  return {
    current_balance:       currentBalance,
    open_positions:        state.open_positions.size,
    total_exposure:        totalExposure,
    daily_pnl:             state.daily_pnl,
    daily_return_pct:      dailyReturnPct,
    daily_trades:          state.daily_trades,
    max_daily_loss:        config.max_daily_loss,
    remaining_loss_buffer: config.max_daily_loss + state.daily_pnl,
    target_reached:        dailyReturnPct >= config.target_daily_return * 100,
  };
}

// ── Print summary ─────────────────────────────────────────────
export function printRiskSummary(summary: PortfolioSummary, config: RiskConfig): void {
  console.log('💼 Portfolio Summary');
  console.log(`   Balance:         $${summary.current_balance.toFixed(2)}`);
  console.log(`   Open positions:  ${summary.open_positions} / ${config.max_open_positions}`);
  console.log(`   Total exposure:  $${summary.total_exposure.toFixed(2)}`);
  console.log(`   Daily PnL:       $${summary.daily_pnl.toFixed(2)} (${summary.daily_return_pct.toFixed(2)}%) | ${summary.daily_trades} trade(s)`);
  console.log(`   Loss buffer:     $${summary.remaining_loss_buffer.toFixed(2)} of $${summary.max_daily_loss.toFixed(2)}`);
  if (summary.target_reached) {
    console.log('   🏁 Daily target reached — new entries paused');
  }
}
