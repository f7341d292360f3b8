/**
 * One trading cycle: daily rollover → gate → scan/rank → execute →
 * monitor/close → persist → summary. Everything it touches comes in
 * through CycleDeps so the same path runs live, in dry run and in tests.
 */
import { StrategyConfig } from '../config';
import { Exchange } from '../exchange/types';
import { CloseResult, ExecutionResult, PositionManager } from '../lifecycle';
import { getBestOpportunities } from '../ranker';
import { canTrade, getPortfolioSummary, localDateKey, printRiskSummary, resetDailyStats } from '../risk';
import { saveState } from '../risk/store';
import { findMispricedMarkets } from '../scanner';
import { PerformanceTracker } from '../tracker';
import { Opportunity, PortfolioSummary, Position, RiskConfig, RiskState, ScanConfig } from '../types';
import { errorMessage } from '../utils/errors';

export interface CycleNotifier {
  execution(opp: Opportunity, result: ExecutionResult): Promise<void>;
  exit(position: Position, exitPrice: number, pnl: number, reason: string): Promise<void>;
}

export interface CycleDeps {
  exchange:    Exchange;
  state:       RiskState;
  manager:     PositionManager;
  tracker:     PerformanceTracker;
  riskConfig:  RiskConfig;
  scanConfig:  ScanConfig;
  strategies:  StrategyConfig;
  getBankroll: () => Promise<number>;
  estimates?:  ReadonlyMap<string, number>;
  stateFile?:  string;
  notifier?:   CycleNotifier;
  now?:        () => Date;
}

export interface CycleReport {
  gate:       string;
  bankroll:   number;
  considered: number;
  opened:     ExecutionResult[];
  closed:     CloseResult[];
  summary:    PortfolioSummary;
}

async function notifySafely(label: string, send: () => Promise<void>): Promise<void> {
  try {
    await send();
  } catch (err) {
    console.error(`⚠️  ${label} alert failed: ${errorMessage(err)}`);
  }
}

// Close the books on the previous day before the lazy reset wipes them.
function rollDay(deps: CycleDeps, bankroll: number, now: Date): void {
  const { state, tracker } = deps;
  if (localDateKey(now) === state.last_reset_date) return;

  tracker.recordDailyStats({
    daily_pnl:        state.daily_pnl,
    daily_return_pct: state.start_of_day_balance > 0 ? (state.daily_pnl / state.start_of_day_balance) * 100 : 0,
    daily_trades:     state.daily_trades,
    open_positions:   state.open_positions.size,
    balance:          bankroll,
  }, state.last_reset_date);
  resetDailyStats(state, bankroll, now);
}

async function collectOpportunities(deps: CycleDeps): Promise<Opportunity[]> {
  const { exchange, scanConfig, strategies } = deps;
  const found: Opportunity[] = [];

  if (strategies.arbitrage || strategies.high_quality) {
    const ranked = await getBestOpportunities(exchange, scanConfig);
    for (const opp of ranked) {
      if (opp.type === 'arbitrage'    && strategies.arbitrage)    found.push(opp);
      if (opp.type === 'high_quality' && strategies.high_quality) found.push(opp);
    }
  }

  if (strategies.mispriced && deps.estimates && deps.estimates.size > 0) {
    found.push(...await findMispricedMarkets(exchange, deps.estimates));
  }

  return found;
}

export async function runTradingCycle(deps: CycleDeps): Promise<CycleReport> {
  const { state, manager, tracker, riskConfig } = deps;
  const now      = deps.now?.() ?? new Date();
  const bankroll = await deps.getBankroll();

  console.log(`\n⏱️  [${now.toISOString()}] Starting cycle (bankroll $${bankroll.toFixed(2)})`);
  rollDay(deps, bankroll, now);

  const opened: ExecutionResult[] = [];
  const gate = canTrade(state, riskConfig);
  let considered = 0;

  if (!gate.allowed) {
    console.log(`🚦 New entries paused: ${gate.reason}`);
  } else {
    const opportunities = await collectOpportunities(deps);
    considered = opportunities.length;

    for (const opp of opportunities) {
      const check = canTrade(state, riskConfig);
      if (!check.allowed) {
        console.log(`🚦 Stopping entries: ${check.reason}`);
        break;
      }

      const held = [...state.open_positions.values()].some(p => p.market_id === opp.market_id);
      if (held) continue;

      const result = await manager.executeOpportunity(opp, bankroll);
      if (result.success) {
        opened.push(result);
        const notifier = deps.notifier;
        if (notifier) await notifySafely('Execution', () => notifier.execution(opp, result));
      }
    }
  }

  // ── Exits ───────────────────────────────────────────────────
  const closed: CloseResult[] = [];
  const actions = await manager.managePositions();
  for (const action of actions) {
    const result = await manager.closePosition(action.position_id);
    closed.push(result);
    if (!result.success) {
      console.error(`   ❌ Could not close ${action.position_id}: ${result.error}`);
      continue;
    }

    const pos = result.position;
    tracker.recordTrade({
      type:        pos.type,
      position_id: pos.id,
      market_id:   pos.market_id,
      pnl:         result.pnl,
      size:        pos.type === 'arbitrage' ? pos.cost : pos.size,
      entry_price: pos.type === 'value_bet' ? pos.entry_price : undefined,
      exit_price:  result.exit_price,
      reason:      action.reason,
    });
    const notifier = deps.notifier;
    if (notifier) await notifySafely('Exit', () => notifier.exit(pos, result.exit_price, result.pnl, action.reason));
  }

  if (deps.stateFile) {
    try {
      saveState(deps.stateFile, state);
    } catch (err) {
      console.error(`⚠️  Could not persist state: ${errorMessage(err)}`);
    }
  }

  const summary = getPortfolioSummary(state, riskConfig, bankroll);
  printRiskSummary(summary, riskConfig);

  return { gate: gate.reason, bankroll, considered, opened, closed, summary };
}
