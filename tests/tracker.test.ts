import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PerformanceTracker, TradeInput } from '../src/tracker';
import { silenceConsole } from './helpers/console';

silenceConsole();

let dir: string;
let clock: Date;
const now = () => clock;

function trade(type: string, pnl: number): TradeInput {
  return { type, position_id: `${type}-${pnl}`, market_id: 'm', pnl, size: 50 };
}

function dailyRow(pnl: number, returnPct: number) {
  return { daily_pnl: pnl, daily_return_pct: returnPct, daily_trades: 1 };
}

beforeEach(() => {
  dir   = fs.mkdtempSync(path.join(os.tmpdir(), 'trader-perf-'));
  clock = new Date(2026, 0, 20, 12, 0);
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('trades', () => {
  test('are persisted and reloaded', () => {
    new PerformanceTracker(dir, now).recordTrade(trade('value_bet', 12));
    const reloaded = new PerformanceTracker(dir, now);
    expect(reloaded.getTrades()).toHaveLength(1);
    expect(reloaded.getTrades()[0]).toMatchObject({ type: 'value_bet', pnl: 12, timestamp: clock.toISOString() });
  });

  test('a malformed trades file starts empty', () => {
    fs.writeFileSync(path.join(dir, 'trades.json'), '[{"pnl": "lots"}]');
    expect(new PerformanceTracker(dir, now).getTrades()).toEqual([]);
  });
});

describe('getPerformanceSummary', () => {
  test('aggregates wins, losses and strategies', () => {
    const t = new PerformanceTracker(dir, now);
    t.recordTrade(trade('value_bet', 10));
    t.recordTrade(trade('value_bet', -5));
    t.recordTrade(trade('arbitrage', 20));

    const s = t.getPerformanceSummary(30);
    expect(s).toMatchObject({
      period_days:    30,
      total_trades:   3,
      winning_trades: 2,
      losing_trades:  1,
      total_pnl:      25,
      total_wins:     30,
      total_losses:   5,
      avg_win:        15,
      avg_loss:       5,
      profit_factor:  6,
      best_trade:     20,
      worst_trade:    -5,
    });
    expect(s.win_rate).toBeCloseTo(2 / 3, 10);
    expect(s.strategy_breakdown).toEqual({
      value_bet: { count: 2, pnl: 5 },
      arbitrage: { count: 1, pnl: 20 },
    });
  });

  test('only counts trades inside the window', () => {
    const t = new PerformanceTracker(dir, now);
    clock = new Date(2025, 11, 1, 12, 0);
    t.recordTrade(trade('value_bet', 99));
    clock = new Date(2026, 0, 20, 12, 0);
    t.recordTrade(trade('value_bet', 1));

    expect(t.getPerformanceSummary(30).total_pnl).toBe(1);
    expect(t.getPerformanceSummary(90).total_pnl).toBe(100);
  });

  test('no losses means an unbounded profit factor', () => {
    const t = new PerformanceTracker(dir, now);
    t.recordTrade(trade('arbitrage', 3));
    expect(t.getPerformanceSummary().profit_factor).toBe(Infinity);
  });

  test('an empty history is all zeros', () => {
    expect(new PerformanceTracker(dir, now).getPerformanceSummary()).toMatchObject({
      total_trades: 0, win_rate: 0, profit_factor: 0, best_trade: 0, worst_trade: 0,
    });
  });
});

describe('daily stats', () => {
  test('returns come back oldest first within the window', () => {
    const t = new PerformanceTracker(dir, now);
    t.recordDailyStats(dailyRow(5, 0.5), '2026-01-19');
    t.recordDailyStats(dailyRow(-3, -0.3), '2026-01-18');
    t.recordDailyStats(dailyRow(8, 0.8), '2025-06-01');

    expect(t.getDailyReturns(7)).toEqual([
      { date: '2026-01-18', pnl: -3, return_pct: -0.3, trades: 1 },
      { date: '2026-01-19', pnl: 5,  return_pct: 0.5,  trades: 1 },
    ]);
  });

  test('defaults to today', () => {
    const t = new PerformanceTracker(dir, now);
    t.recordDailyStats(dailyRow(2, 0.2));
    expect(t.getDailyReturns(1).map(d => d.date)).toEqual(['2026-01-20']);
  });

  test('steps by calendar day across a 25-hour day', () => {
    clock = new Date(2026, 10, 1, 23, 30);
    const t = new PerformanceTracker(dir, now);
    t.recordDailyStats(dailyRow(1, 0.1), '2026-10-30');
    t.recordDailyStats(dailyRow(2, 0.2), '2026-10-31');
    t.recordDailyStats(dailyRow(3, 0.3), '2026-11-01');
    expect(t.getDailyReturns(3).map(d => d.date)).toEqual(['2026-10-30', '2026-10-31', '2026-11-01']);
  });

  test('steps by calendar day across a 23-hour day', () => {
    clock = new Date(2026, 2, 9, 0, 30);
    const t = new PerformanceTracker(dir, now);
    t.recordDailyStats(dailyRow(4, 0.4), '2026-03-08');
    expect(t.getDailyReturns(2).map(d => d.date)).toEqual(['2026-03-08']);
  });

  test('sharpe ratio annualises the daily mean over its deviation', () => {
    const t = new PerformanceTracker(dir, now);
    t.recordDailyStats(dailyRow(10, 1), '2026-01-18');
    t.recordDailyStats(dailyRow(30, 3), '2026-01-19');
    expect(t.getSharpeRatio()).toBeCloseTo(2 * Math.sqrt(365), 6);
  });

  test('sharpe needs two days', () => {
    const t = new PerformanceTracker(dir, now);
    t.recordDailyStats(dailyRow(10, 1), '2026-01-18');
    expect(t.getSharpeRatio()).toBe(0);
  });

  test('max drawdown is measured from the running peak', () => {
    const t = new PerformanceTracker(dir, now);
    t.recordDailyStats(dailyRow(100, 10), '2026-01-17');
    t.recordDailyStats(dailyRow(-50, -5), '2026-01-18');
    t.recordDailyStats(dailyRow(20, 2),   '2026-01-19');
    expect(t.getMaxDrawdown()).toBeCloseTo(0.5, 10);
  });
});

describe('reporting', () => {
  test('roi is total pnl over the starting balance', () => {
    const t = new PerformanceTracker(dir, now);
    t.recordTrade(trade('value_bet', 10));
    t.recordTrade(trade('arbitrage', 15));
    expect(t.getRoi(1_000)).toBeCloseTo(0.025, 10);
    expect(t.getRoi(0)).toBe(0);
  });

  test('the report lists totals and the strategy breakdown', () => {
    const t = new PerformanceTracker(dir, now);
    t.recordTrade(trade('value_bet', 10));
    t.recordTrade(trade('value_bet', -5));
    t.recordTrade(trade('arbitrage', 20));
    t.recordDailyStats(dailyRow(25, 2.5), '2026-01-19');

    const lines = t.generateReport(30).split('\n');
    expect(lines).toContain('Total trades:    3');
    expect(lines).toContain('Win rate:        66.67%');
    expect(lines).toContain('Profit factor:   6.00');
    expect(lines).toContain('VALUE_BET: 2 trade(s), P&L $5.00, avg $2.50');
    expect(lines).toContain('2026-01-19:     $25.00 (  2.50%) - 1 trades');
  });

  test('saveReport writes into the data directory', () => {
    const t = new PerformanceTracker(dir, now);
    const file = t.saveReport();
    expect(file).toBe(path.join(dir, 'performance_report_20260120.txt'));
    expect(fs.readFileSync(path.join(dir, 'performance_report_20260120.txt'), 'utf8')).toContain('TRADING PERFORMANCE REPORT');
  });
});
