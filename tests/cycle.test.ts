import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CycleDeps, runTradingCycle } from '../src/bot/cycle';
import { PositionManager } from '../src/lifecycle';
import { createRiskState } from '../src/risk';
import { loadState } from '../src/risk/store';
import { PerformanceTracker } from '../src/tracker';
import { DEFAULT_RISK_CONFIG, DEFAULT_SCAN_CONFIG, StrategyConfig } from '../src/config';
import { RiskState } from '../src/types';
import { FakeExchange, binaryMarket, levels } from './helpers/fakeExchange';
import { silenceConsole } from './helpers/console';

silenceConsole();

const NONE: StrategyConfig = { arbitrage: false, high_quality: false, mispriced: false, estimates_file: '' };

let dir: string;
let ex: FakeExchange;
let state: RiskState;
let clock: Date;

function deps(overrides: Partial<CycleDeps> = {}): CycleDeps {
  return {
    exchange:    ex,
    state,
    manager:     new PositionManager(state, ex, DEFAULT_RISK_CONFIG),
    tracker:     new PerformanceTracker(dir, () => clock),
    riskConfig:  DEFAULT_RISK_CONFIG,
    scanConfig:  DEFAULT_SCAN_CONFIG,
    strategies:  NONE,
    getBankroll: async () => 1_000,
    stateFile:   path.join(dir, 'state.json'),
    now:         () => clock,
    ...overrides,
  };
}

beforeEach(() => {
  dir   = fs.mkdtempSync(path.join(os.tmpdir(), 'trader-cycle-'));
  clock = new Date(2026, 0, 1, 10, 0);
  ex    = new FakeExchange();
  state = createRiskState(1_000, clock);
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

test('opens an arbitrage and does not re-enter the same market', async () => {
  ex.markets.push(binaryMarket('a'));
  ex.setBook('a-yes', [], levels([0.40, 200]));
  ex.setBook('a-no',  [], levels([0.55, 150]));
  const execution = jest.fn(async () => undefined);
  const exit      = jest.fn(async () => undefined);
  const d = deps({ strategies: { ...NONE, arbitrage: true }, notifier: { execution, exit } });

  const first = await runTradingCycle(d);
  expect(first.gate).toBe('OK');
  expect(first.opened).toHaveLength(1);
  expect(first.opened[0]).toMatchObject({ success: true, type: 'arbitrage', size: 100 });
  expect(execution).toHaveBeenCalledTimes(1);
  expect(state.daily_trades).toBe(1);

  const second = await runTradingCycle(d);
  expect(second.considered).toBe(1);
  expect(second.opened).toHaveLength(0);
  expect(ex.marketOrders).toHaveLength(2);
});

test('takes a value bet from probability estimates', async () => {
  ex.markets.push(binaryMarket('m'));
  ex.midpoints.set('m-yes', 0.60);
  ex.setBook('m-yes', levels([0.59, 300]), levels([0.61, 400]));

  const report = await runTradingCycle(deps({
    strategies: { ...NONE, mispriced: true },
    estimates:  new Map([['m', 0.70]]),
  }));

  expect(report.opened).toHaveLength(1);
  expect(report.opened[0]).toMatchObject({ success: true, type: 'value_bet' });
  expect(ex.marketOrders[0]).toMatchObject({ tokenId: 'm-yes', side: 'BUY' });
});

test('a tripped gate skips scanning but still manages exits', async () => {
  state.daily_pnl = -60;
  state.open_positions.set('v', {
    type: 'value_bet', id: 'v', market_id: 'mv', opened_at: 0, token_id: 'v-tok',
    side: 'BUY', size: 100, entry_price: 0.40, estimated_prob: 0.5, edge: 0.1,
  });
  ex.midpoints.set('v-tok', 0.30);

  const report = await runTradingCycle(deps({ strategies: { ...NONE, arbitrage: true } }));

  expect(report.gate).toBe('daily loss limit reached');
  expect(ex.listCalls).toBe(0);
  expect(report.closed).toHaveLength(1);
  expect(state.daily_pnl).toBeCloseTo(-70, 9);
});

test('profit-target exits are recorded, alerted and persisted', async () => {
  state.open_positions.set('v', {
    type: 'value_bet', id: 'v', market_id: 'mv', opened_at: 0, token_id: 'v-tok',
    side: 'BUY', size: 100, entry_price: 0.40, estimated_prob: 0.5, edge: 0.1,
  });
  ex.midpoints.set('v-tok', 0.62);
  const exit = jest.fn(async () => undefined);
  const d = deps({ notifier: { execution: jest.fn(async () => undefined), exit } });

  const report = await runTradingCycle(d);

  expect(report.closed).toHaveLength(1);
  expect(state.daily_pnl).toBeCloseTo(22, 9);
  expect(d.tracker.getTrades()).toHaveLength(1);
  expect(d.tracker.getTrades()[0]).toMatchObject({
    type: 'value_bet', position_id: 'v', market_id: 'mv', size: 100, entry_price: 0.40,
    exit_price: 0.62, reason: 'profit_target',
  });
  expect(exit).toHaveBeenCalledWith(expect.objectContaining({ id: 'v' }), 0.62, expect.any(Number), 'profit_target');

  const persisted = loadState(path.join(dir, 'state.json'), 0);
  expect(persisted.open_positions.size).toBe(0);
  expect(persisted.daily_pnl).toBeCloseTo(22, 9);
});

test('the first cycle of a new day records yesterday and resets', async () => {
  state.daily_pnl    = 12;
  state.daily_trades = 3;
  clock = new Date(2026, 0, 2, 9, 0);
  const d = deps();

  const report = await runTradingCycle(d);

  const [day] = d.tracker.getDailyReturns(7);
  expect(day).toMatchObject({ date: '2026-01-01', pnl: 12, trades: 3 });
  expect(day.return_pct).toBeCloseTo(1.2, 9);
  expect(state).toMatchObject({ daily_pnl: 0, daily_trades: 0, last_reset_date: '2026-01-02' });
  expect(report.summary.daily_pnl).toBe(0);
});

test('a failing alert does not break the cycle', async () => {
  ex.markets.push(binaryMarket('a'));
  ex.setBook('a-yes', [], levels([0.40, 200]));
  ex.setBook('a-no',  [], levels([0.55, 150]));
  const execution = jest.fn(async () => { throw new Error('telegram down'); });

  const report = await runTradingCycle(deps({
    strategies: { ...NONE, arbitrage: true },
    notifier:   { execution, exit: jest.fn(async () => undefined) },
  }));

  expect(report.opened).toHaveLength(1);
  expect(execution).toHaveBeenCalledTimes(1);
});

test('reports the bankroll the cycle ran with', async () => {
  const report = await runTradingCycle(deps({ getBankroll: async () => 742.5 }));
  expect(report.bankroll).toBe(742.5);
  expect(report.summary.current_balance).toBe(742.5);
});
