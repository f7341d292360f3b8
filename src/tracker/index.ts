/**
 * Performance tracker — append-only trade log plus one stats row per
 * trading day, both kept as JSON under the data directory.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { localDateKey } from '../risk';
import { errorMessage } from '../utils/errors';

const TradeSchema = z.object({
  type:        z.string(),
  position_id: z.string(),
  market_id:   z.string(),
  pnl:         z.number(),
  size:        z.number(),
  entry_price: z.number().optional(),
  exit_price:  z.number().optional(),
  reason:      z.string().optional(),
  timestamp:   z.string(),
});

const DailyStatsSchema = z.object({
  date:             z.string(),
  daily_pnl:        z.number(),
  daily_return_pct: z.number(),
  daily_trades:     z.number(),
  open_positions:   z.number().optional(),
  balance:          z.number().optional(),
});

export type TrackedTrade = z.infer<typeof TradeSchema>;
export type TradeInput   = Omit<TrackedTrade, 'timestamp'>;
export type DailyStats   = z.infer<typeof DailyStatsSchema>;
export type DailyStatsInput = Omit<DailyStats, 'date'>;

export interface StrategyStats {
  count: number;
  pnl:   number;
}

export interface PerformanceSummary {
  period_days:        number;
  total_trades:       number;
  winning_trades:     number;
  losing_trades:      number;
  win_rate:           number;
  total_pnl:          number;
  total_wins:         number;
  total_losses:       number;
  avg_win:            number;
  avg_loss:           number;
  profit_factor:      number;   // Infinity with wins and no losses
  best_trade:         number;
  worst_trade:        number;
  strategy_breakdown: Record<string, StrategyStats>;
}

export interface DailyReturn {
  date:       string;
  pnl:        number;
  return_pct: number;
  trades:     number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function readJson<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T {
  if (!fs.existsSync(file)) return fallback;
  try {
    const parsed = schema.safeParse(JSON.parse(fs.readFileSync(file, 'utf8')));
    if (parsed.success) return parsed.data;
    console.error(`⚠️  Ignoring malformed ${path.basename(file)}`);
  } catch (err) {
    console.error(`⚠️  Could not load ${path.basename(file)}: ${errorMessage(err)}`);
  }
  return fallback;
}

function writeJson(file: string, data: unknown): void {
  try {
    fs.writeFileSync(file, JSON.stringify(data, null, 2));
  } catch (err) {
    console.error(`⚠️  Could not save ${path.basename(file)}: ${errorMessage(err)}`);
  }
}

export class PerformanceTracker {
  private readonly tradesFile:     string;
  private readonly dailyStatsFile: string;
  private trades:     TrackedTrade[];
  private dailyStats: Record<string, DailyStats>;

  constructor(
    private readonly dataDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {
    fs.mkdirSync(dataDir, { recursive: true });
    this.tradesFile     = path.join(dataDir, 'trades.json');
    this.dailyStatsFile = path.join(dataDir, 'daily_stats.json');
    this.trades         = readJson(this.tradesFile, z.array(TradeSchema), []);
    this.dailyStats     = readJson(this.dailyStatsFile, z.record(z.string(), DailyStatsSchema), {});
  }

  recordTrade(trade: TradeInput): TrackedTrade {
    const tracked: TrackedTrade = { ...trade, timestamp: this.now().toISOString() };
    this.trades.push(tracked);
    writeJson(this.tradesFile, this.trades);
    console.log(`📝 Trade recorded: ${trade.type} — P&L $${trade.pnl.toFixed(2)}`);
    return tracked;
  }

  // date defaults to today; the rollover path passes the day being closed.
  recordDailyStats(stats: DailyStatsInput, date: string = localDateKey(this.now())): void {
    this.dailyStats[date] = { ...stats, date };
    writeJson(this.dailyStatsFile, this.dailyStats);
    console.log(`📅 Daily stats recorded for ${date}`);
  }

  getTrades(): readonly TrackedTrade[] {
    return this.trades;
  }

  // ── Summary over a trailing window ──────────────────────────
  getPerformanceSummary(days = 30): PerformanceSummary {
    const cutoff = this.now().getTime() - days * DAY_MS;
    const recent = this.trades.filter(t => Date.parse(t.timestamp) >= cutoff);

    const wins   = recent.filter(t => t.pnl > 0);
    const losses = recent.filter(t => t.pnl < 0);

    const totalPnl    = recent.reduce((s, t) => s + t.pnl, 0);
    const totalWins   = wins.reduce((s, t) => s + t.pnl, 0);
    const totalLosses = Math.abs(losses.reduce((s, t) => s + t.pnl, 0));

    const breakdown: Record<string, StrategyStats> = {};
    for (const t of recent) {
      const entry = breakdown[t.type] ?? { count: 0, pnl: 0 };
      entry.count += 1;
      entry.pnl   += t.pnl;
      breakdown[t.type] = entry;
    }

    let profitFactor = 0;
    if (totalLosses > 0)    profitFactor = totalWins / totalLosses;
    else if (totalWins > 0) profitFactor = Infinity;

    return {
      period_days:        days,
      total_trades:       recent.length,
      winning_trades:     wins.length,
      losing_trades:      losses.length,
      win_rate:           recent.length > 0 ? wins.length / recent.length : 0,
      total_pnl:          totalPnl,
      total_wins:         totalWins,
      total_losses:       totalLosses,
      avg_win:            wins.length > 0 ? totalWins / wins.length : 0,
      avg_loss:           losses.length > 0 ? totalLosses / losses.length : 0,
      profit_factor:      profitFactor,
      best_trade:         recent.length > 0 ? Math.max(...recent.map(t => t.pnl)) : 0,
      worst_trade:        recent.length > 0 ? Math.min(...recent.map(t => t.pnl)) : 0,
      strategy_breakdown: breakdown,
    };
  }

  // Oldest first.
  getDailyReturns(days = 30): DailyReturn[] {
    const out: DailyReturn[] = [];
    const today = this.now();
    for (let i = 0; i < days; i++) {
      const key   = localDateKey(new Date(today.getFullYear(), today.getMonth(), today.getDate() - i));
      const stats = this.dailyStats[key];
      if (!stats) continue;
      out.push({
        date:       key,
        pnl:        stats.daily_pnl,
        return_pct: stats.daily_return_pct,
        trades:     stats.daily_trades,
      });
    }
    return out.sort((a, b) => a.date.localeCompare(b.date));
  }

  getRoi(initialBalance: number): number {
    if (initialBalance <= 0) return 0;
    return this.trades.reduce((s, t) => s + t.pnl, 0) / initialBalance;
  }

  // Annualised over 365 days, population std-dev of daily returns.
  getSharpeRatio(riskFreeRate = 0): number {
    const returns = this.getDailyReturns(365).map(d => d.return_pct / 100);
    if (returns.length < 2) return 0;

    const mean     = returns.reduce((s, r) => s + r, 0) / returns.length;
    const variance = returns.reduce((s, r) => s + (r - mean) ** 2, 0) / returns.length;
    const stdDev   = Math.sqrt(variance);
    if (stdDev === 0) return 0;

    return ((mean - riskFreeRate / 365) / stdDev) * Math.sqrt(365);
  }

  // Fraction of the running P&L peak given back.
  getMaxDrawdown(): number {
    let cumulative = 0;
    let peak       = 0;
    let maxDd      = 0;
    for (const day of this.getDailyReturns(365)) {
      cumulative += day.pnl;
      if (cumulative > peak) peak = cumulative;
      const dd = peak > 0 ? (peak - cumulative) / peak : 0;
      if (dd > maxDd) maxDd = dd;
    }
    return maxDd;
  }

  // ── Report ──────────────────────────────────────────────────
  generateReport(days = 30): string {
    const s     = this.getPerformanceSummary(days);
    const daily = this.getDailyReturns(days);
    const rule  = '='.repeat(60);
    const sub   = '-'.repeat(60);
    const usd   = (n: number) => `$${n.toFixed(2)}`;

    const lines = [
      rule,
      'TRADING PERFORMANCE REPORT',
      rule,
      `Period:    last ${days} days`,
      `Generated: ${this.now().toISOString()}`,
      sub,
      'OVERALL PERFORMANCE',
      sub,
      `Total trades:    ${s.total_trades}`,
      `Winning trades:  ${s.winning_trades}`,
      `Losing trades:   ${s.losing_trades}`,
      `Win rate:        ${(s.win_rate * 100).toFixed(2)}%`,
      `Total P&L:       ${usd(s.total_pnl)}`,
      `Total wins:      ${usd(s.total_wins)}`,
      `Total losses:    ${usd(s.total_losses)}`,
      `Average win:     ${usd(s.avg_win)}`,
      `Average loss:    ${usd(s.avg_loss)}`,
      `Profit factor:   ${Number.isFinite(s.profit_factor) ? s.profit_factor.toFixed(2) : 'inf'}`,
      `Best trade:      ${usd(s.best_trade)}`,
      `Worst trade:     ${usd(s.worst_trade)}`,
    ];

    const strategies = Object.entries(s.strategy_breakdown);
    if (strategies.length > 0) {
      lines.push(sub, 'STRATEGY BREAKDOWN', sub);
      for (const [name, st] of strategies) {
        lines.push(`${name.toUpperCase()}: ${st.count} trade(s), P&L ${usd(st.pnl)}, avg ${usd(st.pnl / st.count)}`);
      }
    }

    if (daily.length > 0) {
      lines.push(sub, 'RECENT DAILY PERFORMANCE (last 7 days)', sub);
      for (const d of daily.slice(-7)) {
        lines.push(`${d.date}: ${usd(d.pnl).padStart(10)} (${d.return_pct.toFixed(2).padStart(6)}%) - ${d.trades} trades`);
      }
    }

    lines.push(rule);
    return lines.join('\n');
  }

  saveReport(filename?: string, days = 30): string | null {
    const name = filename ?? `performance_report_${localDateKey(this.now()).replace(/-/g, '')}.txt`;
    const file = path.join(this.dataDir, name);
    try {
      fs.writeFileSync(file, this.generateReport(days));
      console.log(`📄 Performance report saved to ${file}`);
      return file;
    } catch (err) {
      console.error(`⚠️  Could not save report: ${errorMessage(err)}`);
      return null;
    }
  }
}
