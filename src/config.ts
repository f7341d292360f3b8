import 'dotenv/config';
import { RiskConfig, ScanConfig } from './types';

function optional(key: string, fallback: string): string {
  const val = process.env[key];
  return val === undefined || val === '' ? fallback : val;
}

function num(key: string, fallback: number): number {
  const raw = optional(key, String(fallback));
  const val = Number(raw);
  if (!Number.isFinite(val)) throw new Error(`Env var ${key} is not a number: "${raw}"`);
  return val;
}

function flag(key: string, fallback: boolean): boolean {
  const raw = optional(key, fallback ? 'true' : 'false').toLowerCase();
  return raw === 'true' || raw === '1' || raw === 'yes';
}

// ── Polymarket credentials ───────────────────────────────────
export const POLY_API_KEY        = optional('POLYMARKET_API_KEY', '');
export const POLY_API_SECRET     = optional('POLYMARKET_API_SECRET', '');
export const POLY_API_PASSPHRASE = optional('POLYMARKET_API_PASSPHRASE', '');
export const POLY_WALLET_KEY     = optional('POLYMARKET_WALLET_PRIVATE_KEY', '');
export const POLY_SIGNATURE_TYPE = num('POLYMARKET_SIGNATURE_TYPE', 0);
export const POLY_FUNDER_ADDRESS = optional('POLYMARKET_FUNDER_ADDRESS', '');
export const CLOB_HOST           = optional('CLOB_HOST', 'https://clob.polymarket.com');
export const GAMMA_HOST          = optional('GAMMA_HOST', 'https://gamma-api.polymarket.com');
export const CHAIN_ID            = num('CHAIN_ID', 137);
export const DRY_RUN             = flag('DRY_RUN', true);
export const PROXY_URL           = optional('PROXY_URL', '');

// ── Telegram ─────────────────────────────────────────────────
export const TELEGRAM_BOT_TOKEN = optional('TELEGRAM_BOT_TOKEN', '');
export const TELEGRAM_CHAT_ID   = optional('TELEGRAM_CHAT_ID', '');

// ── Risk ─────────────────────────────────────────────────────
export const BANKROLL_USDC = num('BANKROLL_USDC', 1000);

export const DEFAULT_RISK_CONFIG: RiskConfig = {
  max_position_size:     100,
  max_daily_loss:        50,
  max_open_positions:    5,
  min_edge:              0.05,
  kelly_fraction:        0.25,   // quarter Kelly
  target_daily_return:   0.02,
  min_position_size:     10,
  profit_target_pct:     0.50,
  stop_loss_pct:         0.20,
  unwind_failed_arb_leg: false,
};

export const RISK_CONFIG: RiskConfig = {
  max_position_size:     num('MAX_POSITION_SIZE',    DEFAULT_RISK_CONFIG.max_position_size),
  max_daily_loss:        num('MAX_DAILY_LOSS',       DEFAULT_RISK_CONFIG.max_daily_loss),
  max_open_positions:    num('MAX_OPEN_POSITIONS',   DEFAULT_RISK_CONFIG.max_open_positions),
  min_edge:              num('MIN_EDGE',             DEFAULT_RISK_CONFIG.min_edge),
  kelly_fraction:        num('KELLY_FRACTION',       DEFAULT_RISK_CONFIG.kelly_fraction),
  target_daily_return:   num('TARGET_DAILY_RETURN',  DEFAULT_RISK_CONFIG.target_daily_return),
  min_position_size:     num('MIN_POSITION_SIZE',    DEFAULT_RISK_CONFIG.min_position_size),
  profit_target_pct:     num('PROFIT_TARGET_PCT',    DEFAULT_RISK_CONFIG.profit_target_pct),
  stop_loss_pct:         num('STOP_LOSS_PCT',        DEFAULT_RISK_CONFIG.stop_loss_pct),
  unwind_failed_arb_leg: flag('UNWIND_FAILED_ARB_LEG', DEFAULT_RISK_CONFIG.unwind_failed_arb_leg),
};

// ── Scan config ──────────────────────────────────────────────
export const DEFAULT_SCAN_CONFIG: ScanConfig = {
  min_arb_profit_pct: 0.5,
  min_quality_volume: 5_000,
  quality_candidates: 20,
  min_ranked_quality: 60,
  max_opportunities:  10,
  market_scan_limit:  500,
};

export const SCAN_CONFIG: ScanConfig = {
  min_arb_profit_pct: num('MIN_ARB_PROFIT_PCT', DEFAULT_SCAN_CONFIG.min_arb_profit_pct),
  min_quality_volume: num('MIN_QUALITY_VOLUME', DEFAULT_SCAN_CONFIG.min_quality_volume),
  quality_candidates: num('QUALITY_CANDIDATES', DEFAULT_SCAN_CONFIG.quality_candidates),
  min_ranked_quality: num('MIN_RANKED_QUALITY', DEFAULT_SCAN_CONFIG.min_ranked_quality),
  max_opportunities:  num('MAX_OPPORTUNITIES',  DEFAULT_SCAN_CONFIG.max_opportunities),
  market_scan_limit:  num('MARKET_SCAN_LIMIT',  DEFAULT_SCAN_CONFIG.market_scan_limit),
};

// ── Strategies ───────────────────────────────────────────────
export interface StrategyConfig {
  arbitrage:       boolean;
  high_quality:    boolean;
  mispriced:       boolean;
  estimates_file:  string;
}

export const STRATEGY_CONFIG: StrategyConfig = {
  arbitrage:      flag('STRATEGY_ARBITRAGE',    true),
  high_quality:   flag('STRATEGY_HIGH_QUALITY', true),
  mispriced:      flag('STRATEGY_MISPRICED',    true),
  estimates_file: optional('PROBABILITY_ESTIMATES_FILE', 'data/estimates.json'),
};

// ── Runtime ──────────────────────────────────────────────────
export const RUN_INTERVAL_SECONDS = num('RUN_INTERVAL_SECONDS', 60);
export const DATA_DIR             = optional('DATA_DIR', 'data');
export const CONTROL_PORT         = num('CONTROL_PORT', 3001);

export function printConfig(): void {
  const r = RISK_CONFIG;
  console.log('⚙️  Trader Config');
  console.log(`   Bankroll:       $${BANKROLL_USDC} USDC`);
  console.log(`   Max position:   $${r.max_position_size.toFixed(2)} | Min: $${r.min_position_size.toFixed(2)}`);
  console.log(`   Daily loss cap: $${r.max_daily_loss.toFixed(2)} | Target: ${(r.target_daily_return * 100).toFixed(1)}%`);
  console.log(`   Open positions: max ${r.max_open_positions}`);
  console.log(`   Min edge:       ${(r.min_edge * 100).toFixed(1)}% | Kelly: ${r.kelly_fraction}x`);
  console.log(`   Exits:          +${(r.profit_target_pct * 100).toFixed(0)}% / -${(r.stop_loss_pct * 100).toFixed(0)}%`);
  console.log(`   Strategies:     arb=${STRATEGY_CONFIG.arbitrage} quality=${STRATEGY_CONFIG.high_quality} mispriced=${STRATEGY_CONFIG.mispriced}`);
  console.log(`   Run interval:   every ${RUN_INTERVAL_SECONDS}s`);
  console.log(`   Polymarket:     ${POLY_WALLET_KEY ? '✅ trading' : '⚠️  no wallet key (read-only)'}${DRY_RUN ? ' [DRY RUN]' : ''}`);
  console.log(`   Telegram:       ${TELEGRAM_BOT_TOKEN ? '✅' : '⚠️  no bot token'}`);
}
