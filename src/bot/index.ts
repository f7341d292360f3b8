/**
 * Binary market trader — main entry.
 * Every RUN_INTERVAL_SECONDS: roll the day, gate on risk, scan and rank
 * arbitrage / quality / mispriced opportunities, execute, then manage
 * exits. One cycle at a time; SIGINT, SIGTERM or POST /shutdown stop
 * the loop after the current cycle.
 */
import 'dotenv/config';
import {
  BANKROLL_USDC, CHAIN_ID, CLOB_HOST, CONTROL_PORT, DATA_DIR, DRY_RUN, GAMMA_HOST,
  POLY_API_KEY, POLY_API_PASSPHRASE, POLY_API_SECRET, POLY_FUNDER_ADDRESS,
  POLY_SIGNATURE_TYPE, POLY_WALLET_KEY, PROXY_URL, RISK_CONFIG, RUN_INTERVAL_SECONDS,
  SCAN_CONFIG, STRATEGY_CONFIG, printConfig,
} from '../config';
import { configureProxy } from '../proxy';
import { ClobExchange } from '../exchange';
import { PositionManager } from '../lifecycle';
import { getPortfolioSummary } from '../risk';
import { loadState, saveState, stateFilePath, warnIfBlockedByUnclosable } from '../risk/store';
import { loadProbabilityEstimates } from '../scanner/estimates';
import { PerformanceTracker } from '../tracker';
import { CycleScheduler } from '../scheduler';
import { startControlServer } from '../control';
import { sendAlert, sendExecutionAlert, sendExitAlert, sendMessage } from '../alerts/telegram';
import { errorMessage } from '../utils/errors';
import { runTradingCycle } from './cycle';

function readEstimates(): Map<string, number> {
  if (!STRATEGY_CONFIG.mispriced) return new Map();
  try {
    return loadProbabilityEstimates(STRATEGY_CONFIG.estimates_file);
  } catch (err) {
    console.error(`⚠️  ${errorMessage(err)}`);
    return new Map();
  }
}

async function main(): Promise<void> {
  console.log('🎯 Binary Market Trader — Starting');
  console.log('='.repeat(60));
  printConfig();
  console.log('');

  configureProxy(PROXY_URL);

  const exchange = new ClobExchange({
    clobHost:      CLOB_HOST,
    gammaHost:     GAMMA_HOST,
    chainId:       CHAIN_ID,
    privateKey:    POLY_WALLET_KEY || undefined,
    creds:         POLY_API_KEY
      ? { key: POLY_API_KEY, secret: POLY_API_SECRET, passphrase: POLY_API_PASSPHRASE }
      : undefined,
    signatureType: POLY_SIGNATURE_TYPE,
    funder:        POLY_FUNDER_ADDRESS || undefined,
    dryRun:        DRY_RUN,
  });

  // Live balance when trading for real, configured bankroll otherwise.
  const getBankroll = async (): Promise<number> => {
    if (DRY_RUN || !POLY_WALLET_KEY) return BANKROLL_USDC;
    const balance = await exchange.getCollateralBalance();
    return balance ?? BANKROLL_USDC;
  };

  const stateFile = stateFilePath(DATA_DIR);
  let bankroll    = await getBankroll();   // refreshed by every cycle, read by /status
  const state     = loadState(stateFile, bankroll);
  const manager   = new PositionManager(state, exchange, RISK_CONFIG);
  const tracker   = new PerformanceTracker(DATA_DIR);
  console.log(`📂 Loaded state: ${state.open_positions.size} open position(s), day ${state.last_reset_date}`);
  warnIfBlockedByUnclosable(state, RISK_CONFIG);

  const scheduler = new CycleScheduler(async () => {
    const report = await runTradingCycle({
      exchange,
      state,
      manager,
      tracker,
      riskConfig:  RISK_CONFIG,
      scanConfig:  SCAN_CONFIG,
      strategies:  STRATEGY_CONFIG,
      estimates:   readEstimates(),
      getBankroll,
      stateFile,
      notifier: {
        execution: (opp, result) => sendExecutionAlert(opp, result, DRY_RUN),
        exit:      (pos, exitPrice, pnl, reason) => sendExitAlert(pos, exitPrice, pnl, reason),
      },
    });
    bankroll = report.bankroll;
  }, RUN_INTERVAL_SECONDS * 1_000);

  const controller = new AbortController();
  const shutdown = (why: string) => {
    if (controller.signal.aborted) return;
    console.log(`\n👋 Shutting down (${why}) — finishing current cycle...`);
    controller.abort();
  };
  process.on('SIGINT',  () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  const control = startControlServer({
    port:       CONTROL_PORT,
    getStatus:  () => ({
      cycle_running: scheduler.isRunning,
      dry_run:       DRY_RUN,
      portfolio:     getPortfolioSummary(state, RISK_CONFIG, bankroll),
    }),
    onShutdown: () => shutdown('control server'),
  });

  await sendMessage(`🎯 Binary market trader started${DRY_RUN ? ' (dry run)' : ''}`);

  await scheduler.start(controller.signal);

  saveState(stateFile, state);
  control.close();
  await sendAlert('Binary market trader stopped');
  console.log('🎯 Binary Market Trader stopped.');
}

main().catch(err => {
  console.error(`❌ Fatal: ${errorMessage(err)}`);
  process.exitCode = 1;
});
