/**
 * RiskState persistence — survives restarts so open positions and the
 * day's realised PnL are not forgotten. A missing or unreadable file
 * yields a fresh state.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { Position, RiskConfig, RiskState } from '../types';
import { createRiskState } from './index';
import { errorMessage } from '../utils/errors';

const Side = z.enum(['BUY', 'SELL']);

const PositionSchema = z.discriminatedUnion('type', [
  z.object({
    type:            z.literal('arbitrage'),
    id:              z.string(),
    market_id:       z.string(),
    opened_at:       z.number(),
    yes_token:       z.string(),
    no_token:        z.string(),
    shares:          z.number(),
    cost:            z.number(),
    expected_profit: z.number(),
  }),
  z.object({
    type:           z.literal('value_bet'),
    id:             z.string(),
    market_id:      z.string(),
    opened_at:      z.number(),
    token_id:       z.string(),
    side:           Side,
    size:           z.number(),
    entry_price:    z.number(),
    estimated_prob: z.number(),
    edge:           z.number(),
  }),
  z.object({
    type:        z.literal('limit_order'),
    id:          z.string(),
    market_id:   z.string(),
    opened_at:   z.number(),
    token_id:    z.string(),
    side:        Side,
    size:        z.number(),
    limit_price: z.number(),
    shares:      z.number(),
    order_id:    z.string(),
  }),
]);

const StoredStateSchema = z.object({
  open_positions:       z.array(PositionSchema),
  daily_pnl:            z.number(),
  daily_trades:         z.number().int().nonnegative(),
  start_of_day_balance: z.number(),
  last_reset_date:      z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
});

type StoredState = z.infer<typeof StoredStateSchema>;

export function stateFilePath(dataDir: string): string {
  return path.join(dataDir, 'state.json');
}

export function loadState(file: string, startingBalance: number): RiskState {
  try {
    if (fs.existsSync(file)) {
      const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
      const parsed = StoredStateSchema.safeParse(raw);
      if (parsed.success) {
        const s = parsed.data;
        const positions: Position[] = s.open_positions;
        return {
          open_positions:       new Map(positions.map(p => [p.id, p])),
          daily_pnl:            s.daily_pnl,
          daily_trades:         s.daily_trades,
          start_of_day_balance: s.start_of_day_balance,
          last_reset_date:      s.last_reset_date,
        };
      }
      console.warn(`⚠️  Ignoring malformed state file ${file}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
  } catch (err) {
    console.warn(`⚠️  Could not read state file ${file}: ${errorMessage(err)}`);
  }
  return createRiskState(startingBalance);
}

export function saveState(file: string, state: RiskState): void {
  const stored: StoredState = {
    open_positions:       [...state.open_positions.values()],
    daily_pnl:            state.daily_pnl,
    daily_trades:         state.daily_trades,
    start_of_day_balance: state.start_of_day_balance,
    last_reset_date:      state.last_reset_date,
  };
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(stored, null, 2));
}

// Only value bets have an exit path; arbitrage and limit-order positions
// sit in the book until state.json is edited.
export function warnIfBlockedByUnclosable(state: RiskState, config: RiskConfig): boolean {
  const stuck = [...state.open_positions.values()].filter(p => p.type !== 'value_bet');
  if (stuck.length < config.max_open_positions) return false;

  console.warn(
    `⚠️  ${stuck.length} open position(s) cannot be closed by the bot ` +
    `(${stuck.map(p => p.id).join(', ')}); the ${config.max_open_positions}-position cap ` +
    `will refuse every new entry until they are removed from the state file.`,
  );
  return true;
}
