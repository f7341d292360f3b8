/**
 * Position lifecycle — turns a sized opportunity into exchange orders,
 * tracks what was opened, flags exits and closes value bets.
 *
 * Nothing thrown by the gateway escapes executeOpportunity() or
 * closePosition(); failures come back as { success: false } and leave
 * RiskState untouched.
 */
import { OrderGateway, OrderResult } from '../exchange/types';
import { calculatePositionSize } from '../sizing';
import {
  ArbitrageOpportunity,
  HighQualityOpportunity,
  MispricedOpportunity,
  Opportunity,
  OrderSide,
  Position,
  PositionType,
  RiskConfig,
  RiskState,
} from '../types';
import { errorMessage } from '../utils/errors';

export type ExecutionResult =
  | {
      success:     true;
      position_id: string;
      type:        PositionType;
      size:        number;
      order_id?:   string;
    }
  | { success: false; reason: string };

export type CloseReason = 'profit_target' | 'stop_loss';

export interface CloseAction {
  action:      'close';
  position_id: string;
  reason:      CloseReason;
  pnl_pct:     number;
}

export type CloseResult =
  | {
      success:     true;
      position_id: string;
      position:    Position;
      exit_price:  number;
      pnl:         number;
    }
  | { success: false; position_id: string; error: string };

const LIMIT_DISCOUNT = 0.98;
const LIMIT_PREMIUM  = 1.02;
const MIN_PRICE      = 0.01;
const MAX_PRICE      = 0.99;

let idSeq = 0;

// type + token(s) + high-resolution timestamp; the sequence breaks ties.
function positionId(prefix: string, ...tokens: string[]): string {
  idSeq += 1;
  return `${prefix}_${tokens.join('_')}_${process.hrtime.bigint()}_${idSeq}`;
}

function opposite(side: OrderSide): OrderSide {
  return side === 'BUY' ? 'SELL' : 'BUY';
}

// Signed return on a value bet, as a fraction of entry.
export function valueBetPnlPct(side: OrderSide, entryPrice: number, currentPrice: number): number {
  if (entryPrice <= 0) return 0;
  return side === 'BUY'
    ? (currentPrice - entryPrice) / entryPrice
    : (entryPrice - currentPrice) / entryPrice;
}

export function valueBetPnl(side: OrderSide, entryPrice: number, exitPrice: number, size: number): number {
  return side === 'BUY'
    ? (exitPrice - entryPrice) * size
    : (entryPrice - exitPrice) * size;
}

// ── Limit pricing for quality entries ─────────────────────────
export function limitOrderTerms(
  currentPrice: number,
  sizeUsd:      number,
): { side: OrderSide; limit_price: number; shares: number } {
  const side: OrderSide = currentPrice < 0.5 ? 'BUY' : 'SELL';
  const raw   = side === 'BUY' ? currentPrice * LIMIT_DISCOUNT : currentPrice * LIMIT_PREMIUM;
  const limit = Math.min(MAX_PRICE, Math.max(MIN_PRICE, raw));
  return { side, limit_price: limit, shares: sizeUsd / limit };
}

export class PositionManager {
  private readonly inFlight = new Set<string>();

  constructor(
    private readonly state:   RiskState,
    private readonly gateway: OrderGateway,
    private readonly config:  RiskConfig,
  ) {}

  getOpenPositions(): ReadonlyMap<string, Position> {
    return this.state.open_positions;
  }

  // ── Entry ───────────────────────────────────────────────────
  async executeOpportunity(opportunity: Opportunity, bankroll: number): Promise<ExecutionResult> {
    const size = calculatePositionSize(opportunity, bankroll, this.config);
    if (size < this.config.min_position_size) {
      console.log(`   ⏭️  ${opportunity.type} on ${opportunity.market_id}: size $${size.toFixed(2)} below $${this.config.min_position_size.toFixed(2)} floor`);
      return { success: false, reason: 'position size below minimum' };
    }

    try {
      switch (opportunity.type) {
        case 'arbitrage':    return await this.executeArbitrage(opportunity, size);
        case 'mispriced':    return await this.executeValueBet(opportunity, size);
        case 'high_quality': return await this.executeLimitOrder(opportunity, size);
      }
    } catch (err) {
      console.error(`   ❌ Execution failed for ${opportunity.market_id}: ${errorMessage(err)}`);
      return { success: false, reason: errorMessage(err) };
    }
  }

  private async executeArbitrage(opp: ArbitrageOpportunity, size: number): Promise<ExecutionResult> {
    const shares = size / opp.combined_cost;
    const yesUsd = shares * opp.yes_price;
    const noUsd  = shares * opp.no_price;

    console.log(`   💎 Arb ${opp.market_id}: ${shares.toFixed(2)} pairs @ $${opp.combined_cost.toFixed(4)} ($${size.toFixed(2)})`);

    const yes = await this.gateway.placeMarketOrder(opp.yes_token, yesUsd, 'BUY');
    if (!yes.success) {
      console.error(`   ❌ YES leg failed: ${yes.error}`);
      return { success: false, reason: `yes leg failed: ${yes.error}` };
    }

    const no = await this.gateway.placeMarketOrder(opp.no_token, noUsd, 'BUY');
    if (!no.success) {
      console.error(`   ⚠️  NO leg failed after YES filled — exposed single leg on ${opp.yes_token} ($${yesUsd.toFixed(2)}): ${no.error}`);
      await this.unwindYesLeg(opp.yes_token, yesUsd);
      return { success: false, reason: `no leg failed: ${no.error}` };
    }

    const id = positionId('arb', opp.yes_token, opp.no_token);
    this.state.open_positions.set(id, {
      type:            'arbitrage',
      id,
      market_id:       opp.market_id,
      opened_at:       Date.now(),
      yes_token:       opp.yes_token,
      no_token:        opp.no_token,
      shares,
      cost:            size,
      expected_profit: opp.profit * shares,
    });
    this.state.daily_trades += 1;

    console.log(`   ✅ Arbitrage opened ${id} — expected profit $${(opp.profit * shares).toFixed(2)}`);
    return { success: true, position_id: id, type: 'arbitrage', size };
  }

  private async unwindYesLeg(tokenId: string, amountUsd: number): Promise<void> {
    if (!this.config.unwind_failed_arb_leg) {
      console.warn('   ⚠️  Unwind disabled — leg left open for manual handling');
      return;
    }
    const result = await this.gateway.placeMarketOrder(tokenId, amountUsd, 'SELL');
    if (result.success) {
      console.log(`   ↩️  Unwound YES leg on ${tokenId} (order ${result.order_id})`);
    } else {
      console.error(`   ❌ Unwind of YES leg on ${tokenId} failed: ${result.error}`);
    }
  }

  private async executeValueBet(opp: MispricedOpportunity, size: number): Promise<ExecutionResult> {
    const side = opp.recommended_side;
    console.log(`   🎯 Value bet ${side} $${size.toFixed(2)} on ${opp.token_id} (edge ${opp.edge_pct.toFixed(1)}%)`);

    const order = await this.gateway.placeMarketOrder(opp.token_id, size, side);
    if (!order.success) {
      console.error(`   ❌ Value bet order failed: ${order.error}`);
      return { success: false, reason: order.error };
    }

    const id = positionId('value', opp.token_id);
    this.state.open_positions.set(id, {
      type:           'value_bet',
      id,
      market_id:      opp.market_id,
      opened_at:      Date.now(),
      token_id:       opp.token_id,
      side,
      size,
      entry_price:    opp.market_price,
      estimated_prob: opp.estimated_prob,
      edge:           opp.edge,
    });
    this.state.daily_trades += 1;

    console.log(`   ✅ Value bet opened ${id}`);
    return { success: true, position_id: id, type: 'value_bet', size, order_id: order.order_id };
  }

  private async executeLimitOrder(opp: HighQualityOpportunity, size: number): Promise<ExecutionResult> {
    if (opp.current_price === null || opp.current_price <= 0) {
      return { success: false, reason: 'no current price' };
    }

    const terms = limitOrderTerms(opp.current_price, size);
    if (terms.shares < 1) {
      return { success: false, reason: 'less than one share' };
    }

    console.log(`   📤 Limit ${terms.side} ${terms.shares.toFixed(2)} @ $${terms.limit_price.toFixed(3)} on ${opp.token_id} (quality ${opp.quality_score})`);

    const order: OrderResult = await this.gateway.placeLimitOrder(opp.token_id, terms.limit_price, terms.shares, terms.side);
    if (!order.success) {
      console.error(`   ❌ Limit order failed: ${order.error}`);
      return { success: false, reason: order.error };
    }

    const id = positionId('limit', opp.token_id);
    this.state.open_positions.set(id, {
      type:        'limit_order',
      id,
      market_id:   opp.market_id,
      opened_at:   Date.now(),
      token_id:    opp.token_id,
      side:        terms.side,
      size,
      limit_price: terms.limit_price,
      shares:      terms.shares,
      order_id:    order.order_id,
    });
    this.state.daily_trades += 1;

    console.log(`   ✅ Limit order resting ${order.order_id}`);
    return { success: true, position_id: id, type: 'limit_order', size, order_id: order.order_id };
  }

  // ── Monitoring ──────────────────────────────────────────────
  async managePositions(): Promise<CloseAction[]> {
    const actions: CloseAction[] = [];

    for (const [id, pos] of [...this.state.open_positions]) {
      // Arbitrage settles at resolution; limit fills are not polled.
      if (pos.type !== 'value_bet') continue;

      let current: number | null;
      try {
        current = await this.gateway.getMidpoint(pos.token_id);
      } catch (err) {
        console.error(`⚠️  Price check failed for ${id}: ${errorMessage(err)}`);
        continue;
      }
      if (current === null || current <= 0) continue;

      const pnlPct = valueBetPnlPct(pos.side, pos.entry_price, current);
      if (pnlPct >= this.config.profit_target_pct) {
        console.log(`   💰 Taking profit on ${id}: ${(pnlPct * 100).toFixed(1)}%`);
        actions.push({ action: 'close', position_id: id, reason: 'profit_target', pnl_pct: pnlPct });
      } else if (pnlPct <= -this.config.stop_loss_pct) {
        console.log(`   🛑 Stop loss on ${id}: ${(pnlPct * 100).toFixed(1)}%`);
        actions.push({ action: 'close', position_id: id, reason: 'stop_loss', pnl_pct: pnlPct });
      }
    }

    return actions;
  }

  // ── Close ───────────────────────────────────────────────────
  async closePosition(id: string): Promise<CloseResult> {
    const pos = this.state.open_positions.get(id);
    if (!pos) return { success: false, position_id: id, error: 'unknown position' };
    if (pos.type !== 'value_bet') return { success: false, position_id: id, error: 'not supported' };
    if (this.inFlight.has(id)) return { success: false, position_id: id, error: 'close already in progress' };

    this.inFlight.add(id);
    try {
      const order = await this.gateway.placeMarketOrder(pos.token_id, pos.size, opposite(pos.side));
      if (!order.success) {
        console.error(`   ❌ Close order for ${id} failed: ${order.error}`);
        return { success: false, position_id: id, error: order.error };
      }

      let mid: number | null = null;
      try {
        mid = await this.gateway.getMidpoint(pos.token_id);
      } catch (err) {
        console.warn(`⚠️  Exit price lookup failed for ${id}: ${errorMessage(err)}`);
      }
      const exitPrice = mid ?? order.fill_price ?? pos.entry_price;
      const pnl       = valueBetPnl(pos.side, pos.entry_price, exitPrice, pos.size);

      this.state.daily_pnl += pnl;
      this.state.open_positions.delete(id);

      console.log(`   🔒 Closed ${id} @ $${exitPrice.toFixed(3)} — P&L $${pnl.toFixed(2)}`);
      return { success: true, position_id: id, position: pos, exit_price: exitPrice, pnl };
    } catch (err) {
      console.error(`   ❌ Close failed for ${id}: ${errorMessage(err)}`);
      return { success: false, position_id: id, error: errorMessage(err) };
    } finally {
      this.inFlight.delete(id);
    }
  }
}
