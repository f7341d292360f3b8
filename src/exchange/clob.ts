/**
 * ClobExchange — the exchange capability backed by the Polymarket CLOB.
 * Uses @polymarket/clob-client for books, prices and order signing /
 * submission, and Gamma (axios) for market listings.
 *
 * Without a wallet key the client is read-only and every order fails.
 * In dry-run mode orders are not sent; they come back as synthetic fills
 * at the current best price so the rest of the bot runs unchanged.
 */
import { ClobClient, ApiKeyCreds, Chain, Side, OrderType, AssetType } from '@polymarket/clob-client';
import { Wallet } from '@ethersproject/wallet';
import { z } from 'zod';
import { GammaClient } from './gamma';
import { Exchange, OpenOrder, OrderResult, TradeRecord } from './types';
import { BookLevel, Market, OrderBook, OrderSide } from '../types';
import { errorMessage } from '../utils/errors';

export interface ClobExchangeOptions {
  clobHost:       string;
  gammaHost:      string;
  chainId:        number;
  privateKey?:    string;
  creds?:         ApiKeyCreds;
  signatureType?: number;
  funder?:        string;
  dryRun?:        boolean;
  timeoutMs?:     number;
}

// ── Response schemas ──────────────────────────────────────────
const num = z.union([z.string(), z.number()]).transform(Number);

const BookSchema = z.object({
  bids: z.array(z.object({ price: num, size: num })).default([]),
  asks: z.array(z.object({ price: num, size: num })).default([]),
});

const MidpointSchema = z.object({ mid: num });

const PostOrderSchema = z.object({
  success:       z.boolean().optional(),
  orderID:       z.string().optional(),
  errorMsg:      z.string().optional(),
  makingAmount:  num.optional(),
  takingAmount:  num.optional(),
});

const OpenOrdersSchema = z.array(z.object({
  id:            z.string(),
  asset_id:      z.string(),
  side:          z.string(),
  price:         num,
  original_size: num,
  size_matched:  num,
  status:        z.string(),
}));

const TradesSchema = z.array(z.object({
  id:         z.string(),
  asset_id:   z.string(),
  side:       z.string(),
  price:      num,
  size:       num,
  status:     z.string(),
  match_time: z.string(),
}));

const BalanceSchema = z.object({ balance: num });

const USDC_SCALE = 1e6;

function toSide(raw: string): OrderSide {
  return raw.toUpperCase() === 'SELL' ? 'SELL' : 'BUY';
}

export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

// Bids best (highest) first, asks best (lowest) first.
export function normaliseBook(tokenId: string, raw: unknown): OrderBook | null {
  const parsed = BookSchema.safeParse(raw);
  if (!parsed.success) return null;
  const valid = (l: BookLevel) => Number.isFinite(l.price) && Number.isFinite(l.size);
  return {
    token_id: tokenId,
    bids: parsed.data.bids.filter(valid).sort((a, b) => b.price - a.price),
    asks: parsed.data.asks.filter(valid).sort((a, b) => a.price - b.price),
  };
}

export class ClobExchange implements Exchange {
  private readonly client:  ClobClient;
  private readonly gamma:   GammaClient;
  private readonly trading: boolean;
  private readonly dryRun:  boolean;
  private readonly timeoutMs: number;

  constructor(opts: ClobExchangeOptions) {
    const chain = opts.chainId === Chain.AMOY ? Chain.AMOY : Chain.POLYGON;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.gamma     = new GammaClient(opts.gammaHost, this.timeoutMs);
    this.dryRun    = opts.dryRun ?? false;

    if (opts.privateKey) {
      const key    = opts.privateKey.startsWith('0x') ? opts.privateKey : `0x${opts.privateKey}`;
      const wallet = new Wallet(key);
      // signatureType=0 = EOA, 1 = email/magic proxy, 2 = browser proxy
      this.client  = new ClobClient(
        opts.clobHost, chain, wallet, opts.creds, opts.signatureType ?? 0, opts.funder || undefined,
      );
      this.trading = true;
      console.log(`🔑 CLOB client ready in TRADING mode (${wallet.address})`);
    } else {
      this.client  = new ClobClient(opts.clobHost, chain);
      this.trading = false;
      console.log('👀 CLOB client ready in READ-ONLY mode');
    }
  }

  private call<T>(promise: Promise<T>, label: string): Promise<T> {
    return withTimeout(promise, this.timeoutMs, label);
  }

  // ── Market data ───────────────────────────────────────────
  listMarkets(limit: number, offset: number): Promise<Market[]> {
    return this.gamma.listMarkets(limit, offset);
  }

  async getMarket(marketId: string): Promise<Market | null> {
    try {
      return await this.gamma.getMarket(marketId);
    } catch (err) {
      console.error(`⚠️  Gamma market ${marketId} failed: ${errorMessage(err)}`);
      return null;
    }
  }

  async getOrderBook(tokenId: string): Promise<OrderBook | null> {
    try {
      const raw: unknown = await this.call(this.client.getOrderBook(tokenId), 'getOrderBook');
      return normaliseBook(tokenId, raw);
    } catch (err) {
      console.error(`⚠️  Order book ${tokenId.slice(0, 12)}… failed: ${errorMessage(err)}`);
      return null;
    }
  }

  async getMidpoint(tokenId: string): Promise<number | null> {
    try {
      const raw: unknown = await this.call(this.client.getMidpoint(tokenId), 'getMidpoint');
      const parsed = MidpointSchema.safeParse(raw);
      if (!parsed.success || !Number.isFinite(parsed.data.mid) || parsed.data.mid <= 0) return null;
      return parsed.data.mid;
    } catch (err) {
      console.error(`⚠️  Midpoint ${tokenId.slice(0, 12)}… failed: ${errorMessage(err)}`);
      return null;
    }
  }

  async getBestPrice(tokenId: string, side: OrderSide): Promise<number | null> {
    const book = await this.getOrderBook(tokenId);
    if (!book) return null;
    const level = side === 'BUY' ? book.asks[0] : book.bids[0];
    return level ? level.price : null;
  }

  // ── Orders ────────────────────────────────────────────────
  async placeMarketOrder(tokenId: string, amountUsd: number, side: OrderSide): Promise<OrderResult> {
    if (this.dryRun) return this.dryRunFill(tokenId, side);
    if (!this.trading) return { success: false, error: 'trading not enabled (no wallet key)' };

    try {
      // BUY amounts are USDC; SELL amounts are shares, priced at the best bid.
      let amount = amountUsd;
      if (side === 'SELL') {
        const bid = await this.getBestPrice(tokenId, 'SELL');
        if (!bid) return { success: false, error: 'no bid to sell into' };
        amount = amountUsd / bid;
      }

      const order = await this.call(this.client.createMarketOrder({
        tokenID: tokenId,
        amount,
        side:    side === 'BUY' ? Side.BUY : Side.SELL,
      }), 'createMarketOrder');
      const raw: unknown = await this.call(this.client.postOrder(order, OrderType.FOK), 'postOrder');
      const result = this.toOrderResult(raw, side);

      if (result.success) {
        console.log(`   📤 Market ${side} $${amountUsd.toFixed(2)} on ${tokenId.slice(0, 12)}… → ${result.order_id}`);
      }
      return result;
    } catch (err) {
      console.error(`   ❌ Market order failed: ${errorMessage(err)}`);
      return { success: false, error: errorMessage(err) };
    }
  }

  async placeLimitOrder(tokenId: string, price: number, shares: number, side: OrderSide): Promise<OrderResult> {
    if (this.dryRun) return { success: true, order_id: 'dry-run', fill_price: price };
    if (!this.trading) return { success: false, error: 'trading not enabled (no wallet key)' };

    try {
      const order = await this.call(this.client.createOrder({
        tokenID: tokenId,
        price:   Math.round(price * 100) / 100,   // 1¢ tick
        size:    shares,
        side:    side === 'BUY' ? Side.BUY : Side.SELL,
      }), 'createOrder');
      const raw: unknown = await this.call(this.client.postOrder(order, OrderType.GTC), 'postOrder');
      const result = this.toOrderResult(raw, side);

      if (result.success) {
        console.log(`   📤 Limit ${side} ${shares.toFixed(2)} @ $${price.toFixed(3)} → ${result.order_id}`);
      }
      return result;
    } catch (err) {
      console.error(`   ❌ Limit order failed: ${errorMessage(err)}`);
      return { success: false, error: errorMessage(err) };
    }
  }

  async cancelOrder(orderId: string): Promise<boolean> {
    if (!this.trading) return false;
    try {
      await this.call(this.client.cancelOrder({ orderID: orderId }), 'cancelOrder');
      console.log(`   🗑️  Order ${orderId} cancelled`);
      return true;
    } catch (err) {
      console.error(`   ❌ Cancel ${orderId} failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async cancelAllOrders(): Promise<boolean> {
    if (!this.trading) return false;
    try {
      await this.call(this.client.cancelAll(), 'cancelAll');
      console.log('   🗑️  All orders cancelled');
      return true;
    } catch (err) {
      console.error(`   ❌ Cancel all failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async getOpenOrders(): Promise<OpenOrder[]> {
    if (!this.trading) return [];
    try {
      const raw: unknown = await this.call(this.client.getOpenOrders(), 'getOpenOrders');
      const parsed = OpenOrdersSchema.safeParse(raw);
      if (!parsed.success) return [];
      return parsed.data.map(o => ({
        id:            o.id,
        token_id:      o.asset_id,
        side:          toSide(o.side),
        price:         o.price,
        original_size: o.original_size,
        size_matched:  o.size_matched,
        status:        o.status,
      }));
    } catch (err) {
      console.error(`⚠️  Open orders failed: ${errorMessage(err)}`);
      return [];
    }
  }

  async getTrades(): Promise<TradeRecord[]> {
    if (!this.trading) return [];
    try {
      const raw: unknown = await this.call(this.client.getTrades(), 'getTrades');
      const parsed = TradesSchema.safeParse(raw);
      if (!parsed.success) return [];
      return parsed.data.map(t => ({
        id:         t.id,
        token_id:   t.asset_id,
        side:       toSide(t.side),
        price:      t.price,
        size:       t.size,
        status:     t.status,
        match_time: t.match_time,
      }));
    } catch (err) {
      console.error(`⚠️  Trade history failed: ${errorMessage(err)}`);
      return [];
    }
  }

  async getCollateralBalance(): Promise<number | null> {
    if (!this.trading) return null;
    try {
      const raw: unknown = await this.call(
        this.client.getBalanceAllowance({ asset_type: AssetType.COLLATERAL }),
        'getBalanceAllowance',
      );
      const parsed = BalanceSchema.safeParse(raw);
      return parsed.success ? parsed.data.balance / USDC_SCALE : null;
    } catch (err) {
      console.error(`⚠️  Balance lookup failed: ${errorMessage(err)}`);
      return null;
    }
  }

  // ── Helpers ───────────────────────────────────────────────
  private toOrderResult(raw: unknown, side: OrderSide): OrderResult {
    const parsed = PostOrderSchema.safeParse(raw);
    if (!parsed.success) return { success: false, error: `unexpected CLOB response: ${JSON.stringify(raw)}` };

    const r = parsed.data;
    if (r.success === false || !r.orderID) {
      return { success: false, error: r.errorMsg || 'CLOB returned no orderID' };
    }

    // BUY: making = USDC, taking = shares; SELL is the reverse.
    let fillPrice: number | undefined;
    if (r.makingAmount && r.takingAmount) {
      fillPrice = side === 'BUY' ? r.makingAmount / r.takingAmount : r.takingAmount / r.makingAmount;
    }
    return { success: true, order_id: r.orderID, fill_price: fillPrice };
  }

  private async dryRunFill(tokenId: string, side: OrderSide): Promise<OrderResult> {
    const price = await this.getBestPrice(tokenId, side);
    console.log(`   🧪 Dry run ${side} on ${tokenId.slice(0, 12)}… (order NOT placed)`);
    return { success: true, order_id: 'dry-run', fill_price: price ?? undefined };
  }
}
