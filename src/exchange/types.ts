/**
 * The exchange capability the trading core consumes. Every call is
 * fallible: implementations return null / empty / a failed OrderResult
 * instead of throwing where they can, and callers still guard with
 * try/catch because a network layer can always throw.
 */
import { Market, OrderBook, OrderSide } from '../types';

export type OrderResult =
  | { success: true;  order_id: string; fill_price?: number }
  | { success: false; error: string };

export interface OpenOrder {
  id:            string;
  token_id:      string;
  side:          OrderSide;
  price:         number;
  original_size: number;
  size_matched:  number;
  status:        string;
}

export interface TradeRecord {
  id:         string;
  token_id:   string;
  side:       OrderSide;
  price:      number;
  size:       number;
  status:     string;
  match_time: string;
}

export interface MarketDataSource {
  listMarkets(limit: number, offset: number): Promise<Market[]>;
  getMarket(marketId: string): Promise<Market | null>;
  getOrderBook(tokenId: string): Promise<OrderBook | null>;
  getMidpoint(tokenId: string): Promise<number | null>;
  /** BUY → best ask (what we pay), SELL → best bid (what we receive). */
  getBestPrice(tokenId: string, side: OrderSide): Promise<number | null>;
}

export interface OrderGateway {
  /** amountUsd is the dollar notional for both sides. */
  placeMarketOrder(tokenId: string, amountUsd: number, side: OrderSide): Promise<OrderResult>;
  placeLimitOrder(tokenId: string, price: number, shares: number, side: OrderSide): Promise<OrderResult>;
  cancelOrder(orderId: string): Promise<boolean>;
  cancelAllOrders(): Promise<boolean>;
  getOpenOrders(): Promise<OpenOrder[]>;
  getTrades(): Promise<TradeRecord[]>;
  getCollateralBalance(): Promise<number | null>;
  // Value-bet exits need the current price.
  getMidpoint(tokenId: string): Promise<number | null>;
}

export type Exchange = MarketDataSource & OrderGateway;
