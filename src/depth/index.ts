/**
 * Depth aggregator — collapses an order book into a per-token price
 * summary. Volumes are plain sums of the listed sizes; tick and lot
 * sizes are not taken into account.
 */
import { MarketDataSource } from '../exchange/types';
import { BookLevel, OrderBook, TokenPriceSummary } from '../types';
import { errorMessage } from '../utils/errors';

function totalSize(levels: BookLevel[]): number {
  return levels.reduce((s, l) => s + l.size, 0);
}

// An empty side means no liquidity: bid 0 / ask 1 is the widest spread.
export function summarizeOrderBook(tokenId: string, book: Pick<OrderBook, 'bids' | 'asks'>): TokenPriceSummary {
  const bestBid = book.bids.length > 0 ? book.bids[0].price : 0;
  const bestAsk = book.asks.length > 0 ? book.asks[0].price : 1;

  return {
    token_id:   tokenId,
    best_bid:   bestBid,
    best_ask:   bestAsk,
    midpoint:   (bestBid + bestAsk) / 2,
    bid_volume: totalSize(book.bids),
    ask_volume: totalSize(book.asks),
    spread:     bestAsk - bestBid,
  };
}

export async function fetchPriceSummary(
  source:  MarketDataSource,
  tokenId: string,
): Promise<TokenPriceSummary | null> {
  try {
    const book = await source.getOrderBook(tokenId);
    if (!book) return null;
    return summarizeOrderBook(tokenId, book);
  } catch (err) {
    console.error(`⚠️  Depth for ${tokenId.slice(0, 12)}… unavailable: ${errorMessage(err)}`);
    return null;
  }
}
