import { findHighQualityOpportunities, getBestOpportunities, rankOpportunities } from '../src/ranker';
import { DEFAULT_SCAN_CONFIG } from '../src/config';
import { ArbitrageOpportunity, HighQualityOpportunity, Opportunity } from '../src/types';
import { FakeExchange, binaryMarket, levels } from './helpers/fakeExchange';
import { silenceConsole } from './helpers/console';

silenceConsole();

function arb(id: string, ev: number): ArbitrageOpportunity {
  return {
    type: 'arbitrage', market_id: id, question: id, priority: 1, expected_value: ev,
    yes_token: `${id}-yes`, no_token: `${id}-no`, yes_price: 0.4, no_price: 0.55,
    combined_cost: 0.95, profit: 0.05, profit_pct: ev, max_position: 100,
  };
}

function quality(id: string, score: number): HighQualityOpportunity {
  return {
    type: 'high_quality', market_id: id, question: id, priority: 2, expected_value: score / 10,
    token_id: `${id}-yes`, quality_score: score, current_price: 0.5, volume: 100_000,
    spread: 0.01, bid_volume: 5_000, ask_volume: 5_000,
  };
}

// Deep, tight and heavily traded: scores 100.
function qualityMarket(ex: FakeExchange, id: string): void {
  ex.markets.push(binaryMarket(id, { volume: 150_000 }));
  ex.setBook(`${id}-yes`, levels([0.495, 20_000]), levels([0.50, 15_000]));
  ex.midpoints.set(`${id}-yes`, 0.4975);
}

describe('rankOpportunities', () => {
  test('priority first, then expected value', () => {
    const ranked = rankOpportunities<Opportunity>([arb('a2', 2), quality('q', 80), arb('a5', 5)], 10);
    expect(ranked.map(o => o.market_id)).toEqual(['a5', 'a2', 'q']);
  });

  test('truncates to the limit', () => {
    const ranked = rankOpportunities<Opportunity>([quality('q', 80), arb('a2', 2), arb('a5', 5)], 2);
    expect(ranked.map(o => o.market_id)).toEqual(['a5', 'a2']);
  });

  test('does not reorder the input', () => {
    const input: Opportunity[] = [quality('q', 80), arb('a', 2)];
    rankOpportunities(input, 10);
    expect(input[0].market_id).toBe('q');
  });
});

describe('findHighQualityOpportunities', () => {
  test('keeps tradeable markets above the ranking floor', async () => {
    const ex = new FakeExchange();
    qualityMarket(ex, 'q');
    // volume 20 + spread 0 + liquidity 0: untradeable
    ex.markets.push(binaryMarket('thin', { volume: 20_000 }));
    ex.setBook('thin-yes', [], levels([0.6, 5]));

    const found = await findHighQualityOpportunities(ex, DEFAULT_SCAN_CONFIG);
    expect(found).toHaveLength(1);
    expect(found[0]).toMatchObject({
      type: 'high_quality', market_id: 'q', quality_score: 100, priority: 2, expected_value: 10,
      current_price: 0.4975, bid_volume: 20_000, ask_volume: 15_000,
    });
  });
});

describe('getBestOpportunities', () => {
  test('merges arbitrage and quality from one market listing', async () => {
    const ex = new FakeExchange();
    ex.markets.push(binaryMarket('a'));
    ex.setBook('a-yes', [], levels([0.40, 200]));
    ex.setBook('a-no',  [], levels([0.55, 150]));
    qualityMarket(ex, 'q');

    const ranked = await getBestOpportunities(ex, DEFAULT_SCAN_CONFIG);
    expect(ranked.map(o => [o.type, o.market_id])).toEqual([
      ['arbitrage', 'a'],
      ['high_quality', 'q'],
    ]);
    expect(ex.listCalls).toBe(1);
  });

  test('caps the list at max_opportunities', async () => {
    const ex = new FakeExchange();
    for (const id of ['a', 'b', 'c']) {
      ex.markets.push(binaryMarket(id));
      ex.setBook(`${id}-yes`, [], levels([0.40, 200]));
      ex.setBook(`${id}-no`,  [], levels([0.50, 150]));
    }
    const ranked = await getBestOpportunities(ex, { ...DEFAULT_SCAN_CONFIG, max_opportunities: 2 });
    expect(ranked).toHaveLength(2);
  });
});
