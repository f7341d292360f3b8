import { normaliseBook, withTimeout } from '../src/exchange/clob';
import { parseGammaMarket } from '../src/exchange/gamma';

describe('parseGammaMarket', () => {
  const raw = {
    conditionId:  '0xabc',
    question:     'Will it rain in Lisbon on Friday?',
    active:       true,
    closed:       false,
    volumeNum:    12_345.6,
    outcomes:     '["Yes", "No"]',
    clobTokenIds: '["111", "222"]',
    endDateIso:   '2026-02-01',
  };

  test('maps outcomes onto their token ids', () => {
    expect(parseGammaMarket(raw)).toEqual({
      condition_id: '0xabc',
      question:     'Will it rain in Lisbon on Friday?',
      active:       true,
      volume:       12_345.6,
      tokens:       [
        { token_id: '111', outcome: 'Yes' },
        { token_id: '222', outcome: 'No' },
      ],
      end_date_iso: '2026-02-01',
    });
  });

  test('closed markets are inactive', () => {
    expect(parseGammaMarket({ ...raw, closed: true })?.active).toBe(false);
  });

  test('falls back to a string volume', () => {
    expect(parseGammaMarket({ ...raw, volumeNum: undefined, volume: '900.5' })?.volume).toBe(900.5);
  });

  test('unparseable token lists give no tokens', () => {
    expect(parseGammaMarket({ ...raw, clobTokenIds: 'not json' })?.tokens).toEqual([]);
  });

  test('rejects records without a condition id', () => {
    expect(parseGammaMarket({ question: 'orphan' })).toBeNull();
    expect(parseGammaMarket('nope')).toBeNull();
  });
});

describe('normaliseBook', () => {
  test('parses string levels and orders them best first', () => {
    const book = normaliseBook('t', {
      bids: [{ price: '0.40', size: '10' }, { price: '0.45', size: '5' }],
      asks: [{ price: '0.55', size: '7' }, { price: '0.50', size: '3' }],
    });
    expect(book).toEqual({
      token_id: 't',
      bids: [{ price: 0.45, size: 5 }, { price: 0.40, size: 10 }],
      asks: [{ price: 0.50, size: 3 }, { price: 0.55, size: 7 }],
    });
  });

  test('drops non-numeric levels', () => {
    const book = normaliseBook('t', { bids: [{ price: 'abc', size: '1' }], asks: [] });
    expect(book?.bids).toEqual([]);
  });

  test('rejects a malformed payload', () => {
    expect(normaliseBook('t', { bids: 'none' })).toBeNull();
  });
});

describe('withTimeout', () => {
  test('passes through a prompt result', async () => {
    await expect(withTimeout(Promise.resolve(7), 50, 'fast')).resolves.toBe(7);
  });

  test('rejects a call that never answers', async () => {
    const never = new Promise<number>(() => undefined);
    await expect(withTimeout(never, 10, 'getOrderBook')).rejects.toThrow('getOrderBook timed out after 10ms');
  });
});
