import { formatExecutionAlert, formatExitAlert } from '../src/alerts/telegram';
import { MispricedOpportunity, ValueBetPosition } from '../src/types';

const opp: MispricedOpportunity = {
  type: 'mispriced', market_id: 'm', question: 'Will the bridge open by June?', priority: 3,
  expected_value: 16.67, token_id: 't', market_price: 0.60, estimated_prob: 0.70, edge: 0.10,
  edge_pct: 16.67, recommended_side: 'BUY', liquidity: 400,
};

const position: ValueBetPosition = {
  type: 'value_bet', id: 'v', market_id: 'm', opened_at: 0, token_id: 't', side: 'BUY',
  size: 100, entry_price: 0.40, estimated_prob: 0.5, edge: 0.1,
};

describe('formatExecutionAlert', () => {
  test('describes a filled value bet', () => {
    const text = formatExecutionAlert(opp, { success: true, position_id: 'p', type: 'value_bet', size: 41.5, order_id: 'o1' }, false);
    expect(text.split('\n')).toEqual([
      '✅ <b>MISPRICED ENTRY</b>',
      '<b>Market:</b> Will the bridge open by June?',
      '<b>Setup:</b> BUY @ 60.0¢ vs est 70.0% (edge 16.7%)',
      '<b>Size:</b> $41.50 USDC',
      '<b>Order:</b> <code>o1</code>',
    ]);
  });

  test('flags dry runs', () => {
    const text = formatExecutionAlert(opp, { success: true, position_id: 'p', type: 'value_bet', size: 20 }, true);
    expect(text.split('\n').pop()).toBe('<i>(dry run — no real order)</i>');
  });

  test('reports failures with the reason', () => {
    expect(formatExecutionAlert(opp, { success: false, reason: 'FOK not filled' }, false))
      .toBe('❌ <b>ENTRY FAILED</b>\n<b>Market:</b> Will the bridge open by June?\n<b>Reason:</b> FOK not filled');
  });
});

describe('formatExitAlert', () => {
  test('shows entry, exit and signed P&L', () => {
    expect(formatExitAlert(position, 0.60, 20, 'profit_target').split('\n')).toEqual([
      '💰 <b>POSITION CLOSED</b>',
      '<b>Market:</b> m',
      '<b>Side:</b> BUY',
      '<b>Entry:</b> 40.0¢ → <b>Exit:</b> 60.0¢',
      '💰 <b>PnL: +$20.00 USDC</b>',
      '<b>Reason:</b> profit_target',
    ]);
  });

  test('losses are marked red', () => {
    expect(formatExitAlert(position, 0.30, -10, 'stop_loss')).toContain('🔴 <b>PnL: $-10.00 USDC</b>');
  });
});
