// ── Market types ─────────────────────────────────────────────
export type OrderSide = 'BUY' | 'SELL';

export interface MarketToken {
  token_id: string;
  outcome:  string;   // "Yes" | "No" | team / candidate name
}

export interface Market {
  condition_id: string;
  question:     string;
  active:       boolean;
  volume:       number;   // USD lifetime
  tokens:       MarketToken[];   // binary markets: [YES, NO]
  end_date_iso: string;
}

export interface BookLevel {
  price: number;
  size:  number;
}

// Levels are best-first: bids descending, asks ascending.
export interface OrderBook {
  token_id: string;
  bids:     BookLevel[];
  asks:     BookLevel[];
}

export interface TokenPriceSummary {
  token_id:   string;
  best_bid:   number;
  best_ask:   number;
  midpoint:   number;
  bid_volume: number;
  ask_volume: number;
  spread:     number;
}

// ── Opportunities ────────────────────────────────────────────
interface OpportunityBase {
  market_id:      string;
  question:       string;
  priority:       number;   // lower = better
  expected_value: number;   // ranking only, never sizing
}

export interface ArbitrageOpportunity extends OpportunityBase {
  type:          'arbitrage';
  yes_token:     string;
  no_token:      string;
  yes_price:     number;
  no_price:      number;
  combined_cost: number;
  profit:        number;   // per share pair, 1 - combined_cost
  profit_pct:    number;   // percent of combined_cost
  max_position:  number;   // shares, min of both ask volumes
}

export interface MispricedOpportunity extends OpportunityBase {
  type:             'mispriced';
  token_id:         string;
  market_price:     number;
  estimated_prob:   number;
  edge:             number;
  edge_pct:         number;   // percent of market_price, signed
  recommended_side: OrderSide;
  liquidity:        number;
}

export interface HighQualityOpportunity extends OpportunityBase {
  type:          'high_quality';
  token_id:      string;
  quality_score: number;
  current_price: number | null;
  volume:        number;
  spread:        number;
  bid_volume:    number;
  ask_volume:    number;
}

export type Opportunity =
  | ArbitrageOpportunity
  | MispricedOpportunity
  | HighQualityOpportunity;

export type OpportunityType = Opportunity['type'];

// ── Positions ────────────────────────────────────────────────
interface PositionBase {
  id:        string;
  market_id: string;
  opened_at: number;   // unix ms
}

export interface ArbitragePosition extends PositionBase {
  type:            'arbitrage';
  yes_token:       string;
  no_token:        string;
  shares:          number;
  cost:            number;
  expected_profit: number;
}

export interface ValueBetPosition extends PositionBase {
  type:           'value_bet';
  token_id:       string;
  side:           OrderSide;
  size:           number;   // USD
  entry_price:    number;
  estimated_prob: number;
  edge:           number;
}

export interface LimitOrderPosition extends PositionBase {
  type:        'limit_order';
  token_id:    string;
  side:        OrderSide;
  size:        number;   // USD
  limit_price: number;
  shares:      number;
  order_id:    string;
}

export type Position = ArbitragePosition | ValueBetPosition | LimitOrderPosition;

export type PositionType = Position['type'];

// ── Risk state / config ──────────────────────────────────────
export interface RiskState {
  open_positions:       Map<string, Position>;
  daily_pnl:            number;
  daily_trades:         number;
  start_of_day_balance: number;
  last_reset_date:      string;   // local YYYY-MM-DD
}

export interface RiskConfig {
  max_position_size:     number;   // USD cap per position
  max_daily_loss:        number;   // USD
  max_open_positions:    number;
  min_edge:              number;   // fraction, 0.05 = 5%
  kelly_fraction:        number;
  target_daily_return:   number;   // fraction of start-of-day balance
  min_position_size:     number;   // USD floor for any entry
  profit_target_pct:     number;   // value bets, fraction
  stop_loss_pct:         number;   // value bets, fraction
  unwind_failed_arb_leg: boolean;
}

export interface ScanConfig {
  min_arb_profit_pct:  number;
  min_quality_volume:  number;
  quality_candidates:  number;
  min_ranked_quality:  number;
  max_opportunities:   number;
  market_scan_limit:   number;
}

// ── Portfolio summary ────────────────────────────────────────
export interface PortfolioSummary {
  current_balance:       number;
  open_positions:        number;
  total_exposure:        number;
  daily_pnl:             number;
  daily_return_pct:      number;
  daily_trades:          number;
  max_daily_loss:        number;
  remaining_loss_buffer: number;
  target_reached:        boolean;
}
