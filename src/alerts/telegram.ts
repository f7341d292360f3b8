/**
 * Telegram alerts — entries, exits and warnings. Silent when no bot
 * token / chat id is configured; send failures are logged, never thrown.
 */
import axios from 'axios';
import { TELEGRAM_BOT_TOKEN, TELEGRAM_CHAT_ID } from '../config';
import { ExecutionResult } from '../lifecycle';
import { Opportunity, Position } from '../types';
import { errorMessage } from '../utils/errors';

const BASE = `https://api.telegram.org/bot${TELEGRAM_BOT_TOKEN}`;

// ── Send a plain text message ─────────────────────────────────
export async function sendMessage(text: string): Promise<void> {
  if (!TELEGRAM_BOT_TOKEN || !TELEGRAM_CHAT_ID) return;
  try {
    await axios.post(`${BASE}/sendMessage`, {
      chat_id: TELEGRAM_CHAT_ID,
      text,
      parse_mode: 'HTML',
    }, { timeout: 10_000 });
  } catch (err) {
    console.error('⚠️  Telegram sendMessage failed:', errorMessage(err));
  }
}

function describeOpportunity(opp: Opportunity): string {
  switch (opp.type) {
    case 'arbitrage':
      return `YES ${(opp.yes_price * 100).toFixed(1)}¢ + NO ${(opp.no_price * 100).toFixed(1)}¢ = ${(opp.combined_cost * 100).toFixed(1)}¢ (+${opp.profit_pct.toFixed(2)}%)`;
    case 'mispriced':
      return `${opp.recommended_side} @ ${(opp.market_price * 100).toFixed(1)}¢ vs est ${(opp.estimated_prob * 100).toFixed(1)}% (edge ${opp.edge_pct.toFixed(1)}%)`;
    case 'high_quality':
      return `quality ${opp.quality_score}/100, spread ${(opp.spread * 100).toFixed(1)}¢`;
  }
}

// ── Format an entry confirmation ──────────────────────────────
export function formatExecutionAlert(opp: Opportunity, result: ExecutionResult, dryRun: boolean): string {
  if (!result.success) {
    return `❌ <b>ENTRY FAILED</b>\n<b>Market:</b> ${opp.question.slice(0, 80)}\n<b>Reason:</b> ${result.reason}`;
  }
  return [
    `✅ <b>${opp.type.toUpperCase().replace('_', ' ')} ENTRY</b>`,
    `<b>Market:</b> ${opp.question.slice(0, 80)}`,
    `<b>Setup:</b> ${describeOpportunity(opp)}`,
    `<b>Size:</b> $${result.size.toFixed(2)} USDC`,
    result.order_id ? `<b>Order:</b> <code>${result.order_id}</code>` : '',
    dryRun ? `<i>(dry run — no real order)</i>` : '',
  ].filter(Boolean).join('\n');
}

export async function sendExecutionAlert(opp: Opportunity, result: ExecutionResult, dryRun: boolean): Promise<void> {
  await sendMessage(formatExecutionAlert(opp, result, dryRun));
}

// ── Exit confirmation ─────────────────────────────────────────
export function formatExitAlert(position: Position, exitPrice: number, pnlUsdc: number, reason: string): string {
  const pnlEmoji = pnlUsdc >= 0 ? '💰' : '🔴';
  const lines = [
    `${pnlEmoji} <b>POSITION CLOSED</b>`,
    `<b>Market:</b> ${position.market_id}`,
  ];
  if (position.type === 'value_bet') {
    lines.push(
      `<b>Side:</b> ${position.side}`,
      `<b>Entry:</b> ${(position.entry_price * 100).toFixed(1)}¢ → <b>Exit:</b> ${(exitPrice * 100).toFixed(1)}¢`,
    );
  }
  lines.push(
    `${pnlEmoji} <b>PnL: ${pnlUsdc >= 0 ? '+' : ''}$${pnlUsdc.toFixed(2)} USDC</b>`,
    `<b>Reason:</b> ${reason}`,
  );
  return lines.join('\n');
}

export async function sendExitAlert(position: Position, exitPrice: number, pnlUsdc: number, reason: string): Promise<void> {
  await sendMessage(formatExitAlert(position, exitPrice, pnlUsdc, reason));
}

// ── Send error/warning alert ──────────────────────────────────
export async function sendAlert(text: string): Promise<void> {
  await sendMessage(`⚠️ ${text}`);
}
