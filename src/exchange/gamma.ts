/**
 * Gamma API market listing. The CLOB only knows token IDs; the question,
 * volume, active flag and outcome → token mapping come from Gamma.
 *
 * Gamma field reference:
 *   conditionId, question, active, closed, volumeNum, volume,
 *   outcomes (JSON string), clobTokenIds (JSON string), endDateIso
 */
import axios from 'axios';
import { z } from 'zod';
import { Market, MarketToken } from '../types';

const GammaMarketSchema = z.object({
  conditionId:  z.string().min(1),
  question:     z.string().nullish(),
  active:       z.boolean().nullish(),
  closed:       z.boolean().nullish(),
  volumeNum:    z.number().nullish(),
  volume:       z.union([z.string(), z.number()]).nullish(),
  outcomes:     z.string().nullish(),
  clobTokenIds: z.string().nullish(),
  endDateIso:   z.string().nullish(),
  endDate:      z.string().nullish(),
});

const StringListSchema = z.array(z.string());

function parseStringList(raw: string | null | undefined): string[] {
  if (!raw) return [];
  try {
    const parsed: unknown = JSON.parse(raw);
    const result = StringListSchema.safeParse(parsed);
    return result.success ? result.data : [];
  } catch {
    return [];
  }
}

// ── Parse a raw Gamma market object ──────────────────────────
export function parseGammaMarket(raw: unknown): Market | null {
  const result = GammaMarketSchema.safeParse(raw);
  if (!result.success) return null;
  const m = result.data;

  const outcomes = parseStringList(m.outcomes);
  const tokenIds = parseStringList(m.clobTokenIds);

  const tokens: MarketToken[] = [];
  outcomes.forEach((outcome, i) => {
    const tokenId = tokenIds[i];
    if (tokenId) tokens.push({ token_id: tokenId, outcome });
  });

  const volume = Number(m.volumeNum ?? m.volume ?? 0);

  return {
    condition_id: m.conditionId,
    question:     m.question ?? '',
    active:       Boolean(m.active) && !m.closed,
    volume:       Number.isFinite(volume) ? volume : 0,
    tokens,
    end_date_iso: m.endDateIso ?? m.endDate ?? '',
  };
}

function parseBatch(data: unknown): Market[] {
  if (!Array.isArray(data)) return [];
  const markets: Market[] = [];
  for (const raw of data) {
    const market = parseGammaMarket(raw);
    if (market) markets.push(market);
  }
  return markets;
}

export class GammaClient {
  constructor(
    private readonly host: string,
    private readonly timeoutMs = 15_000,
  ) {}

  async listMarkets(limit: number, offset: number): Promise<Market[]> {
    const res = await axios.get<unknown>(`${this.host}/markets`, {
      params:  { active: true, closed: false, limit, offset },
      timeout: this.timeoutMs,
    });
    return parseBatch(res.data);
  }

  async getMarket(conditionId: string): Promise<Market | null> {
    const res = await axios.get<unknown>(`${this.host}/markets`, {
      params:  { conditionId },
      timeout: this.timeoutMs,
    });
    return parseBatch(res.data).find(m => m.condition_id === conditionId) ?? null;
  }
}
