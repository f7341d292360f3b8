/**
 * External probability estimates for the mispricing scan.
 * File format: { "<conditionId>": 0.62, ... }
 */
import * as fs from 'fs';
import { z } from 'zod';

const EstimatesSchema = z.record(z.string(), z.number().min(0).max(1));

export function loadProbabilityEstimates(file: string): Map<string, number> {
  if (!file || !fs.existsSync(file)) return new Map();

  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  const parsed = EstimatesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid probability estimates in ${file}: ${parsed.error.issues[0]?.message ?? 'bad format'}`);
  }
  return new Map(Object.entries(parsed.data));
}
