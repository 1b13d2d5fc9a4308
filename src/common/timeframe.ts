import { z } from 'zod';
import { ValidationError } from './errors.js';

export interface RequestWindowConfig {
  defaultHours: number;
  maxHours: number;
}

const TimeframeQuery = z.object({
  timeframe_hours: z.coerce.number().int().optional(),
});

/**
 * Resolve the `timeframe_hours` query parameter.
 * Absent or outside [1, maxHours] falls back to defaultHours; a value that is
 * not an integer is a 400.
 */
export function resolveTimeframeHours(query: unknown, cfg: RequestWindowConfig): number {
  const parsed = TimeframeQuery.safeParse(query ?? {});
  if (!parsed.success) {
    throw new ValidationError('timeframe_hours must be an integer', {
      issues: parsed.error.issues.map((i) => i.message),
    });
  }

  const hours = parsed.data.timeframe_hours;
  if (hours === undefined || hours < 1 || hours > cfg.maxHours) {
    return cfg.defaultHours;
  }
  return hours;
}
