/**
 * Zod schemas for external market-data responses.
 *
 * Payloads are checked at the boundary so an upstream contract change shows
 * up as one warning instead of NaN closes deep in the indicator math.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Yahoo chart API  (v8/finance/chart/{symbol})
// ---------------------------------------------------------------------------

const ChartQuoteSchema = z
  .object({
    close: z.array(z.number().nullable()).optional(),
  })
  .passthrough();

const ChartResultSchema = z
  .object({
    timestamp: z.array(z.number()).optional(),
    indicators: z
      .object({
        quote: z.array(ChartQuoteSchema).optional(),
      })
      .passthrough(),
  })
  .passthrough();

export const YahooChartResponseSchema = z
  .object({
    chart: z
      .object({
        result: z.array(ChartResultSchema).nullable().optional(),
        error: z
          .object({
            code: z.string().optional(),
            description: z.string().optional(),
          })
          .passthrough()
          .nullable()
          .optional(),
      })
      .passthrough(),
  })
  .passthrough();

export type YahooChartResponse = z.infer<typeof YahooChartResponseSchema>;

// ---------------------------------------------------------------------------
// Validation helper
// ---------------------------------------------------------------------------

/**
 * Validate a parsed JSON payload against a Zod schema. Returns null (with a
 * warning) on failure; callers treat that like an empty response.
 */
export function validateApiResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, label: string): T | null {
  const result = schema.safeParse(payload);
  if (result.success) return result.data;
  console.warn(`[zod] ${label}: response failed validation`, result.error.issues.slice(0, 3));
  return null;
}

export function parseJsonSafe(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
