/**
 * Request and response schemas shared by the HTTP routes. Responses are
 * serialized through these, so every field a payload carries must be listed.
 */

import { z } from 'zod';

export const ErrorResponseSchema = z.object({ error: z.string() });

export const ScanIdParamsSchema = z.object({ scanId: z.coerce.number().int().positive() });
export const SymbolParamsSchema = z.object({ symbol: z.string().trim().min(1).max(32) });
export const ScanSymbolParamsSchema = ScanIdParamsSchema.merge(SymbolParamsSchema);

export const ScanProgressSchema = z.object({
  total: z.number(),
  to_process: z.number(),
  skipped: z.number(),
  completed: z.number(),
  current_symbol: z.string().nullable(),
  errors: z.number(),
});

export const RunScanResponseSchema = z.object({ scan_id: z.number() });

export const ActiveScanResponseSchema = z.object({
  active: z.boolean(),
  scan_id: z.number().nullable(),
  status: z.literal('running').nullable(),
  progress: ScanProgressSchema.nullable(),
});

export const ScanStatusResponseSchema = z.object({
  scan_id: z.number(),
  status: z.string(),
  started_at: z.string().nullable(),
  finished_at: z.string().nullable(),
  error_message: z.string().nullable(),
  total_symbols: z.number(),
  recommended_count: z.number(),
  progress: ScanProgressSchema.nullable(),
});

export const ScanLogsResponseSchema = z.object({
  scan_id: z.number().nullable(),
  scan_status: z.string().nullable(),
  logs: z.array(
    z.object({
      status: z.string(),
      symbol: z.string().nullable(),
      message: z.string(),
      created_at: z.string().nullable(),
    }),
  ),
});

export const DeleteSymbolResponseSchema = z.object({
  scan_id: z.number(),
  symbol: z.string(),
  deleted: z.object({
    fundamentals: z.number(),
    technicals: z.number(),
    recommendations: z.number(),
    logs: z.number(),
  }),
});

const FundamentalsFieldsSchema = z.object({
  stock_name: z.string().nullable(),
  cmp: z.number().nullable(),
  pe: z.number().nullable(),
  roce: z.number().nullable(),
  bv: z.number().nullable(),
  debt: z.number().nullable(),
  industry: z.string().nullable(),
});

const TechnicalsFieldsSchema = z.object({
  rsi14: z.number().nullable(),
  macd: z.number().nullable(),
  macd_signal: z.number().nullable(),
  sma20: z.number().nullable(),
  close: z.number().nullable(),
});

const DivergenceLabelSchema = z.enum(['Bullish', 'Bearing']);

const RecommendationEntrySchema = FundamentalsFieldsSchema.extend({
  symbol: z.string(),
  rsi_divergence: DivergenceLabelSchema,
  macd_divergence: DivergenceLabelSchema,
  score: z.number(),
  reason: z.string(),
  created_at: z.string().nullable(),
});

const ResultEntrySchema = RecommendationEntrySchema.merge(TechnicalsFieldsSchema).extend({
  recommended: z.boolean(),
});

const ScanHeaderSchema = z.object({
  scan_id: z.number().nullable(),
  scan_status: z.string().nullable(),
  started_at: z.string().nullable().optional(),
  finished_at: z.string().nullable().optional(),
});

export const LatestRecommendationsResponseSchema = ScanHeaderSchema.extend({
  recommendations: z.array(RecommendationEntrySchema),
});

export const LatestResultsResponseSchema = ScanHeaderSchema.extend({
  results: z.array(ResultEntrySchema),
});

export const SymbolDetailsQuerySchema = z.object({
  scan_id: z.coerce.number().int().positive().optional(),
});

export const SymbolDetailsResponseSchema = FundamentalsFieldsSchema.merge(TechnicalsFieldsSchema).extend({
  symbol: z.string(),
  signals: z.record(z.string(), z.unknown()),
  price_series: z.array(z.unknown()),
  rsi_series: z.array(z.unknown()),
  macd_series: z.array(z.unknown()),
  recommended: z.boolean(),
  score: z.number(),
  reason: z.string(),
  created_at: z.string().nullable(),
});

export const ReloadSymbolsResponseSchema = z.object({
  count_added: z.number(),
  count_total: z.number(),
});

export const ClearAllQuerySchema = z.object({
  confirm: z.enum(['true', 'false', '1', '0']).optional(),
});

export const ClearAllResponseSchema = z.object({
  status: z.literal('ok'),
  deleted: z.object({
    scan_logs: z.number(),
    recommendations: z.number(),
    technicals: z.number(),
    fundamentals: z.number(),
    scans: z.number(),
    symbols: z.number(),
    symbols_reloaded: z.number(),
    symbols_total: z.number(),
  }),
});

export const SchedulerStateResponseSchema = z.object({
  enabledByConfig: z.boolean(),
  enabled: z.boolean(),
  nextScanRunUtc: z.string().nullable(),
});

export const SchedulerToggleBodySchema = z.object({
  enabled: z.boolean(),
});
