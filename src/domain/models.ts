import { createHash } from 'node:crypto';

import { z } from 'zod';

const finiteNonNegativeNumber = z.number().finite().nonnegative();
const finitePositiveNumber = z.number().finite().positive();
const epochMsSchema = z.number().int().nonnegative();
const nonEmptyString = z.string().min(1);
const percentSchema = z.number().finite().positive().max(10_000);

export const signalClassSchema = z.enum(['discovery', 'alpha', 'manual']);
export const gradeSchema = z.enum(['CRITICAL', 'HIGH', 'MEDIUM', 'LOW']);

/**
 * Example:
 * {
 *   "assetId": "So11111111111111111111111111111111111111112",
 *   "signalClass": "discovery",
 *   "gradedAt": 1734303000000,
 *   "symbol": "SOL",
 *   "price": 182.4,
 *   "grade": "HIGH",
 *   "metadata": { "entryLiquidity": 120000 }
 * }
 */
export const signalSchema = z
  .object({
    assetId: nonEmptyString,
    signalClass: signalClassSchema,
    gradedAt: epochMsSchema,
    symbol: nonEmptyString.optional(),
    price: finitePositiveNumber.optional(),
    grade: gradeSchema.optional(),
    metadata: z.record(z.string(), z.unknown()).default({})
  })
  .strict();

export const takeProfitModeSchema = z.enum(['fixed-percent', 'median', 'mean', 'mode', 'smart-quantile']);

/**
 * Thresholds are percents: `stopLossPercent: 10` closes at -10%.
 * `takeProfitValue` is only read in `fixed-percent` mode.
 */
export const exitConfigSchema = z
  .object({
    takeProfitMode: takeProfitModeSchema,
    takeProfitValue: percentSchema.nullable(),
    stopLossPercent: percentSchema.max(100).nullable(),
    expiryDurationMs: epochMsSchema
  })
  .strict();

export const positionKeySchema = z
  .object({
    assetId: nonEmptyString,
    signalClass: signalClassSchema
  })
  .strict();

const positionBaseShape = {
  id: nonEmptyString,
  key: positionKeySchema,
  symbol: nonEmptyString,
  signalClass: signalClassSchema,
  entryPrice: finitePositiveNumber,
  sizeUsd: finitePositiveNumber,
  quantity: finitePositiveNumber,
  openedAt: epochMsSchema,
  exitConfig: exitConfigSchema
};

/**
 * Example:
 * {
 *   "id": "pos_3f9a1c2b7d4e",
 *   "key": { "assetId": "So111...112", "signalClass": "discovery" },
 *   "symbol": "SOL",
 *   "signalClass": "discovery",
 *   "entryPrice": 182.4,
 *   "sizeUsd": 50,
 *   "quantity": 0.2741,
 *   "openedAt": 1734303000000,
 *   "exitConfig": { "takeProfitMode": "median", "takeProfitValue": null, "stopLossPercent": 20, "expiryDurationMs": 86400000 },
 *   "status": "open"
 * }
 */
export const openPositionSchema = z
  .object({
    ...positionBaseShape,
    status: z.literal('open')
  })
  .strict();

export const closeReasonSchema = z.enum(['takeProfitHit', 'stopLossHit', 'expired', 'signalSwap', 'manual']);

/** ROI fields are fractions: `realizedRoi: -0.15` is a 15% loss. */
export const closedPositionSchema = z
  .object({
    ...positionBaseShape,
    status: z.literal('closed'),
    closedAt: epochMsSchema,
    exitPrice: finitePositiveNumber,
    realizedRoi: z.number().finite().min(-1),
    pnlUsd: z.number().finite(),
    closeReason: closeReasonSchema,
    peakRoi: z.number().finite().min(-1),
    holdDurationMs: epochMsSchema
  })
  .strict();

export const tradeStatsSchema = z
  .object({
    totalTrades: z.number().int().nonnegative(),
    wins: z.number().int().nonnegative(),
    losses: z.number().int().nonnegative(),
    totalPnlUsd: z.number().finite(),
    bestRoi: z.number().finite(),
    worstRoi: z.number().finite()
  })
  .strict();

/**
 * `capital` includes `reserve`; conservation is
 * `capital + sum(open sizeUsd) == allocatedCapital + realizedPnl`.
 */
export const portfolioSchema = z
  .object({
    userId: nonEmptyString,
    capital: finiteNonNegativeNumber,
    reserve: finiteNonNegativeNumber,
    allocatedCapital: finiteNonNegativeNumber,
    realizedPnl: z.number().finite(),
    positions: z.record(z.string(), openPositionSchema),
    history: z.array(closedPositionSchema),
    stats: tradeStatsSchema,
    version: z.number().int().nonnegative(),
    createdAt: epochMsSchema,
    updatedAt: epochMsSchema
  })
  .strict();

export const sizingSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('fixed'), amountUsd: finitePositiveNumber }).strict(),
  z.object({ mode: z.literal('percent'), percent: percentSchema.max(100) }).strict()
]);

/**
 * Example:
 * {
 *   "userId": "7714023",
 *   "tradingEnabled": true,
 *   "signalClasses": ["discovery", "alpha"],
 *   "sizing": { "mode": "percent", "percent": 10 },
 *   "takeProfitMode": "smart-quantile",
 *   "takeProfitValue": null,
 *   "stopLossPercent": null
 * }
 */
export const userPrefsSchema = z
  .object({
    userId: nonEmptyString,
    tradingEnabled: z.boolean(),
    signalClasses: z.array(signalClassSchema).default(['discovery', 'alpha']),
    grades: z.array(gradeSchema).optional(),
    sizing: sizingSchema,
    reserveUsd: finiteNonNegativeNumber.optional(),
    takeProfitMode: takeProfitModeSchema.default('median'),
    takeProfitValue: percentSchema.nullable().default(null),
    stopLossPercent: percentSchema.max(100).nullable().default(null),
    swapOnClassChange: z.boolean().default(true)
  })
  .strict();

export type SignalClass = z.infer<typeof signalClassSchema>;
export type Grade = z.infer<typeof gradeSchema>;
export type Signal = z.infer<typeof signalSchema>;
export type SignalInput = z.input<typeof signalSchema>;
export type TakeProfitMode = z.infer<typeof takeProfitModeSchema>;
export type ExitConfig = z.infer<typeof exitConfigSchema>;
export type PositionKey = z.infer<typeof positionKeySchema>;
export type OpenPosition = z.infer<typeof openPositionSchema>;
export type ClosedPosition = z.infer<typeof closedPositionSchema>;
export type Position = OpenPosition | ClosedPosition;
export type PositionStatus = Position['status'];
export type CloseReason = z.infer<typeof closeReasonSchema>;
export type TradeStats = z.infer<typeof tradeStatsSchema>;
export type Portfolio = z.infer<typeof portfolioSchema>;
export type Sizing = z.infer<typeof sizingSchema>;
export type UserPrefs = z.infer<typeof userPrefsSchema>;
export type UserPrefsInput = z.input<typeof userPrefsSchema>;

export function positionKeyId(key: PositionKey): string {
  return `${key.assetId}:${key.signalClass}`;
}

/** Fractional return of `price` against `entryPrice`. */
export function computeRoi(entryPrice: number, price: number): number {
  return (price - entryPrice) / entryPrice;
}

export function emptyTradeStats(): TradeStats {
  return {
    totalTrades: 0,
    wins: 0,
    losses: 0,
    totalPnlUsd: 0,
    bestRoi: 0,
    worstRoi: 0
  };
}

function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, item]) => item !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const serialized = entries.map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);

  return `{${serialized.join(',')}}`;
}

export function hashObject(obj: unknown): string {
  const payload = stableStringify(obj);
  return createHash('sha256').update(payload).digest('hex');
}
