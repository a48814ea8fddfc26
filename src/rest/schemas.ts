/**
 * Response schemas for the exchange REST API. Numeric strings become Decimal
 * at this boundary; unknown fields are stripped.
 */

import { z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";

export const decimalSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
	const parsed = Decimal.parse(String(value));
	if (parsed === null) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a decimal: ${String(value)}` });
		return z.NEVER;
	}
	return parsed;
});

export interface PriceLevel {
	readonly price: Decimal;
	readonly quantity: Decimal;
}

const levelSchema = z
	.tuple([decimalSchema, decimalSchema])
	.rest(z.unknown())
	.transform(([price, quantity]): PriceLevel => ({ price, quantity }));

export const serverTimeSchema = z.object({ serverTime: z.number().int() });

export const tickerPriceSchema = z.object({
	symbol: z.string(),
	price: decimalSchema,
});
export type TickerPrice = z.infer<typeof tickerPriceSchema>;

export const depthSnapshotSchema = z.object({
	lastUpdateId: z.number().int().nonnegative(),
	bids: z.array(levelSchema),
	asks: z.array(levelSchema),
});
export type DepthSnapshot = z.infer<typeof depthSnapshotSchema>;

const klineRowSchema = z
	.tuple([
		z.number(),
		decimalSchema,
		decimalSchema,
		decimalSchema,
		decimalSchema,
		decimalSchema,
		z.number(),
	])
	.rest(z.unknown())
	.transform(([openTime, open, high, low, close, volume, closeTime]) => ({
		openTime,
		open,
		high,
		low,
		close,
		volume,
		closeTime,
	}));

export const klinesSchema = z.array(klineRowSchema);
export type Candle = z.infer<typeof klineRowSchema>;

export const balanceSchema = z.object({
	asset: z.string(),
	free: decimalSchema,
	locked: decimalSchema,
});
export type Balance = z.infer<typeof balanceSchema>;

export const accountSchema = z.object({
	balances: z.array(balanceSchema),
});
export type AccountInfo = z.infer<typeof accountSchema>;

const orderIdSchema = z.union([z.string(), z.number()]).transform(String);

export const orderAckSchema = z.object({
	symbol: z.string(),
	orderId: orderIdSchema,
	side: z.string().optional(),
	type: z.string().optional(),
	transactTime: z.number().optional(),
});
export type OrderAck = z.infer<typeof orderAckSchema>;

export const orderStatusSchema = z.object({
	symbol: z.string(),
	orderId: orderIdSchema,
	status: z.string(),
	side: z.string(),
	origQty: decimalSchema,
	executedQty: decimalSchema,
	cummulativeQuoteQty: decimalSchema,
});
export type OrderStatus = z.infer<typeof orderStatusSchema>;

export const listenKeySchema = z.object({ listenKey: z.string().min(1) });

/** Renew and close may answer with an empty object. */
export const listenKeyAckSchema = z.object({ listenKey: z.string().optional() });
