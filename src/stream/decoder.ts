/**
 * FrameDecoder — protobuf push frames to StreamEvent.
 *
 * The envelope schema is parsed from proto/push-data.proto at start-up. Each
 * body variant is validated with zod after protobuf decoding; bodies of a
 * variant the schema does not know decode to null and are skipped.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import protobuf from "protobufjs";
import type { Type } from "protobufjs";
import { type Schema, validate, z } from "../lib/validation/index.js";
import { decimalSchema } from "../rest/schemas.js";
import { DecodeError } from "../shared/errors.js";
import { sideFromTradeType } from "../shared/order-side.js";
import { type Result, err, ok } from "../shared/result.js";
import type { StreamEvent } from "./types.js";

export const DEFAULT_PROTO_PATH = fileURLToPath(
	new URL("../../proto/push-data.proto", import.meta.url),
);

const WRAPPER_TYPE = "spot.push.PushDataV3ApiWrapper";

const versionSchema = z.string().regex(/^\d+$/).transform(Number);

const levelSchema = z.object({ price: decimalSchema, quantity: decimalSchema });
const side = z.number().int().transform(sideFromTradeType);
const text = z.string().default("");
const flag = z.boolean().default(false);
const epoch = z.number().default(0);

const envelopeSchema = z.object({
	channel: z.string().min(1),
	symbol: z.string().optional(),
	sendTime: z.number().optional(),
	body: z.string().optional(),
});

const bodySchemas = {
	publicAggreDeals: z.object({
		deals: z
			.array(
				z.object({
					price: decimalSchema,
					quantity: decimalSchema,
					tradeType: side,
					time: epoch,
				}),
			)
			.default([]),
	}),
	publicSpotKline: z.object({
		interval: z.string(),
		windowStart: z.number(),
		windowEnd: z.number(),
		openingPrice: decimalSchema,
		highestPrice: decimalSchema,
		lowestPrice: decimalSchema,
		closingPrice: decimalSchema,
		volume: decimalSchema,
		amount: decimalSchema,
	}),
	publicAggreDepths: z.object({
		fromVersion: versionSchema,
		toVersion: versionSchema,
		bids: z.array(levelSchema).default([]),
		asks: z.array(levelSchema).default([]),
	}),
	publicAggreBookTicker: z.object({
		bidPrice: decimalSchema,
		bidQuantity: decimalSchema,
		askPrice: decimalSchema,
		askQuantity: decimalSchema,
	}),
	privateAccount: z.object({
		vcoinName: z.string().min(1),
		balanceAmount: decimalSchema,
		balanceAmountChange: decimalSchema.default("0"),
		frozenAmount: decimalSchema.default("0"),
		frozenAmountChange: decimalSchema.default("0"),
		type: text,
		time: epoch,
	}),
	privateOrders: z.object({
		id: z.string().min(1),
		clientId: text,
		tradeType: side,
		price: decimalSchema.default("0"),
		quantity: decimalSchema.default("0"),
		avgPrice: decimalSchema.default("0"),
		cumulativeQuantity: decimalSchema.default("0"),
		cumulativeAmount: decimalSchema.default("0"),
		remainQuantity: decimalSchema.default("0"),
		isMaker: flag,
		status: z.number().int().default(0),
		createTime: epoch,
	}),
	privateDeals: z.object({
		tradeId: z.string().min(1),
		orderId: z.string().min(1),
		clientOrderId: text,
		tradeType: side,
		price: decimalSchema,
		quantity: decimalSchema,
		amount: decimalSchema.default("0"),
		feeAmount: decimalSchema.default("0"),
		feeCurrency: text,
		isMaker: flag,
		isSelfTrade: flag,
		time: epoch,
	}),
} as const;

type BodyName = keyof typeof bodySchemas;

function isBodyName(name: string): name is BodyName {
	return Object.hasOwn(bodySchemas, name);
}

function parseBody<T>(schema: Schema<T>, raw: unknown, channel: string): Result<T, DecodeError> {
	const res = validate(schema, raw, { channel });
	if (res.ok) return res;
	return err(new DecodeError("Push body failed validation", { channel, issues: res.error.issues }));
}

export class FrameDecoder {
	private readonly wrapper: Type;

	private constructor(wrapper: Type) {
		this.wrapper = wrapper;
	}

	/** @throws Error when the schema file is missing or invalid */
	static fromFile(path: string = DEFAULT_PROTO_PATH): FrameDecoder {
		return FrameDecoder.fromSource(readFileSync(path, "utf8"));
	}

	static fromSource(source: string): FrameDecoder {
		const { root } = protobuf.parse(source, { keepCase: true });
		return new FrameDecoder(root.lookupType(WRAPPER_TYPE));
	}

	/** Envelope type, exposed so tests can encode fixtures with the same schema. */
	get envelopeType(): Type {
		return this.wrapper;
	}

	/**
	 * @returns ok(null) for body variants outside the known set
	 */
	decode(bytes: Uint8Array, receivedAt: number): Result<StreamEvent | null, DecodeError> {
		let raw: unknown;
		try {
			const message = this.wrapper.decode(bytes);
			raw = this.wrapper.toObject(message, {
				longs: Number,
				oneofs: true,
				defaults: false,
				arrays: true,
			});
		} catch (cause) {
			return err(new DecodeError("Malformed push frame", { bytes: bytes.byteLength, cause }));
		}

		const env = validate(envelopeSchema, raw);
		if (!env.ok) {
			return err(new DecodeError("Push envelope failed validation", { issues: env.error.issues }));
		}
		const { channel, body } = env.value;
		if (body === undefined || !isBodyName(body)) return ok(null);

		const header = {
			channel,
			symbol: env.value.symbol ?? null,
			receivedAt,
			sentAt: env.value.sendTime ?? null,
		};
		const content = typeof raw === "object" && raw !== null ? Reflect.get(raw, body) : undefined;
		return this.toEvent(body, content, header);
	}

	private toEvent(
		body: BodyName,
		content: unknown,
		header: Pick<StreamEvent, "channel" | "symbol" | "receivedAt" | "sentAt">,
	): Result<StreamEvent, DecodeError> {
		const { channel } = header;
		switch (body) {
			case "publicAggreDeals": {
				const r = parseBody(bodySchemas.publicAggreDeals, content, channel);
				if (!r.ok) return r;
				const deals = r.value.deals.map((d) => ({
					price: d.price,
					quantity: d.quantity,
					side: d.tradeType,
					time: d.time,
				}));
				return ok<StreamEvent>({ ...header, kind: "trade", payload: { deals } });
			}
			case "publicSpotKline": {
				const r = parseBody(bodySchemas.publicSpotKline, content, channel);
				if (!r.ok) return r;
				const k = r.value;
				return ok<StreamEvent>({
					...header,
					kind: "candle",
					payload: {
						interval: k.interval,
						openTime: k.windowStart,
						closeTime: k.windowEnd,
						open: k.openingPrice,
						high: k.highestPrice,
						low: k.lowestPrice,
						close: k.closingPrice,
						volume: k.volume,
						amount: k.amount,
					},
				});
			}
			case "publicAggreDepths": {
				const r = parseBody(bodySchemas.publicAggreDepths, content, channel);
				if (!r.ok) return r;
				return ok<StreamEvent>({ ...header, kind: "depth_diff", payload: r.value });
			}
			case "publicAggreBookTicker": {
				const r = parseBody(bodySchemas.publicAggreBookTicker, content, channel);
				if (!r.ok) return r;
				return ok<StreamEvent>({ ...header, kind: "book_ticker", payload: r.value });
			}
			case "privateAccount": {
				const r = parseBody(bodySchemas.privateAccount, content, channel);
				if (!r.ok) return r;
				const a = r.value;
				return ok<StreamEvent>({
					...header,
					kind: "account_balance_delta",
					payload: {
						asset: a.vcoinName,
						free: a.balanceAmount,
						freeChange: a.balanceAmountChange,
						locked: a.frozenAmount,
						lockedChange: a.frozenAmountChange,
						reason: a.type,
						time: a.time,
					},
				});
			}
			case "privateOrders": {
				const r = parseBody(bodySchemas.privateOrders, content, channel);
				if (!r.ok) return r;
				const o = r.value;
				return ok<StreamEvent>({
					...header,
					kind: "order_update",
					payload: {
						orderId: o.id,
						clientOrderId: o.clientId,
						side: o.tradeType,
						price: o.price,
						quantity: o.quantity,
						avgPrice: o.avgPrice,
						cumulativeQuantity: o.cumulativeQuantity,
						cumulativeAmount: o.cumulativeAmount,
						remainQuantity: o.remainQuantity,
						isMaker: o.isMaker,
						status: o.status,
						createTime: o.createTime,
					},
				});
			}
			case "privateDeals": {
				const r = parseBody(bodySchemas.privateDeals, content, channel);
				if (!r.ok) return r;
				const d = r.value;
				return ok<StreamEvent>({
					...header,
					kind: "trade_fill",
					payload: {
						tradeId: d.tradeId,
						orderId: d.orderId,
						clientOrderId: d.clientOrderId,
						side: d.tradeType,
						price: d.price,
						quantity: d.quantity,
						amount: d.amount,
						feeAmount: d.feeAmount,
						feeCurrency: d.feeCurrency,
						isMaker: d.isMaker,
						isSelfTrade: d.isSelfTrade,
						time: d.time,
					},
				});
			}
		}
	}
}
