/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Opaque credential objects (anything with `__opaque: true`) serialize as
 * "[REDACTED]". Request secrets are removed by path redaction.
 */

import pino from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export interface LoggerConfig {
	readonly level: LogLevel;
	/** Added to DEFAULT_REDACT_PATHS. */
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

export const DEFAULT_REDACT_PATHS: readonly string[] = [
	"apiKey",
	"secret",
	"signature",
	"listenKey",
	"*.apiKey",
	"*.secret",
	"*.signature",
	"*.listenKey",
	'headers["x-task-secret"]',
	"headers.authorization",
];

function isOpaqueCredential(value: unknown): boolean {
	return typeof value === "object" && value !== null && "__opaque" in value && value.__opaque === true;
}

function redactCredentials(obj: Record<string, unknown>): Record<string, unknown> {
	if (isOpaqueCredential(obj)) return { credentials: "[REDACTED]" };
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = isOpaqueCredential(value) ? "[REDACTED]" : value;
	}
	return result;
}

type Level = "info" | "warn" | "error" | "debug";

function method(target: pino.Logger, level: Level) {
	return (msgOrObj: string | Record<string, unknown>, msg?: string): void => {
		if (typeof msgOrObj === "string") {
			target[level](msgOrObj);
		} else {
			target[level](redactCredentials(msgOrObj), msg ?? "");
		}
	};
}

function wrapPino(target: pino.Logger): Logger {
	return {
		info: method(target, "info"),
		warn: method(target, "warn"),
		error: method(target, "error"),
		debug: method(target, "debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(target.child(bindings));
		},
	};
}

/**
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" }).child({ component: "gateway" });
 * logger.warn({ attempt: 2, status: 429 }, "retrying");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const options: pino.LoggerOptions = {
		level: config.level,
		redact: {
			paths: [...DEFAULT_REDACT_PATHS, ...(config.redactPaths ?? [])],
			censor: "[REDACTED]",
		},
	};

	if (config.destination) {
		const sink = config.destination;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				sink.write(chunk);
			},
		};
		return wrapPino(pino(options, stream));
	}
	return wrapPino(pino(options));
}

/** Logger that discards everything; default for components built without one. */
export const silentLogger: Logger = wrapPino(pino({ level: "silent" }));
