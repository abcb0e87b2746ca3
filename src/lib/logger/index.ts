/**
 * Logger wrapper: domain-agnostic structured logging backed by pino.
 *
 * Auto-redacts opaque credential objects (anything with `__opaque: true`,
 * such as the signing capability) and supports path-based redaction for
 * sensitive fields.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe; `silent` disables output. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
	/** Bindings attached to every line, e.g. `{ network: "finney" }` */
	readonly base?: Record<string, unknown>;
}

type LogMethod = {
	(msg: string): void;
	(obj: Record<string, unknown>, msg: string): void;
};

/** Structured logger interface with auto-redaction of opaque credentials. */
export interface Logger {
	trace: LogMethod;
	debug: LogMethod;
	info: LogMethod;
	warn: LogMethod;
	error: LogMethod;
	fatal: LogMethod;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Credential serializer ───────────────────────────────────────────

function isOpaqueCredential(value: unknown): boolean {
	return (
		typeof value === "object" &&
		value !== null &&
		"__opaque" in value &&
		value.__opaque === true
	);
}

function redactCredentials(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = isOpaqueCredential(value) ? "[REDACTED]" : value;
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type PinoLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

function forward(pinoLogger: pino.Logger, level: PinoLevel): LogMethod {
	return (msgOrObj: string | Record<string, unknown>, msg?: string): void => {
		if (typeof msgOrObj === "string") {
			pinoLogger[level](msgOrObj);
		} else {
			pinoLogger[level](redactCredentials(msgOrObj), msg ?? "");
		}
	};
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		trace: forward(pinoLogger, "trace"),
		debug: forward(pinoLogger, "debug"),
		info: forward(pinoLogger, "info"),
		warn: forward(pinoLogger, "warn"),
		error: forward(pinoLogger, "error"),
		fatal: forward(pinoLogger, "fatal"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(redactCredentials(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino with auto-redaction and optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ subnetId: 64 }, "Stake order submitted");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.base) {
		pinoOptions.base = { ...config.base };
	}

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	if (config.destination) {
		const destination = config.destination;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				destination.write(chunk);
			},
		};
		return wrapPino(pino(pinoOptions, stream));
	}

	return wrapPino(pino(pinoOptions));
}

/** Logger that discards everything; the default for library consumers and tests. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
