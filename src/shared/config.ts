/**
 * Staker configuration.
 *
 * Replaces a process-wide production/test switch with an explicit network
 * value; everything network-specific is derived from the config handed to
 * `createStaker`, never read from globals later.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { Decimal } from "./decimal.js";
import { ConfigError } from "./errors.js";
import { Duration } from "./time.js";

/** Chain the staker talks to. */
export const Network = {
	Finney: "finney",
	Testnet: "testnet",
	Local: "local",
} as const;

export type Network = (typeof Network)[keyof typeof Network];

export interface StakerConfig {
	readonly network: Network;
	/** Coldkey address of the staking wallet */
	readonly walletAddress: string | undefined;
	/** Validator hotkey used by rules that omit `delegateId` */
	readonly defaultDelegate: string | undefined;
	/** JSON file holding the rule definitions */
	readonly rulesPath: string;
	/** JSONL file backing the ledger */
	readonly ledgerPath: string;
	readonly logLevel: LogLevel;
	/** Bound on a single order submission, inclusion included */
	readonly submitTimeoutMs: number;
	/** Bound on a single price or balance query */
	readonly queryTimeoutMs: number;
	/** Orders are skipped for a block while the free balance is at or below this */
	readonly minFreeBalance: Decimal;
	/** Ledger commit attempts before the failure becomes fatal */
	readonly commitMaxAttempts: number;
}

export const DEFAULT_STAKER_CONFIG: StakerConfig = {
	network: Network.Finney,
	walletAddress: undefined,
	defaultDelegate: undefined,
	rulesPath: "subnets.json",
	ledgerPath: "./data/ledger.jsonl",
	logLevel: "info",
	submitTimeoutMs: Duration.blocks(6),
	queryTimeoutMs: Duration.blocks(1),
	minFreeBalance: Decimal.from("0.01"),
	commitMaxAttempts: 5,
};

/** Mutable builder shape for constructing Partial<StakerConfig>. */
interface MutableStakerConfig {
	network?: Network;
	walletAddress?: string;
	defaultDelegate?: string;
	rulesPath?: string;
	ledgerPath?: string;
	logLevel?: LogLevel;
	submitTimeoutMs?: number;
	queryTimeoutMs?: number;
	minFreeBalance?: Decimal;
	commitMaxAttempts?: number;
}

const NETWORKS: readonly string[] = Object.values(Network);
const LOG_LEVELS: readonly string[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isNetwork(value: string): value is Network {
	return NETWORKS.includes(value);
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.includes(value);
}

/**
 * Reads config values from environment variables.
 * Supported: STAKER_NETWORK, STAKER_WALLET_ADDRESS, STAKER_DEFAULT_DELEGATE,
 * STAKER_RULES_PATH, STAKER_LEDGER_PATH, STAKER_LOG_LEVEL,
 * STAKER_SUBMIT_TIMEOUT_MS, STAKER_QUERY_TIMEOUT_MS, STAKER_MIN_FREE_BALANCE,
 * STAKER_COMMIT_MAX_ATTEMPTS.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<StakerConfig> {
	const result: MutableStakerConfig = {};

	const network = env["STAKER_NETWORK"];
	if (network) {
		const normalized = network.trim().toLowerCase();
		if (!isNetwork(normalized)) {
			throw new ConfigError(
				`Invalid STAKER_NETWORK: "${network}" must be one of ${NETWORKS.join(", ")}`,
			);
		}
		result.network = normalized;
	}

	const logLevel = env["STAKER_LOG_LEVEL"];
	if (logLevel) {
		const normalized = logLevel.trim().toLowerCase();
		if (!isLogLevel(normalized)) {
			throw new ConfigError(`Invalid STAKER_LOG_LEVEL: "${logLevel}"`);
		}
		result.logLevel = normalized;
	}

	const walletAddress = nonEmpty(env["STAKER_WALLET_ADDRESS"]);
	if (walletAddress) result.walletAddress = walletAddress;
	const defaultDelegate = nonEmpty(env["STAKER_DEFAULT_DELEGATE"]);
	if (defaultDelegate) result.defaultDelegate = defaultDelegate;
	const rulesPath = nonEmpty(env["STAKER_RULES_PATH"]);
	if (rulesPath) result.rulesPath = rulesPath;
	const ledgerPath = nonEmpty(env["STAKER_LEDGER_PATH"]);
	if (ledgerPath) result.ledgerPath = ledgerPath;

	const submitTimeoutMs = parsePositiveIntEnv(env, "STAKER_SUBMIT_TIMEOUT_MS");
	if (submitTimeoutMs !== undefined) result.submitTimeoutMs = submitTimeoutMs;
	const queryTimeoutMs = parsePositiveIntEnv(env, "STAKER_QUERY_TIMEOUT_MS");
	if (queryTimeoutMs !== undefined) result.queryTimeoutMs = queryTimeoutMs;
	const commitMaxAttempts = parsePositiveIntEnv(env, "STAKER_COMMIT_MAX_ATTEMPTS");
	if (commitMaxAttempts !== undefined) result.commitMaxAttempts = commitMaxAttempts;

	const minFreeBalance = env["STAKER_MIN_FREE_BALANCE"];
	if (minFreeBalance) {
		if (!Decimal.isDecimalString(minFreeBalance) || Decimal.from(minFreeBalance).isNegative()) {
			throw new ConfigError(
				`Invalid STAKER_MIN_FREE_BALANCE: "${minFreeBalance}" must be a non-negative decimal`,
			);
		}
		result.minFreeBalance = Decimal.from(minFreeBalance);
	}

	return result;
}

/** Defaults overlaid with environment values. */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): StakerConfig {
	return { ...DEFAULT_STAKER_CONFIG, ...configFromEnv(env) };
}

function nonEmpty(raw: string | undefined): string | undefined {
	const trimmed = raw?.trim();
	return trimmed ? trimmed : undefined;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parsePositiveIntEnv(env: NodeJS.ProcessEnv, envKey: string): number | undefined {
	const raw = env[envKey];
	if (!raw) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed <= 0) {
		throw new ConfigError(`Invalid ${envKey}: "${raw}" must be a positive integer`);
	}
	return parsed;
}
