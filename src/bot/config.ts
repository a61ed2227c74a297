/**
 * Bot configuration from environment variables.
 */
export interface BotConfig {
	botToken: string;
	dataDir: string;
	idleTimeoutMs: number;
	/** 0 disables the periodic sweep; recovery still sweeps once. */
	sweepIntervalMs: number;
	deleteCommandMessages: boolean;
}

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
	const raw = env[name];
	if (raw === undefined || raw.trim() === "") return fallback;
	const value = Number(raw);
	if (!Number.isFinite(value) || value < 0) throw new ConfigError(`${name} must be a non-negative number, got "${raw}"`);
	return value;
}

function readFlag(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
	const raw = env[name]?.trim().toLowerCase();
	if (raw === undefined || raw === "") return fallback;
	if (["1", "true", "yes", "on"].includes(raw)) return true;
	if (["0", "false", "no", "off"].includes(raw)) return false;
	throw new ConfigError(`${name} must be true or false, got "${raw}"`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
	const botToken = env.BOT_TOKEN;
	if (!botToken) throw new ConfigError("BOT_TOKEN env is required");
	const idleHours = readNumber(env, "UNO_IDLE_HOURS", 24);
	if (idleHours === 0) throw new ConfigError("UNO_IDLE_HOURS must be greater than 0");
	return {
		botToken,
		dataDir: env.UNO_DATA_DIR?.trim() || "./data",
		idleTimeoutMs: idleHours * 60 * 60 * 1000,
		sweepIntervalMs: readNumber(env, "UNO_SWEEP_INTERVAL_MINUTES", 60) * 60 * 1000,
		deleteCommandMessages: readFlag(env, "UNO_DELETE_COMMANDS", true)
	};
}
