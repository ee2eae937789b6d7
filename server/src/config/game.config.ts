import { registerAs } from "@nestjs/config";

function integerFromEnv(name: string, fallback: number): number {
	const raw = process.env[name];
	if (raw === undefined || raw.trim() === "") return fallback;
	const parsed = Number(raw);
	if (!Number.isSafeInteger(parsed)) {
		throw new Error(`${name} must be an integer, got "${raw}"`);
	}
	return parsed;
}

function listFromEnv(name: string): string[] {
	return (process.env[name] ?? "")
		.split(",")
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0);
}

/**
 * Game rules and clock settings shared by every table.
 */
export const gameConfig = registerAs("game", () => ({
	minBid: integerFromEnv("MIN_BID", 1),
	maxBid: integerFromEnv("MAX_BID", 100),
	timeoutTicks: integerFromEnv("TIMEOUT_TICKS", 25),
	tickMs: integerFromEnv("TICK_MS", 12_000),
	clockGenesisMs: integerFromEnv("CLOCK_GENESIS_MS", 0),
	administrator: process.env.ADMIN_PRINCIPAL?.trim() || "admin",
	// principals the transfer gateway refuses to pay
	unreceivablePrincipals: listFromEnv("UNRECEIVABLE_PRINCIPALS"),
}));

export type GameSettings = ReturnType<typeof gameConfig>;
