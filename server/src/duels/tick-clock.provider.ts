import type { Provider } from "@nestjs/common";
import { SystemTickClock, type Clock } from "@parity-duel/sdk";
import { gameConfig, type GameSettings } from "../config/game.config";

export const TICK_CLOCK = Symbol("TICK_CLOCK");

/**
 * Deadlines are counted in ticks derived from wall-clock time.
 */
export const tickClockProvider: Provider<Clock> = {
	provide: TICK_CLOCK,
	inject: [gameConfig.KEY],
	useFactory: (settings: GameSettings) =>
		new SystemTickClock(settings.tickMs, settings.clockGenesisMs),
};
