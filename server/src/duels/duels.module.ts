import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";

import { DuelsService } from "./duels.service";
import { DuelsController } from "./duels.controller";
import { DuelSession } from "./duel-session.entity";
import { Payout } from "./payout.entity";
import { tickClockProvider } from "./tick-clock.provider";
import { PrincipalGuard } from "../auth/principal.guard";
import { ServerSentEventsService } from "../common/server-sent-events.service";

@Module({
	imports: [TypeOrmModule.forFeature([DuelSession, Payout])],
	providers: [
		DuelsService,
		tickClockProvider,
		PrincipalGuard,
		ServerSentEventsService,
	],
	controllers: [DuelsController],
	exports: [DuelsService, ServerSentEventsService],
})
export class DuelsModule {}
