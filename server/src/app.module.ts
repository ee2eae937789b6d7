import { ConfigModule } from "@nestjs/config";
import {
	MiddlewareConsumer,
	Module,
	NestModule,
	RequestMethod,
} from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { HealthModule } from "./health.module";
import { DuelsModule } from "./duels/duels.module";
import { AdminModule } from "./admin/api/admin.module";
import { RequestLoggingMiddleware } from "./common/middlewares/request-logging.middleware";
import { BasicAuthMiddleware } from "./basic-auth.middleware";
import { gameConfig } from "./config/game.config";

const isTest = process.env.NODE_ENV === "test";

@Module({
	imports: [
		EventEmitterModule.forRoot(),
		ConfigModule.forRoot({ isGlobal: true, load: [gameConfig] }),
		TypeOrmModule.forRootAsync({
			useFactory: () => ({
				type: "better-sqlite3",
				database: isTest
					? ":memory:"
					: (process.env.SQLITE_DB_PATH ?? "parity-duel.sqlite"),
				synchronize: true,
				autoLoadEntities: true,
			}),
		}),
		DuelsModule,
		HealthModule,
		AdminModule,
	],
})
export class AppModule implements NestModule {
	configure(consumer: MiddlewareConsumer) {
		consumer
			.apply(BasicAuthMiddleware)
			.forRoutes({ path: "api/v1/admin/*", method: RequestMethod.ALL });

		consumer
			.apply(RequestLoggingMiddleware)
			.exclude({ path: "health", method: RequestMethod.ALL })
			.forRoutes({ path: "*", method: RequestMethod.ALL });
	}
}
