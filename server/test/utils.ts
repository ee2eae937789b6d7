import request from "supertest";
import { Test, type TestingModule } from "@nestjs/testing";
import { type INestApplication, ValidationPipe } from "@nestjs/common";
import { ManualClock } from "@parity-duel/sdk";
import { AppModule } from "../src/app.module";
import { HttpExceptionFilter } from "../src/common/filters/http-exception.filter";
import { TICK_CLOCK } from "../src/duels/tick-clock.provider";

export const ADMIN_USER = "test-admin";
export const ADMIN_PASS = "test-secret";

export const adminAuthHeader = `Basic ${Buffer.from(
	`${ADMIN_USER}:${ADMIN_PASS}`,
).toString("base64")}`;

/**
 * Boots the whole application on in-memory SQLite with a clock the test
 * drives by hand.
 */
export async function createTestApp(
	clock: ManualClock,
): Promise<INestApplication> {
	process.env.ADMIN_BASIC_USER = ADMIN_USER;
	process.env.ADMIN_BASIC_PASS = ADMIN_PASS;
	process.env.UNRECEIVABLE_PRINCIPALS = "mallory";

	const moduleFixture: TestingModule = await Test.createTestingModule({
		imports: [AppModule],
	})
		.overrideProvider(TICK_CLOCK)
		.useValue(clock)
		.compile();

	const app = moduleFixture.createNestApplication({ logger: false });
	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			forbidNonWhitelisted: true,
			transform: true,
		}),
	);
	app.useGlobalFilters(new HttpExceptionFilter());
	await app.init();
	return app;
}

/**
 * POST to a table route as the given principal.
 */
export function act(
	app: INestApplication,
	principal: string,
	tableId: string,
	operation: string,
	body: object = {},
) {
	return request(app.getHttpServer())
		.post(`/api/v1/tables/${tableId}/${operation}`)
		.set("X-Principal", principal)
		.send(body);
}
