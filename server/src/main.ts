import "reflect-metadata";
import { Logger, ValidationPipe } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import * as dotenv from "dotenv";
import { AppModule } from "./app.module";
import { HttpExceptionFilter } from "./common/filters/http-exception.filter";

dotenv.config();

async function bootstrap() {
	const app = await NestFactory.create(AppModule);

	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			forbidNonWhitelisted: true,
			transform: true,
		}),
	);
	app.useGlobalFilters(new HttpExceptionFilter());
	app.enableCors();
	app.enableShutdownHooks();

	const config = new DocumentBuilder()
		.setTitle("Parity Duel API")
		.setDescription(
			"Callers identify with the `X-Principal` header; admin routes use Basic auth",
		)
		.setVersion("0.1.0")
		.addBasicAuth()
		.build();
	const doc = SwaggerModule.createDocument(app, config);
	SwaggerModule.setup("api/v1/docs", app, doc, {
		swaggerOptions: {
			tagsSorter: "alpha",
			operationsSorter: "alpha",
		},
	});

	const port = parseInt(process.env.PORT ?? "3000", 10);
	await app.listen(port, "0.0.0.0");
	new Logger("Bootstrap").log(`API listening on http://0.0.0.0:${port}`);
}

bootstrap().catch((err: unknown) => {
	new Logger("Bootstrap").error("Failed to start", err instanceof Error ? err.stack : String(err));
	process.exit(1);
});
