import { Injectable, Logger, NestMiddleware } from "@nestjs/common";
import type { NextFunction, Request, Response } from "express";

/**
 * Logs method, path, status and latency of every request once the
 * response is sent.
 */
@Injectable()
export class RequestLoggingMiddleware implements NestMiddleware {
	private readonly logger = new Logger("HTTP");

	use(req: Request, res: Response, next: NextFunction) {
		const { method, originalUrl } = req;
		const start = Date.now();

		res.on("finish", () => {
			const ms = Date.now() - start;
			const line = `${method} ${originalUrl} → ${res.statusCode} (+${ms}ms)`;
			if (res.statusCode >= 500) {
				this.logger.warn(line);
			} else {
				this.logger.log(line);
			}
		});

		next();
	}
}
