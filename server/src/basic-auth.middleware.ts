import { Injectable, NestMiddleware } from "@nestjs/common";
import type { NextFunction, Request, Response } from "express";
import { ConfigService } from "@nestjs/config";
import { timingSafeEqual as constantTimeEqual } from "node:crypto";

/**
 * Guards the administrator routes with HTTP Basic credentials taken from
 * ADMIN_BASIC_USER and ADMIN_BASIC_PASS. Without configured credentials
 * every request is refused.
 */
@Injectable()
export class BasicAuthMiddleware implements NestMiddleware {
	constructor(private readonly config: ConfigService) {}

	use(req: Request, res: Response, next: NextFunction) {
		const header = req.header("authorization");
		if (!header || !header.startsWith("Basic ")) {
			res.setHeader("WWW-Authenticate", 'Basic realm="Restricted"');
			return res.status(401).json({ error: "Authentication required", statusCode: 401 });
		}

		const decoded = Buffer.from(
			header.slice("Basic ".length).trim(),
			"base64",
		).toString("utf8");
		const sep = decoded.indexOf(":");
		const username = sep >= 0 ? decoded.slice(0, sep) : "";
		const password = sep >= 0 ? decoded.slice(sep + 1) : "";

		const expectedUser = this.config.get<string>("ADMIN_BASIC_USER") ?? "";
		const expectedPass = this.config.get<string>("ADMIN_BASIC_PASS") ?? "";

		const ok =
			expectedUser.length > 0 &&
			expectedPass.length > 0 &&
			timingSafeEqual(username, expectedUser) &&
			timingSafeEqual(password, expectedPass);
		if (!ok) {
			res.setHeader("WWW-Authenticate", 'Basic realm="Restricted"');
			return res.status(401).json({ error: "Unauthorized", statusCode: 401 });
		}

		return next();
	}
}

function timingSafeEqual(a: string, b: string): boolean {
	const ab = Buffer.from(a);
	const bb = Buffer.from(b);
	if (ab.length !== bb.length) {
		// burn comparable time on a same-length buffer
		constantTimeEqual(ab, Buffer.alloc(ab.length));
		return false;
	}
	return constantTimeEqual(ab, bb);
}
