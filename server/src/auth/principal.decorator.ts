import {
	createParamDecorator,
	ExecutionContext,
	UnauthorizedException,
} from "@nestjs/common";
import type { PrincipalRequest } from "./principal.guard";

/**
 * The caller resolved by PrincipalGuard.
 */
export const Principal = createParamDecorator(
	(_: unknown, ctx: ExecutionContext): string => {
		const req = ctx.switchToHttp().getRequest<PrincipalRequest>();
		if (!req.principal) {
			throw new UnauthorizedException("No principal on request");
		}
		return req.principal;
	},
);
