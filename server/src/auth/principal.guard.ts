import {
	CanActivate,
	ExecutionContext,
	Injectable,
	UnauthorizedException,
} from "@nestjs/common";
import type { Request } from "express";

export const PRINCIPAL_HEADER = "x-principal";

const PRINCIPAL_PATTERN = /^[A-Za-z0-9._:@-]{1,128}$/;

export type PrincipalRequest = Request & { principal?: string };

/**
 * Identifies the caller from the `X-Principal` header. Authentication of
 * the principal itself happens upstream of this service.
 */
@Injectable()
export class PrincipalGuard implements CanActivate {
	canActivate(context: ExecutionContext): boolean {
		const req = context.switchToHttp().getRequest<PrincipalRequest>();
		const header = req.header(PRINCIPAL_HEADER)?.trim();
		if (!header) {
			throw new UnauthorizedException("Missing X-Principal header");
		}
		if (!PRINCIPAL_PATTERN.test(header)) {
			throw new UnauthorizedException("Invalid X-Principal header");
		}
		req.principal = header;
		return true;
	}
}
