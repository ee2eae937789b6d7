import type { Type } from "@nestjs/common";
import { getSchemaPath } from "@nestjs/swagger";

export type ApiEnvelope<T> = {
	data: T;
};

export type PageMeta = {
	total: number;
	nextCursor?: string;
};

export type ApiPaginatedEnvelope<T> = ApiEnvelope<T> & {
	meta: PageMeta;
};

export function envelope<T>(data: T): ApiEnvelope<T> {
	return { data };
}

export function paginatedEnvelope<T>(
	data: T,
	meta: PageMeta,
): ApiPaginatedEnvelope<T> {
	return { data, meta };
}

/**
 * Keyset cursor: the page continues below `idBefore`.
 */
export type Cursor = {
	idBefore?: number;
};

export const emptyCursor: Cursor = {};

export function cursorToString(id: number): string {
	return Buffer.from(`id:${id}`, "utf8").toString("base64url");
}

export function cursorFromString(value: string): Cursor {
	const decoded = Buffer.from(value, "base64url").toString("utf8");
	const match = /^id:(\d+)$/.exec(decoded);
	if (!match) {
		throw new Error(`Malformed cursor ${value}`);
	}
	return { idBefore: Number(match[1]) };
}

export function getSchemaPathForDto(dto: Type<unknown>) {
	return {
		type: "object",
		properties: {
			data: { $ref: getSchemaPath(dto) },
		},
	};
}

export function getSchemaPathForPaginatedDto(dto: Type<unknown>) {
	return {
		type: "object",
		properties: {
			data: { type: "array", items: { $ref: getSchemaPath(dto) } },
			meta: {
				type: "object",
				properties: {
					total: { type: "integer" },
					nextCursor: { type: "string", nullable: true },
				},
			},
		},
	};
}
