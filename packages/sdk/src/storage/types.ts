/**
 * Storage Adapter Types
 *
 * Defines the interface for pluggable session persistence. Hosts bring
 * their own backend (SQLite, Postgres, in-memory, etc.) by implementing it.
 */

import { SessionState } from "../modules/duel/types.js";

/**
 * Bookkeeping stored alongside a session.
 */
export interface SessionMetadata {
	/** Table identifier */
	id: string;
	/** Unix timestamp ms */
	createdAt: number;
	/** Unix timestamp ms */
	updatedAt: number;
	/** Incremented on each save */
	version: number;
}

/**
 * Session as it sits in storage.
 */
export interface StoredSession {
	metadata: SessionMetadata;
	state: SessionState;
}

/**
 * Query options for listing sessions.
 */
export interface QueryOptions {
	/** Only sessions with (true) or without (false) a running match */
	inProgress?: boolean;
	/** Maximum number of results */
	limit?: number;
	/** Number of results to skip */
	offset?: number;
	/** Sort by last update */
	sortOrder?: "asc" | "desc";
}

/**
 * Storage adapter interface for sessions.
 *
 * @example
 * ```typescript
 * class RedisSessionStore implements SessionStore {
 *   constructor(private redis: Redis) {}
 *
 *   async save(id: string, session: StoredSession): Promise<void> {
 *     await this.redis.set(`session:${id}`, JSON.stringify(session));
 *   }
 *
 *   // ... other methods
 * }
 * ```
 */
export interface SessionStore {
	/**
	 * Create or replace the session stored under `id`.
	 */
	save(id: string, session: StoredSession): Promise<void>;

	/**
	 * @returns The session if found, null otherwise
	 */
	load(id: string): Promise<StoredSession | null>;

	/**
	 * Succeeds even if the session doesn't exist.
	 */
	delete(id: string): Promise<void>;

	exists(id: string): Promise<boolean>;

	list(options?: QueryOptions): Promise<StoredSession[]>;
}

/**
 * Error thrown by storage operations.
 */
export class StorageError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "StorageError";
	}
}
