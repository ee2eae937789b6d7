/**
 * In-Memory Session Store
 *
 * Data is lost when the process exits.
 */

import { cloneSession } from "../modules/duel/duel-session.js";
import {
	QueryOptions,
	SessionStore,
	StoredSession,
} from "./types.js";

function copy(session: StoredSession): StoredSession {
	return {
		metadata: { ...session.metadata },
		state: cloneSession(session.state),
	};
}

/**
 * In-memory session store for tests, simulations and single-process hosts.
 *
 * @example
 * ```typescript
 * const store = new MemorySessionStore();
 * await store.save("table-1", { metadata, state: duel.snapshot() });
 * const stored = await store.load("table-1");
 * ```
 */
export class MemorySessionStore implements SessionStore {
	private sessions: Map<string, StoredSession> = new Map();

	async save(id: string, session: StoredSession): Promise<void> {
		// Copy to prevent external mutations
		this.sessions.set(id, copy(session));
	}

	async load(id: string): Promise<StoredSession | null> {
		const session = this.sessions.get(id);
		return session ? copy(session) : null;
	}

	async delete(id: string): Promise<void> {
		this.sessions.delete(id);
	}

	async exists(id: string): Promise<boolean> {
		return this.sessions.has(id);
	}

	async list(options?: QueryOptions): Promise<StoredSession[]> {
		let sessions = Array.from(this.sessions.values());

		if (options?.inProgress !== undefined) {
			sessions = sessions.filter(
				(s) => s.state.inProgress === options.inProgress,
			);
		}

		const direction = options?.sortOrder === "asc" ? 1 : -1;
		sessions.sort(
			(a, b) => direction * (a.metadata.updatedAt - b.metadata.updatedAt),
		);

		const offset = options?.offset ?? 0;
		const limit = options?.limit ?? sessions.length;
		return sessions.slice(offset, offset + limit).map(copy);
	}

	clear(): void {
		this.sessions.clear();
	}

	size(): number {
		return this.sessions.size;
	}
}
