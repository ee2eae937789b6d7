/**
 * Storage module - Pluggable session persistence
 */

// Types
export type {
	SessionMetadata,
	StoredSession,
	QueryOptions,
	SessionStore,
} from "./types.js";

export { StorageError } from "./types.js";

// Reference implementations
export { MemorySessionStore } from "./memory-adapter.js";
