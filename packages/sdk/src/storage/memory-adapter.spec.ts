import { createPristineSession } from "../modules/duel/duel-session.js";
import { MemorySessionStore } from "./memory-adapter.js";
import { StoredSession } from "./types.js";

function stored(id: string, updatedAt: number, inProgress: boolean): StoredSession {
	const state = createPristineSession();
	state.inProgress = inProgress;
	return {
		metadata: { id, createdAt: 0, updatedAt, version: 1 },
		state,
	};
}

describe("MemorySessionStore", () => {
	it("returns copies that callers cannot mutate", async () => {
		const store = new MemorySessionStore();
		const session = stored("t1", 1, false);
		await store.save("t1", session);
		session.state.bank = 999;

		const loaded = await store.load("t1");
		expect(loaded?.state.bank).toBe(0);
		if (loaded) loaded.state.slots[0].identity = "mallory";
		expect((await store.load("t1"))?.state.slots[0].identity).toBeNull();
	});

	it("filters, sorts and pages", async () => {
		const store = new MemorySessionStore();
		await store.save("a", stored("a", 1, true));
		await store.save("b", stored("b", 3, false));
		await store.save("c", stored("c", 2, true));

		const running = await store.list({ inProgress: true });
		expect(running.map((s) => s.metadata.id)).toEqual(["c", "a"]);

		const page = await store.list({ sortOrder: "asc", offset: 1, limit: 1 });
		expect(page.map((s) => s.metadata.id)).toEqual(["c"]);
	});

	it("deletes sessions", async () => {
		const store = new MemorySessionStore();
		await store.save("a", stored("a", 1, false));
		expect(await store.exists("a")).toBe(true);
		await store.delete("a");
		expect(await store.exists("a")).toBe(false);
		expect(await store.load("a")).toBeNull();
		expect(store.size()).toBe(0);
	});
});
