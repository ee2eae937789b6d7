import { ContractError } from "../../contracts/index.js";
import { globalPhase, playerPhases } from "./duel-state-machine.js";
import { createPristineSession } from "./duel-session.js";

describe("playerPhases", () => {
	it("walks a player through a full game", () => {
		expect(playerPhases.next("register", "join").newState).toBe("bid");
		expect(playerPhases.next("bid", "commit").newState).toBe("reveal");
		expect(playerPhases.next("reveal", "reveal").newState).toBe("withdraw");
		expect(playerPhases.next("withdraw", "withdraw").newState).toBe("register");
	});

	it("rejects actions the phase does not allow", () => {
		expect(() => playerPhases.next("register", "commit")).toThrow(ContractError);
		expect(playerPhases.canPerform("reveal", "quit")).toBe(false);
		expect(playerPhases.canPerform("bid", "quit")).toBe(true);
	});

	it("lets any seated phase forfeit back to a free slot", () => {
		for (const phase of ["bid", "reveal", "withdraw"] as const) {
			expect(playerPhases.next(phase, "forfeit").newState).toBe("register");
		}
		expect(() => playerPhases.next("register", "forfeit")).toThrow(ContractError);
	});

	it("orders phases", () => {
		expect(playerPhases.earliest(["withdraw", "reveal"])).toBe("reveal");
		expect(playerPhases.earliest([])).toBe("register");
		expect(playerPhases.compare("bid", "withdraw")).toBeLessThan(0);
	});

	it("detects a player exactly one step ahead", () => {
		expect(playerPhases.isOneStepAhead("reveal", "bid")).toBe(true);
		expect(playerPhases.isOneStepAhead("withdraw", "reveal")).toBe(true);
		expect(playerPhases.isOneStepAhead("withdraw", "bid")).toBe(false);
		expect(playerPhases.isOneStepAhead("register", "withdraw")).toBe(false);
		expect(playerPhases.isOneStepAhead("bid", "bid")).toBe(false);
	});
});

describe("globalPhase", () => {
	it("is register while no match runs", () => {
		const state = createPristineSession();
		state.slots[0] = { ...state.slots[0], identity: "alice", phase: "bid" };
		expect(globalPhase(state)).toBe("register");
	});

	it("follows the slowest occupied slot", () => {
		const state = createPristineSession();
		state.inProgress = true;
		state.slots[0] = { ...state.slots[0], identity: "alice", phase: "withdraw" };
		state.slots[1] = { ...state.slots[1], identity: "bob", phase: "reveal" };
		expect(globalPhase(state)).toBe("reveal");

		state.slots[1] = { ...state.slots[1], identity: null, phase: "register" };
		expect(globalPhase(state)).toBe("withdraw");
	});
});
