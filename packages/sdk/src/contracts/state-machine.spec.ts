import { ContractError } from "./types.js";
import { PhaseMachine, createState, createTransition } from "./state-machine.js";

type Light = "red" | "amber" | "green";
type Switch = "go" | "slow" | "stop";

function lights(): PhaseMachine<Light, Switch> {
	return new PhaseMachine<Light, Switch>({
		initialState: "red",
		states: [
			createState("red", 0, ["go"]),
			createState("green", 1, ["slow", "stop"]),
			createState("amber", 2, ["stop"]),
		],
		transitions: [
			createTransition("red", "go", "green"),
			createTransition("green", "slow", "amber"),
			createTransition(["green", "amber"], "stop", "red"),
		],
	});
}

describe("PhaseMachine", () => {
	it("follows declared transitions", () => {
		const machine = lights();
		expect(machine.next("red", "go")).toEqual({
			previousState: "red",
			newState: "green",
			action: "go",
		});
		expect(machine.next("amber", "stop").newState).toBe("red");
	});

	it("reports disallowed actions with their code", () => {
		let caught: unknown;
		try {
			lights().next("red", "stop");
		} catch (err) {
			caught = err;
		}
		expect(caught).toBeInstanceOf(ContractError);
		expect(caught).toMatchObject({
			code: "ACTION_NOT_ALLOWED",
			details: { action: "stop", state: "red", allowedActions: ["go"] },
		});
	});

	it("reports allowed actions without a transition", () => {
		const machine = new PhaseMachine<Light, Switch>({
			initialState: "red",
			states: [createState("red", 0, ["go"])],
			transitions: [],
		});
		expect(() => machine.next("red", "go")).toThrow(
			'No transition found for action "go" from state "red"',
		);
	});

	it("rejects an unknown initial state", () => {
		expect(
			() =>
				new PhaseMachine<Light, Switch>({
					initialState: "amber",
					states: [createState("red", 0, ["go"])],
					transitions: [],
				}),
		).toThrow("Unknown initial state: amber");
	});

	it("compares by order", () => {
		const machine = lights();
		expect(machine.earliest(["amber", "green"])).toBe("green");
		expect(machine.isOneStepAhead("green", "red")).toBe(true);
		expect(machine.isOneStepAhead("red", "amber")).toBe(false);
		expect(machine.getAllStates()).toEqual(["red", "green", "amber"]);
	});
});
