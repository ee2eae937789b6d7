import { ContractError } from "../contracts/index.js";
import { ManualClock } from "./manual-clock.js";
import { SystemTickClock } from "./system-tick-clock.js";

describe("ManualClock", () => {
	it("advances and refuses to go back", () => {
		const clock = new ManualClock(100);
		expect(clock.advance(26)).toBe(126);
		clock.set(130);
		expect(clock.now()).toBe(130);
		expect(() => clock.set(129)).toThrow(ContractError);
		expect(() => clock.advance(-1)).toThrow(ContractError);
	});
});

describe("SystemTickClock", () => {
	it("counts whole ticks since genesis", () => {
		let ms = 1_000;
		const clock = new SystemTickClock(100, 1_000, () => ms);
		expect(clock.now()).toBe(0);
		ms = 1_099;
		expect(clock.now()).toBe(0);
		ms = 1_250;
		expect(clock.now()).toBe(2);
	});

	it("never decreases when wall time steps back", () => {
		let ms = 5_000;
		const clock = new SystemTickClock(1_000, 0, () => ms);
		expect(clock.now()).toBe(5);
		ms = 2_000;
		expect(clock.now()).toBe(5);
	});

	it("rejects a non-positive tick length", () => {
		expect(() => new SystemTickClock(0)).toThrow(ContractError);
	});
});
