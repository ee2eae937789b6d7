/**
 * Contracts module - Phase state machines
 */

// Types
export type {
	StateDefinition,
	StateTransition,
	StateMachineConfig,
	ActionResult,
} from "./types.js";

export { ContractError } from "./types.js";

// State machine
export {
	PhaseMachine,
	createState,
	createTransition,
} from "./state-machine.js";
