/**
 * Contract layer types
 *
 * Types for defining phase state machines shared by game modules.
 */

/**
 * Generic state definition for a state machine.
 */
export interface StateDefinition<TState extends string, TAction extends string> {
	/** The state name */
	name: TState;
	/** Actions allowed from this state */
	allowedActions: TAction[];
	/** Position in the forward ordering of states, used for "ahead of" checks */
	order: number;
	/** Human-readable description of this state */
	description?: string;
}

/**
 * State transition definition.
 */
export interface StateTransition<
	TState extends string,
	TAction extends string,
> {
	/** Source state(s) for this transition */
	from: TState | TState[];
	/** Action that triggers this transition */
	action: TAction;
	/** Target state after transition */
	to: TState;
}

/**
 * State machine configuration.
 */
export interface StateMachineConfig<
	TState extends string,
	TAction extends string,
> {
	/** State every new subject starts in */
	initialState: TState;
	/** All possible states */
	states: StateDefinition<TState, TAction>[];
	/** All possible transitions */
	transitions: StateTransition<TState, TAction>[];
}

/**
 * Result of applying an action to a state.
 */
export interface ActionResult<TState extends string, TAction extends string> {
	previousState: TState;
	newState: TState;
	action: TAction;
}

/**
 * Error thrown during contract operations.
 */
export class ContractError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "ContractError";
	}
}
