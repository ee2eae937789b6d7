/**
 * Phase State Machine
 *
 * A generic, synchronous state machine over ordered phases. It holds no
 * current state of its own: callers keep the state on their records and ask
 * the machine whether, and where, an action moves it.
 */

import {
	ActionResult,
	ContractError,
	StateDefinition,
	StateMachineConfig,
	StateTransition,
} from "./types.js";

/**
 * Generic machine for validating transitions between ordered phases.
 *
 * @example
 * ```typescript
 * type Light = "red" | "green";
 * type Switch = "go" | "stop";
 *
 * const machine = new PhaseMachine<Light, Switch>({
 *   initialState: "red",
 *   states: [
 *     { name: "red", allowedActions: ["go"], order: 0 },
 *     { name: "green", allowedActions: ["stop"], order: 1 },
 *   ],
 *   transitions: [
 *     { from: "red", action: "go", to: "green" },
 *     { from: "green", action: "stop", to: "red" },
 *   ],
 * });
 *
 * machine.next("red", "go").newState; // "green"
 * ```
 */
export class PhaseMachine<TState extends string, TAction extends string> {
	private readonly config: StateMachineConfig<TState, TAction>;
	private readonly stateMap: Map<TState, StateDefinition<TState, TAction>>;
	private readonly transitionMap: Map<string, StateTransition<TState, TAction>>;

	constructor(config: StateMachineConfig<TState, TAction>) {
		this.config = config;

		this.stateMap = new Map();
		for (const state of config.states) {
			this.stateMap.set(state.name, state);
		}
		if (!this.stateMap.has(config.initialState)) {
			throw new ContractError(
				`Unknown initial state: ${config.initialState}`,
				"UNKNOWN_STATE",
			);
		}

		this.transitionMap = new Map();
		for (const transition of config.transitions) {
			const froms = Array.isArray(transition.from)
				? transition.from
				: [transition.from];
			for (const from of froms) {
				this.transitionMap.set(`${from}:${transition.action}`, transition);
			}
		}
	}

	get initialState(): TState {
		return this.config.initialState;
	}

	/**
	 * Get the definition of a state.
	 */
	getStateDefinition(state: TState): StateDefinition<TState, TAction> {
		const definition = this.stateMap.get(state);
		if (!definition) {
			throw new ContractError(`Unknown state: ${state}`, "UNKNOWN_STATE", {
				state,
				validStates: this.getAllStates(),
			});
		}
		return definition;
	}

	/**
	 * Check if an action is allowed from the given state.
	 */
	canPerform(state: TState, action: TAction): boolean {
		const definition = this.stateMap.get(state);
		return definition?.allowedActions.includes(action) ?? false;
	}

	getAllowedActions(state: TState): TAction[] {
		return this.stateMap.get(state)?.allowedActions ?? [];
	}

	/**
	 * Apply an action to a state.
	 *
	 * @throws ContractError if the action is not allowed or has no transition
	 */
	next(state: TState, action: TAction): ActionResult<TState, TAction> {
		if (!this.canPerform(state, action)) {
			throw new ContractError(
				`Action "${action}" is not allowed from state "${state}"`,
				"ACTION_NOT_ALLOWED",
				{ action, state, allowedActions: this.getAllowedActions(state) },
			);
		}

		const transition = this.transitionMap.get(`${state}:${action}`);
		if (!transition) {
			throw new ContractError(
				`No transition found for action "${action}" from state "${state}"`,
				"TRANSITION_NOT_FOUND",
				{ action, state },
			);
		}

		return { previousState: state, newState: transition.to, action };
	}

	/**
	 * Compare two states by their position in the forward ordering.
	 */
	compare(a: TState, b: TState): number {
		return this.getStateDefinition(a).order - this.getStateDefinition(b).order;
	}

	/**
	 * Earliest of the given states; the initial state when none are given.
	 */
	earliest(states: TState[]): TState {
		if (states.length === 0) return this.config.initialState;
		return states.reduce((min, s) => (this.compare(s, min) < 0 ? s : min));
	}

	/**
	 * Check whether `a` is exactly one step past `b` along a transition.
	 */
	isOneStepAhead(a: TState, b: TState): boolean {
		return this.config.transitions.some((t) => {
			const froms = Array.isArray(t.from) ? t.from : [t.from];
			return froms.includes(b) && t.to === a && this.compare(a, b) > 0;
		});
	}

	getAllStates(): TState[] {
		return Array.from(this.stateMap.keys());
	}

	getConfig(): StateMachineConfig<TState, TAction> {
		return this.config;
	}
}

/**
 * Helper to create a state definition.
 */
export function createState<TState extends string, TAction extends string>(
	name: TState,
	order: number,
	allowedActions: TAction[],
	options: { description?: string } = {},
): StateDefinition<TState, TAction> {
	return {
		name,
		order,
		allowedActions,
		description: options.description,
	};
}

/**
 * Helper to create a state transition.
 */
export function createTransition<TState extends string, TAction extends string>(
	from: TState | TState[],
	action: TAction,
	to: TState,
): StateTransition<TState, TAction> {
	return { from, action, to };
}
