import type { Identity } from "./types.ts";

/**
 * Base class of every error thrown by the machine.
 * Carries the state (and trigger, where one is involved) the error relates to.
 */
export class HsmError extends Error {
	constructor(
		message: string,
		public readonly state: Identity,
		public readonly trigger?: Identity
	) {
		super(message);
		this.name = "HsmError";
	}
}

/**
 * Thrown at configuration time: duplicate `substateOf`/`initialTransition`,
 * a hierarchy cycle, or a transition/initial substate pointing at the state itself.
 */
export class ConfigurationError extends HsmError {
	constructor(message: string, state: Identity, trigger?: Identity) {
		super(message, state, trigger);
		this.name = "ConfigurationError";
	}
}

/** A state identity was looked up but never passed to `configure()`. */
export class UnknownStateError extends HsmError {
	constructor(state: Identity) {
		super(`State "${String(state)}" is not configured`, state);
		this.name = "UnknownStateError";
	}
}

/** `fire()` found no action up the hierarchy and no unhandled-trigger hook is set. */
export class UnhandledTriggerError extends HsmError {
	constructor(state: Identity, trigger: Identity) {
		super(
			`Trigger "${String(trigger)}" is not handled in state "${String(state)}"`,
			state,
			trigger
		);
		this.name = "UnhandledTriggerError";
	}
}

/**
 * A declared initial substate was reached whose own parent is not the
 * declaring state.
 */
export class InitialSubstateInvariantError extends HsmError {
	constructor(
		state: Identity,
		public readonly substate: Identity
	) {
		// prettier-ignore
		super(`Initial substate "${String(substate)}" of "${String(state)}" is not configured as its substate`, state);
		this.name = "InitialSubstateInvariantError";
	}
}
