/**
 * State or trigger identity. Compared with `===` and used as a Map key, so both
 * string and numeric enums fit.
 */
export type Identity = string | number;

/**
 * Maps every trigger to the argument tuple(s) it may be fired with.
 * A trigger fired with different signatures ("overloads") maps to a union of tuples.
 *
 * @example
 * ```typescript
 * type Params = { compare: [number, number]; reset: [] };
 * ```
 */
export type TriggerParams<TTrigger extends Identity> = Record<TTrigger, unknown[]>;

/**
 * Function type whose parameters are checked bivariantly, so callbacks typed
 * against concrete argument tuples can be stored side by side.
 */
// prettier-ignore
export type AnyArgsFn<R> = { bivarianceHack(...args: unknown[]): R }["bivarianceHack"];

/** Zero-argument predicate gating a trigger action. */
export type Guard = () => boolean;

/**
 * A resolved trigger registration.
 *
 * Every kind may carry a `guard`; a guarded entry is the "conditional" variant
 * of the same kind. `dynamic` and `internal` entries carry the `arity` of their
 * callback, which is their argument signature when matching a fire.
 */
export type TriggerAction<TState extends Identity> =
	| { kind: "transition"; destination: TState; guard?: Guard }
	| {
			kind: "dynamic";
			select: AnyArgsFn<TState>;
			arity: number;
			guard?: Guard;
	  }
	| { kind: "ignore"; guard?: Guard }
	| {
			kind: "internal";
			action: AnyArgsFn<void>;
			arity: number;
			guard?: Guard;
	  };

/** Describes the transition being executed, passed to plain entry/exit callbacks. */
export type Transition<TState extends Identity, TTrigger extends Identity> = {
	source: TState;
	destination: TState;
	trigger: TTrigger;
	args: readonly unknown[];
	isReentry: boolean;
};

/** Plain (untyped) entry or exit callback. */
export type StateCallback<TState extends Identity, TTrigger extends Identity> = (
	transition: Transition<TState, TTrigger>
) => void;

/**
 * Logger interface compatible with console.
 * All methods accept variadic arguments and return a string.
 */
export interface Logger {
	debug: (...args: unknown[]) => string;
	log: (...args: unknown[]) => string;
	warn: (...args: unknown[]) => string;
	error: (...args: unknown[]) => string;
}
