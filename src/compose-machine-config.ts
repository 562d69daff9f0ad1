import {
	keysOf,
	normalizeTransitionDef,
	type MachineConfig,
	type StateConfig,
	type TransitionDef,
} from "./machine.ts";
import type { StateCallback } from "./types.ts";

/**
 * A partial machine configuration fragment for composition.
 * All fields are optional to allow building configs piece by piece.
 * States can be partially defined - you don't need to define all states in each fragment.
 */
export type MachineConfigFragment<
	TState extends string,
	TTrigger extends string
> = {
	initial?: TState;
	states?: {
		[K in TState]?: StateConfig<TState, TTrigger>;
	};
};

/**
 * Options for composing machine configurations.
 */
export type ComposeMachineConfigOptions = {
	/**
	 * How to handle lifecycle hooks (onEntry, onExit) when multiple fragments
	 * define them for the same state.
	 *
	 * - 'replace': Later fragments override earlier ones (default)
	 * - 'compose': Chain hooks - all hooks run in fragment order
	 */
	hooks?: "replace" | "compose";

	/**
	 * How to handle conflicts for singular values: the machine's `initial`, and
	 * each state's `parent` and `initial`.
	 *
	 * - 'last-wins': Later fragments override earlier ones (default)
	 * - 'error': Throw an error if multiple fragments define different values
	 */
	onConflict?: "last-wins" | "error";

	/**
	 * How to merge transitions (on) when multiple fragments define
	 * handlers for the same trigger on the same state.
	 *
	 * - 'replace': Later fragments override earlier handlers (default)
	 * - 'prepend': Later fragment transitions are prepended (evaluated first)
	 * - 'append': Later fragment transitions are appended (evaluated last)
	 *
	 * In prepend/append modes, transitions are converted to arrays and
	 * concatenated. Guards are evaluated in array order.
	 */
	transitions?: "replace" | "prepend" | "append";
};

type HookCollector<TState extends string, TTrigger extends string> = {
	onEntry: StateCallback<TState, TTrigger>[];
	onExit: StateCallback<TState, TTrigger>[];
};

/**
 * Composes multiple machine configuration fragments into a single config.
 *
 * This allows building complex machines from reusable building blocks:
 * - Define a core configuration with common states
 * - Add feature branches (new substates, extra triggers) conditionally
 * - Share state definitions across different machine variants
 *
 * @example
 * ```typescript
 * const core = {
 *   initial: "IDLE",
 *   states: {
 *     IDLE: { on: { start: "RUNNING" } },
 *     RUNNING: { on: { stop: "IDLE" } },
 *   }
 * };
 *
 * const errorHandling = {
 *   states: {
 *     RUNNING: { on: { error: "FAILED" } },  // extends RUNNING
 *     FAILED: { on: { retry: "RUNNING", reset: "IDLE" } },
 *   }
 * };
 *
 * const config = composeMachineConfig([core, errorHandling]);
 * // Result: RUNNING now has both stop and error triggers
 * ```
 *
 * @param fragments - Array of config fragments (falsy values are filtered out)
 * @param options - Composition options
 * @returns A merged machine configuration
 */
export function composeMachineConfig<
	TState extends string,
	TTrigger extends string
>(
	fragments: (
		| MachineConfigFragment<TState, TTrigger>
		| false
		| null
		| undefined
	)[],
	options: ComposeMachineConfigOptions = {}
): MachineConfig<TState, TTrigger> {
	const {
		hooks = "replace",
		onConflict = "last-wins",
		transitions: transitionsMode = "replace",
	} = options;

	// Filter out falsy values (allows conditional fragments)
	const validFragments = fragments.filter(
		(f): f is MachineConfigFragment<TState, TTrigger> => Boolean(f)
	);

	if (validFragments.length === 0) {
		throw new Error("composeMachineConfig requires at least one valid fragment");
	}

	const pick = <T>(what: string, previous: T | undefined, next: T): T => {
		if (onConflict === "error" && previous !== undefined && previous !== next) {
			// prettier-ignore
			throw new Error(`Conflict: multiple fragments define different ${what} values: "${String(previous)}" vs "${String(next)}"`);
		}
		return next;
	};

	let initial: TState | undefined;

	// Merged states, filled in fragment order
	const mergedStates: Partial<Record<TState, StateConfig<TState, TTrigger>>> =
		{};

	// Track hooks for composition mode
	const hookCollectors: Partial<Record<TState, HookCollector<TState, TTrigger>>> =
		{};

	for (const fragment of validFragments) {
		if (fragment.initial !== undefined) {
			initial = pick("'initial'", initial, fragment.initial);
		}

		const fragmentStates: NonNullable<
			MachineConfigFragment<TState, TTrigger>["states"]
		> = fragment.states ?? {};
		for (const state of keysOf<TState>(fragmentStates)) {
			const config = fragmentStates[state];
			if (!config) continue;

			const merged: StateConfig<TState, TTrigger> = mergedStates[state] ?? {
				on: {},
			};
			mergedStates[state] = merged;
			const collector: HookCollector<TState, TTrigger> = hookCollectors[
				state
			] ?? { onEntry: [], onExit: [] };
			hookCollectors[state] = collector;

			if (config.parent !== undefined) {
				// prettier-ignore
				merged.parent = pick(`'parent' (state "${state}")`, merged.parent, config.parent);
			}
			if (config.initial !== undefined) {
				// prettier-ignore
				merged.initial = pick(`'initial' (state "${state}")`, merged.initial, config.initial);
			}

			// Merge transitions (on)
			if (config.on) {
				const existingOn: Partial<Record<TTrigger, TransitionDef<TState>>> =
					merged.on ?? {};
				merged.on = existingOn;
				for (const trigger of keysOf<TTrigger>(config.on)) {
					const newDef = config.on[trigger];
					if (newDef === undefined) continue;
					const existingDef = existingOn[trigger];

					if (existingDef === undefined || transitionsMode === "replace") {
						existingOn[trigger] = newDef;
					} else {
						const existingArr = normalizeTransitionDef(existingDef);
						const newArr = normalizeTransitionDef(newDef);

						existingOn[trigger] =
							transitionsMode === "prepend"
								? [...newArr, ...existingArr] // new runs first
								: [...existingArr, ...newArr]; // existing runs first
					}
				}
			}

			// Handle hooks based on mode
			if (hooks === "compose") {
				if (config.onEntry) collector.onEntry.push(config.onEntry);
				if (config.onExit) collector.onExit.push(config.onExit);
			} else {
				if (config.onEntry) merged.onEntry = config.onEntry;
				if (config.onExit) merged.onExit = config.onExit;
			}
		}
	}

	// In compose mode, create composed hook functions
	if (hooks === "compose") {
		for (const state of keysOf(hookCollectors)) {
			const collectors = hookCollectors[state];
			const merged = mergedStates[state];
			if (!collectors || !merged) continue;
			if (collectors.onEntry.length > 0) {
				merged.onEntry = composeHooks(collectors.onEntry);
			}
			if (collectors.onExit.length > 0) {
				merged.onExit = composeHooks(collectors.onExit);
			}
		}
	}

	if (initial === undefined) {
		throw new Error(
			"composeMachineConfig: no 'initial' state defined in any fragment"
		);
	}

	return { initial, states: mergedStates };
}

/**
 * Creates a single hook function that runs multiple hooks in sequence.
 */
function composeHooks<TState extends string, TTrigger extends string>(
	hooks: StateCallback<TState, TTrigger>[]
): StateCallback<TState, TTrigger> {
	return (transition) => {
		for (const hook of hooks) {
			hook(transition);
		}
	};
}
