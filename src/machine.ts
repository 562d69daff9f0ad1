import { createPubSub } from "@marianmeres/pubsub";
import {
	InitialSubstateInvariantError,
	UnhandledTriggerError,
	UnknownStateError,
} from "./errors.ts";
import { StateNode, type StateRegistry } from "./state-node.ts";
import type {
	AnyArgsFn,
	Guard,
	Identity,
	Logger,
	StateCallback,
	Transition,
	TriggerAction,
	TriggerParams,
} from "./types.ts";

/**
 * Default console-based logger that wraps console methods.
 * Returns the first argument as a string (or empty string if no args).
 */
const defaultLogger: Logger = {
	debug: (...args: unknown[]) => {
		console.debug(...args);
		return String(args[0] ?? "");
	},
	log: (...args: unknown[]) => {
		console.log(...args);
		return String(args[0] ?? "");
	},
	warn: (...args: unknown[]) => {
		console.warn(...args);
		return String(args[0] ?? "");
	},
	error: (...args: unknown[]) => {
		console.error(...args);
		return String(args[0] ?? "");
	},
};

/** Constructor options */
export type MachineOptions = {
	/** Enable debug logging (default: false) */
	debug?: boolean;
	/** Custom logger implementing Logger interface (default: console) */
	logger?: Logger;
};

/**
 * Transition configuration object used by the declarative config.
 * Each shape maps onto one `StateNode` registration method:
 * - `{ target }` - `permit` (or `permitReentry` when target is the state itself)
 * - `{ select }` - `permitDynamic`
 * - `{ action }` - `internalTransition`
 * - `{ ignore: true }` - `ignore`
 *
 * Adding a `guard` selects the conditional variant. `arity` is passed through
 * to `select` and `action` registrations.
 */
export type TransitionObj<TState> =
	| { target: TState; guard?: Guard }
	| { select: AnyArgsFn<TState>; arity?: number; guard?: Guard }
	| { action: AnyArgsFn<void>; arity?: number; guard?: Guard }
	| { ignore: true; guard?: Guard };

/**
 * Transition configuration definition.
 * Can be specified in three forms:
 * - Simple string: target state name (e.g., `"IDLE"`)
 * - Single object (see `TransitionObj`)
 * - Array of objects: multiple guarded entries evaluated in order
 */
export type TransitionDef<TState> =
	| TState
	| TransitionObj<TState>
	| TransitionObj<TState>[];

/** Declarative configuration of a single state. */
export type StateConfig<TState extends string, TTrigger extends string> = {
	parent?: TState;
	initial?: TState;
	on?: Partial<Record<TTrigger, TransitionDef<TState>>>;
	onEntry?: StateCallback<TState, TTrigger>;
	onExit?: StateCallback<TState, TTrigger>;
};

/**
 * Declarative machine configuration, an alternative to calling `configure()`
 * for each state. States only referenced (as initial state, parent, initial
 * substate or static target) are configured as bare states.
 */
export type MachineConfig<
	TState extends string,
	TTrigger extends string
> = MachineOptions & {
	initial: TState;
	states: { [K in TState]?: StateConfig<TState, TTrigger> };
};

/**
 * Published state data sent to subscribers.
 * Contains the current state and previous state (null if initial).
 */
export type PublishedState<TState> = {
	current: TState;
	previous: TState | null;
};

/** Normalizes a transition definition to its array form. */
export function normalizeTransitionDef<TState extends string>(
	def: TransitionDef<TState>
): TransitionObj<TState>[] {
	if (isTarget(def)) return [{ target: def }];
	return Array.isArray(def) ? def : [def];
}

function isTarget<TState extends string>(
	def: TransitionDef<TState>
): def is TState {
	return typeof def === "string";
}

/** Own keys of a record, typed as the record's key union. */
export function keysOf<K extends string>(
	record: Partial<Record<K, unknown>>
): K[] {
	return Object.keys(record).filter((key): key is K =>
		Object.hasOwn(record, key)
	);
}

/**
 * Factory function to create a machine from a declarative configuration.
 * All configuration errors are thrown here, not at the first `fire()`.
 *
 * @example
 * ```typescript
 * const machine = createMachine<"PLAY" | "EDIT" | "MOVE", "edit" | "play">({
 *   initial: "PLAY",
 *   states: {
 *     PLAY: { on: { edit: "EDIT" } },
 *     EDIT: { initial: "MOVE", on: { play: "PLAY" } },
 *     MOVE: { parent: "EDIT" },
 *   },
 * });
 * machine.fire("edit"); // -> "MOVE"
 * ```
 */
export function createMachine<TState extends string, TTrigger extends string>(
	config: MachineConfig<TState, TTrigger>
): Machine<TState, TTrigger> {
	const { initial, states, ...options } = config;
	const machine = new Machine<TState, TTrigger>(initial, options);
	const names = keysOf<TState>(states);

	// create all nodes first so hierarchy checks see the whole picture
	machine.configure(initial);
	for (const name of names) machine.configure(name);

	for (const name of names) {
		const stateConfig = states[name];
		if (!stateConfig) continue;
		const node = machine.configure(name);
		if (stateConfig.parent !== undefined) {
			machine.configure(stateConfig.parent);
			node.substateOf(stateConfig.parent);
		}
		if (stateConfig.initial !== undefined) {
			machine.configure(stateConfig.initial);
			node.initialTransition(stateConfig.initial);
		}
		if (stateConfig.onEntry) node.onEntry(stateConfig.onEntry);
		if (stateConfig.onExit) node.onExit(stateConfig.onExit);

		const on: Partial<Record<TTrigger, TransitionDef<TState>>> =
			stateConfig.on ?? {};
		for (const trigger of keysOf<TTrigger>(on)) {
			const def = on[trigger];
			if (def === undefined) continue;
			for (const t of normalizeTransitionDef(def)) {
				if ("target" in t) machine.configure(t.target);
				applyTransitionObj(node, trigger, t);
			}
		}
	}

	return machine;
}

function applyTransitionObj<TState extends string, TTrigger extends string>(
	node: StateNode<TState, TTrigger>,
	trigger: TTrigger,
	t: TransitionObj<TState>
): void {
	const { guard } = t;
	if ("target" in t) {
		if (t.target === node.state) {
			if (guard) node.permitReentryIf(trigger, guard);
			else node.permitReentry(trigger);
		} else if (guard) {
			node.permitIf(trigger, t.target, guard);
		} else {
			node.permit(trigger, t.target);
		}
	} else if ("select" in t) {
		if (guard) node.permitDynamicIf(trigger, t.select, guard, t.arity);
		else node.permitDynamic(trigger, t.select, t.arity);
	} else if ("action" in t) {
		if (guard) node.internalTransitionIf(trigger, guard, t.action, t.arity);
		else node.internalTransition(trigger, t.action, t.arity);
	} else if (guard) {
		node.ignoreIf(trigger, guard);
	} else {
		node.ignore(trigger);
	}
}

/**
 * A synchronous hierarchical state machine.
 *
 * States are configured through `configure()`, which lazily creates a
 * `StateNode` per state identity. `fire()` resolves the trigger on the current
 * state or, failing that, on its ancestors, then exits and enters the minimal set
 * of states around the lowest common ancestor of source and destination.
 *
 * **Execution order of an external transition:**
 * 1. exit callbacks, from the current state up to (not including) the common ancestor
 * 2. state changes (previous/current updated)
 * 3. `onTransitioned` hook
 * 4. entry callbacks, from below the common ancestor down to the destination,
 *    then down its chain of initial substates
 * 5. subscribers notified
 *
 * Ignored triggers and internal transitions run no callbacks and do not notify.
 *
 * **Note on reentrancy:** calling `fire()` from within a callback or subscriber
 * is not supported. Queue such triggers and fire them after `fire()` returns.
 *
 * @template TState - Union type of all state identities
 * @template TTrigger - Union type of all trigger identities
 * @template TParams - Argument tuple(s) per trigger, used to type `fire()` and
 * the argument-carrying registrations
 *
 * @example
 * ```typescript
 * const machine = new Machine<"OFF" | "ON", "switch">("OFF");
 * machine.configure("OFF").permit("switch", "ON");
 * machine.configure("ON").permit("switch", "OFF");
 *
 * machine.fire("switch"); // -> "ON"
 * ```
 */
export class Machine<
	TState extends Identity,
	TTrigger extends Identity,
	TParams extends TriggerParams<TTrigger> = TriggerParams<TTrigger>
> implements StateRegistry<TState, TTrigger, TParams>
{
	/** State the machine started in (and returns to on `reset()`) */
	readonly #initial: TState;

	/** Machine's previous state */
	#previous: TState | null = null;

	/** Machine's current state */
	#state: TState;

	/** Configured nodes, in configuration order */
	#states = new Map<TState, StateNode<TState, TTrigger, TParams>>();

	#onUnhandledTrigger: ((state: TState, trigger: TTrigger) => void) | undefined;

	#onTransitioned:
		| ((source: TState, destination: TState, trigger: TTrigger) => void)
		| undefined;

	/** Internal pub sub */
	#pubsub = createPubSub();

	/** Logger instance */
	#logger: Logger;

	/** Debug mode flag */
	#debug: boolean;

	/**
	 * Creates a new machine. The initial state does not need to be configured yet,
	 * but must be by the time it is queried or fired from. No entry callback runs
	 * for the initial state.
	 */
	constructor(initial: TState, options: MachineOptions = {}) {
		this.#debug = options.debug ?? false;
		this.#logger = options.logger ?? defaultLogger;
		this.#initial = initial;
		this.#state = initial;
		this.#debugLog(`Machine created with initial state "${String(initial)}"`);
	}

	/** Log debug message if debug mode is enabled */
	#debugLog(...args: unknown[]): void {
		if (this.#debug) {
			this.#logger.debug("[HSM]", ...args);
		}
	}

	/** Returns whether debug mode is enabled. */
	get debug(): boolean {
		return this.#debug;
	}

	/** Returns the logger instance used by this machine. */
	get logger(): Logger {
		return this.#logger;
	}

	/**
	 * Returns the current (innermost) state.
	 * This is a non-reactive getter; use `subscribe()` for reactive updates.
	 */
	get state(): TState {
		return this.#state;
	}

	/** Returns the state before the last external transition (null if none). */
	get previous(): TState | null {
		return this.#previous;
	}

	/** Returns all configured state identities, in configuration order. */
	get states(): TState[] {
		return [...this.#states.keys()];
	}

	/**
	 * Returns the node of `state`, creating it on first use.
	 * Repeated calls with the same identity return the same node.
	 */
	configure(state: TState): StateNode<TState, TTrigger, TParams> {
		let node = this.#states.get(state);
		if (!node) {
			node = new StateNode<TState, TTrigger, TParams>(state, this);
			this.#states.set(state, node);
		}
		return node;
	}

	/** @throws UnknownStateError if `state` was never configured */
	getNode(state: TState): StateNode<TState, TTrigger, TParams> {
		const node = this.#states.get(state);
		if (!node) throw new UnknownStateError(state);
		return node;
	}

	findNode(state: TState): StateNode<TState, TTrigger, TParams> | undefined {
		return this.#states.get(state);
	}

	/** Sets the hook invoked (instead of throwing) when a fired trigger is not handled. */
	onUnhandledTrigger(cb: (state: TState, trigger: TTrigger) => void): this {
		this.#onUnhandledTrigger = cb;
		return this;
	}

	/**
	 * Sets the hook invoked on every external transition, after the exit
	 * callbacks and before the entry callbacks.
	 */
	onTransitioned(
		cb: (source: TState, destination: TState, trigger: TTrigger) => void
	): this {
		this.#onTransitioned = cb;
		return this;
	}

	#notify() {
		this.#pubsub.publish("change", {
			current: this.#state,
			previous: this.#previous,
		});
	}

	/**
	 * Subscribes to state changes.
	 * The callback is invoked immediately with the current state and after every
	 * completed external transition (including reentries).
	 *
	 * @returns Unsubscriber function to stop receiving updates
	 */
	subscribe(cb: (data: PublishedState<TState>) => void): () => void {
		this.#debugLog("subscribe() called");
		const unsub = this.#pubsub.subscribe("change", cb);
		cb({ current: this.#state, previous: this.#previous });
		return unsub;
	}

	/**
	 * Finds the action handling `trigger` from the current state, walking up the
	 * ancestors.
	 */
	#resolve(
		trigger: TTrigger,
		args: readonly unknown[]
	): { action: TriggerAction<TState>; owner: TState } | undefined {
		let node: StateNode<TState, TTrigger, TParams> | undefined = this.getNode(
			this.#state
		);
		while (node) {
			const action = node.findAction(trigger, args);
			if (action) return { action, owner: node.state };
			node = node.parent === undefined ? undefined : this.getNode(node.parent);
		}
		return undefined;
	}

	/**
	 * Fires a trigger.
	 *
	 * Either the transition completes entirely (exits, hooks, entries including
	 * the initial substate cascade) or no state is changed at all (ignored,
	 * internal or unhandled trigger).
	 *
	 * @param trigger - The trigger identity
	 * @param args - Arguments for dynamic selectors, internal actions and typed
	 * entry/exit callbacks; their count must match those registrations exactly
	 * @returns The current state after the trigger was processed
	 * @throws UnhandledTriggerError if nothing handles the trigger and no
	 * `onUnhandledTrigger` hook is set
	 * @throws UnknownStateError if the destination or a state of its initial
	 * substate chain was never configured
	 * @throws InitialSubstateInvariantError if an initial substate is not a
	 * direct substate of the state declaring it
	 *
	 * @example
	 * ```typescript
	 * machine.fire("edit");
	 * machine.fire("compare", 1, 2);
	 * ```
	 */
	fire<K extends TTrigger>(trigger: K, ...args: TParams[K]): TState {
		const source = this.#state;
		this.#debugLog(
			`fire("${String(trigger)}") called from state "${String(source)}"`
		);

		const resolved = this.#resolve(trigger, args);
		if (!resolved) {
			this.#debugLog(`fire("${String(trigger)}") not handled`);
			if (this.#onUnhandledTrigger) {
				this.#onUnhandledTrigger(source, trigger);
				return this.#state;
			}
			throw new UnhandledTriggerError(source, trigger);
		}

		const { action, owner } = resolved;
		if (owner !== source) {
			this.#debugLog(
				`fire("${String(trigger)}") handled by ancestor "${String(owner)}"`
			);
		}

		if (action.kind === "ignore") {
			this.#debugLog(`fire("${String(trigger)}") ignored`);
			return this.#state;
		}

		// INTERNAL TRANSITION
		// only the action runs, no exit/entry and no notification
		if (action.kind === "internal") {
			this.#debugLog(`fire("${String(trigger)}") internal (no state change)`);
			action.action(...args);
			return this.#state;
		}

		const destination =
			action.kind === "dynamic" ? action.select(...args) : action.destination;

		// look up everything the walks reach before anything runs, so a bad
		// destination or initial substate chain changes nothing
		const sourceNode = this.getNode(source);
		const destinationNode = this.getNode(destination);
		this.#assertInitialChain(destinationNode);

		this.#debugLog(
			`fire("${String(trigger)}"): "${String(source)}" -> "${String(
				destination
			)}"`
		);

		const transition: Transition<TState, TTrigger> = {
			source,
			destination,
			trigger,
			args,
			isReentry: source === destination,
		};

		// 1. exit up to the common ancestor
		const top = this.#exit(
			sourceNode,
			destinationNode,
			transition.isReentry,
			transition
		);

		// 2. save previous and set new state
		this.#previous = source;
		this.#state = destination;

		// 3. transition hook
		this.#onTransitioned?.(source, destination, trigger);

		// 4. enter down to the destination (and its initial substates)
		this.#enter(top, destinationNode, false, transition);

		// 5. notify listeners
		this.#notify();

		return this.#state;
	}

	/** Checks the initial substate chain below `node`. */
	#assertInitialChain(node: StateNode<TState, TTrigger, TParams>): void {
		let current = node;
		while (current.initialSubstate !== undefined) {
			const substate = current.initialSubstate;
			const substateNode = this.getNode(substate);
			if (substateNode.parent !== current.state) {
				throw new InitialSubstateInvariantError(current.state, substate);
			}
			current = substateNode;
		}
	}

	/**
	 * Exits `src` and its ancestors, child first, stopping below the lowest
	 * common ancestor of `src` and `dst`. Returns the node the walk stopped at.
	 */
	#exit(
		src: StateNode<TState, TTrigger, TParams>,
		dst: StateNode<TState, TTrigger, TParams>,
		reentry: boolean,
		transition: Transition<TState, TTrigger>
	): StateNode<TState, TTrigger, TParams> {
		// dst is inside src, nothing to leave
		if (!reentry && dst.isDescendantOf(src.state)) {
			return src;
		}

		this.#debugLog(`exiting "${String(src.state)}"`);
		src.exit(transition);

		if (src.parent === undefined) {
			return src;
		}

		// the parent is the common ancestor, so it stays active
		if (dst.isDescendantOf(src.parent)) {
			return this.getNode(src.parent);
		}

		return this.#exit(this.getNode(src.parent), dst, false, transition);
	}

	/**
	 * Enters `dst`, first entering its ancestors not already active below `src`,
	 * then cascades into its initial substate chain.
	 */
	#enter(
		src: StateNode<TState, TTrigger, TParams>,
		dst: StateNode<TState, TTrigger, TParams>,
		initial: boolean,
		transition: Transition<TState, TTrigger>
	): void {
		if (
			!initial &&
			dst.parent !== undefined &&
			!src.isDescendantOf(dst.parent)
		) {
			this.#enter(src, this.getNode(dst.parent), false, transition);
		}

		this.#debugLog(`entering "${String(dst.state)}"`);
		dst.enter(transition);

		const substate = dst.initialSubstate;
		if (substate !== undefined) {
			this.#state = substate;
			this.#enter(dst, this.getNode(substate), true, transition);
		}
	}

	/**
	 * Checks whether the machine is in the given state, either directly or
	 * through one of its substates.
	 *
	 * @example
	 * ```typescript
	 * machine.state;             // "TRANSLATE" (a substate of "EDIT")
	 * machine.isInState("EDIT"); // true
	 * ```
	 */
	isInState(state: TState): boolean {
		if (this.#state === state) return true;
		let node = this.getNode(this.#state);
		while (node.parent !== undefined) {
			if (node.parent === state) return true;
			node = this.getNode(node.parent);
		}
		return false;
	}

	/**
	 * Checks whether the trigger would be handled (by the current state or an
	 * ancestor) without executing anything. Guards are evaluated.
	 *
	 * @param args - Arguments it would be fired with (default: none)
	 */
	canFire<K extends TTrigger>(trigger: K, ...args: TParams[K] | []): boolean {
		const result = this.#resolve(trigger, args) !== undefined;
		this.#debugLog(`canFire("${String(trigger)}") -> ${result}`);
		return result;
	}

	/**
	 * Returns the distinct triggers that would currently be handled when fired
	 * with `args`, nearest state first.
	 */
	permittedTriggers(args: readonly unknown[] = []): TTrigger[] {
		const triggers = new Set<TTrigger>();
		for (const node of this.#activeNodes()) {
			for (const trigger of node.triggers) {
				if (!triggers.has(trigger) && this.#resolve(trigger, args)) {
					triggers.add(trigger);
				}
			}
		}
		return [...triggers];
	}

	/** Current node followed by its ancestors. */
	#activeNodes(): StateNode<TState, TTrigger, TParams>[] {
		const nodes = [this.getNode(this.#state)];
		let parent = nodes[0].parent;
		while (parent !== undefined) {
			const node = this.getNode(parent);
			nodes.push(node);
			parent = node.parent;
		}
		return nodes;
	}

	/**
	 * Resets the machine to its initial state without running any callback.
	 * Subscribers are notified after reset.
	 *
	 * @returns The machine instance for chaining
	 */
	reset(): this {
		this.#debugLog(`reset() called, returning to "${String(this.#initial)}"`);
		this.#state = this.#initial;
		this.#previous = null;
		this.#notify();
		return this;
	}

	/**
	 * Lists the triggers registered on the current state and its ancestors,
	 * nearest state first. Guards are not evaluated. Diagnostic output only.
	 *
	 * @example
	 * ```typescript
	 * console.log(machine.describe());
	 * // Currently in TRANSLATE, possible triggers are:
	 * //   play to state PLAY
	 * //   rotate to state ROTATE
	 * ```
	 */
	describe(): string {
		const lines = [`Currently in ${String(this.#state)}, possible triggers are:`];
		for (const node of this.#activeNodes()) {
			for (const trigger of node.triggers) {
				for (const action of node.actionsFor(trigger)) {
					const guarded = action.guard ? " [guarded]" : "";
					lines.push(`  ${String(trigger)}${guarded} ${describeAction(action)}`);
				}
			}
		}
		return lines.join("\n");
	}

	/**
	 * Generates a Mermaid stateDiagram-v2 notation of the configuration.
	 * Substates are nested in composite states, with their initial substate
	 * marked by `[*] -->`.
	 *
	 * Labels follow UML conventions:
	 * - Guards are shown as `[guard N]` (several entries for one trigger) or `[guarded]`
	 * - Internal transitions are self-loops labelled `/ (action internal)`
	 * - Dynamic transitions are self-loops labelled `/ (dynamic)`
	 * - Ignored triggers are not drawn
	 *
	 * @returns Mermaid diagram string
	 */
	toMermaid(): string {
		let mermaid = "stateDiagram-v2\n";
		mermaid += `    [*] --> ${String(this.#initial)}\n`;

		const children = new Map<TState, StateNode<TState, TTrigger, TParams>[]>();
		const roots: StateNode<TState, TTrigger, TParams>[] = [];
		for (const node of this.#states.values()) {
			if (node.parent === undefined || !this.#states.has(node.parent)) {
				roots.push(node);
			} else {
				const siblings = children.get(node.parent) ?? [];
				siblings.push(node);
				children.set(node.parent, siblings);
			}
		}

		const declare = (
			node: StateNode<TState, TTrigger, TParams>,
			indent: string
		): string => {
			const nested = children.get(node.state);
			if (!nested) return `${indent}${String(node.state)}\n`;
			let out = `${indent}state ${String(node.state)} {\n`;
			if (node.initialSubstate !== undefined) {
				out += `${indent}    [*] --> ${String(node.initialSubstate)}\n`;
			}
			for (const child of nested) out += declare(child, indent + "    ");
			return out + `${indent}}\n`;
		};

		for (const root of roots) mermaid += declare(root, "    ");

		for (const node of this.#states.values()) {
			const name = String(node.state);
			for (const trigger of node.triggers) {
				const actions = node.actionsFor(trigger);
				actions.forEach((action, idx) => {
					let label = String(trigger);
					if (action.guard) {
						label += actions.length > 1 ? ` [guard ${idx + 1}]` : " [guarded]";
					}
					if (action.kind === "transition") {
						mermaid += `    ${name} --> ${String(action.destination)}: ${label}\n`;
					} else if (action.kind === "dynamic") {
						mermaid += `    ${name} --> ${name}: ${label} / (dynamic)\n`;
					} else if (action.kind === "internal") {
						mermaid += `    ${name} --> ${name}: ${label} / (action internal)\n`;
					}
				});
			}
		}

		return mermaid;
	}
}

function describeAction<TState extends Identity>(
	action: TriggerAction<TState>
): string {
	switch (action.kind) {
		case "transition":
			return `to state ${String(action.destination)}`;
		case "dynamic":
			return "to a dynamically selected state";
		case "ignore":
			return "is ignored";
		case "internal":
			return "runs an internal action";
	}
}
