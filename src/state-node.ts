import { ConfigurationError } from "./errors.ts";
import type {
	AnyArgsFn,
	Guard,
	Identity,
	StateCallback,
	Transition,
	TriggerAction,
	TriggerParams,
} from "./types.ts";

/**
 * Lookup of configured nodes by state identity.
 * Nodes reference their parent by identity and resolve it through the registry.
 */
export interface StateRegistry<
	TState extends Identity,
	TTrigger extends Identity,
	TParams extends TriggerParams<TTrigger>
> {
	/** Returns the node or throws `UnknownStateError`. */
	getNode(state: TState): StateNode<TState, TTrigger, TParams>;
	/** Returns the node or `undefined` when not configured. */
	findNode(state: TState): StateNode<TState, TTrigger, TParams> | undefined;
}

/**
 * Configuration and trigger table of a single state.
 *
 * Nodes are created (and cached) by `Machine.configure()`; every configuration
 * method returns the node itself so calls can be chained.
 *
 * @example
 * ```typescript
 * machine.configure("EDIT")
 *   .initialTransition("TRANSLATE")
 *   .permit("play", "PLAY")
 *   .onEntry(() => showGizmo())
 *   .onExit(() => hideGizmo());
 * ```
 */
export class StateNode<
	TState extends Identity,
	TTrigger extends Identity,
	TParams extends TriggerParams<TTrigger> = TriggerParams<TTrigger>
> {
	#registry: StateRegistry<TState, TTrigger, TParams>;

	#parent: TState | undefined;

	#initialSubstate: TState | undefined;

	/** Actions per trigger, in registration order */
	#triggers = new Map<TTrigger, TriggerAction<TState>[]>();

	#onEntry: StateCallback<TState, TTrigger> | undefined;

	#onExit: StateCallback<TState, TTrigger> | undefined;

	/** trigger -> arity -> callback */
	#typedEntry = new Map<TTrigger, Map<number, AnyArgsFn<void>>>();

	#typedExit = new Map<TTrigger, Map<number, AnyArgsFn<void>>>();

	constructor(
		public readonly state: TState,
		registry: StateRegistry<TState, TTrigger, TParams>
	) {
		this.#registry = registry;
	}

	/** Parent state identity, if this is a substate. */
	get parent(): TState | undefined {
		return this.#parent;
	}

	/** Substate entered automatically whenever this state is entered. */
	get initialSubstate(): TState | undefined {
		return this.#initialSubstate;
	}

	/** Trigger identities registered on this state, in first-registration order. */
	get triggers(): TTrigger[] {
		return [...this.#triggers.keys()];
	}

	/** Registered actions for the trigger, in registration (evaluation) order. */
	actionsFor(trigger: TTrigger): readonly TriggerAction<TState>[] {
		return this.#triggers.get(trigger) ?? [];
	}

	#add(trigger: TTrigger, action: TriggerAction<TState>): this {
		const actions = this.#triggers.get(trigger);
		if (actions) actions.push(action);
		else this.#triggers.set(trigger, [action]);
		return this;
	}

	#assertNotSelf(trigger: TTrigger, destination: TState): void {
		if (destination === this.state) {
			throw new ConfigurationError(
				`Trigger "${String(trigger)}" cannot target its own state "${String(
					this.state
				)}", use permitReentry() instead`,
				this.state,
				trigger
			);
		}
	}

	/** Transition to another state. */
	permit(trigger: TTrigger, destination: TState): this {
		this.#assertNotSelf(trigger, destination);
		return this.#add(trigger, { kind: "transition", destination });
	}

	/** Transition to another state if `guard` holds at fire time. */
	permitIf(trigger: TTrigger, destination: TState, guard: Guard): this {
		this.#assertNotSelf(trigger, destination);
		return this.#add(trigger, { kind: "transition", destination, guard });
	}

	/**
	 * Transition from this state back to itself. Unlike `ignore()`, the state is
	 * exited and entered again (including its initial substate cascade).
	 */
	permitReentry(trigger: TTrigger): this {
		return this.#add(trigger, { kind: "transition", destination: this.state });
	}

	/** Guarded variant of `permitReentry()`. */
	permitReentryIf(trigger: TTrigger, guard: Guard): this {
		return this.#add(trigger, {
			kind: "transition",
			destination: this.state,
			guard,
		});
	}

	/**
	 * Validates an explicit argument count, or takes the callback's declared
	 * parameter count when none is given.
	 */
	#arity(trigger: TTrigger, fn: AnyArgsFn<unknown>, arity?: number): number {
		if (arity === undefined) return fn.length;
		if (!Number.isInteger(arity) || arity < 0) {
			// prettier-ignore
			throw new ConfigurationError(`Argument count for trigger "${String(trigger)}" must be a non-negative integer, got ${arity}`, this.state, trigger);
		}
		return arity;
	}

	/**
	 * Transition to a destination computed from the fired arguments.
	 * The registration only matches fires with exactly `arity` arguments, which
	 * defaults to the selector's declared parameter count. Pass it explicitly
	 * for selectors with default or rest parameters (their `length` does not
	 * count those).
	 *
	 * @example
	 * ```typescript
	 * node.permitDynamic("compare", (a: number, b: number) =>
	 *   a < b ? "LESS" : a > b ? "GREATER" : "EQUAL"
	 * );
	 * machine.fire("compare", 1, 2); // -> "LESS"
	 *
	 * node.permitDynamic("sum", (...n: [number, number]) => pick(n), 2);
	 * ```
	 */
	permitDynamic<K extends TTrigger, A extends TParams[K]>(
		trigger: K,
		selector: (...args: A) => TState,
		arity?: number
	): this {
		return this.#add(trigger, {
			kind: "dynamic",
			select: selector,
			arity: this.#arity(trigger, selector, arity),
		});
	}

	/** Guarded variant of `permitDynamic()`. */
	permitDynamicIf<K extends TTrigger, A extends TParams[K]>(
		trigger: K,
		selector: (...args: A) => TState,
		guard: Guard,
		arity?: number
	): this {
		return this.#add(trigger, {
			kind: "dynamic",
			select: selector,
			arity: this.#arity(trigger, selector, arity),
			guard,
		});
	}

	/** Handle the trigger without doing anything (as opposed to leaving it unhandled). */
	ignore(trigger: TTrigger): this {
		return this.#add(trigger, { kind: "ignore" });
	}

	/** Ignore the trigger while `guard` holds. */
	ignoreIf(trigger: TTrigger, guard: Guard): this {
		return this.#add(trigger, { kind: "ignore", guard });
	}

	/**
	 * Run `action` with the fired arguments without leaving the state.
	 * No entry/exit callbacks fire. Matches fires with exactly `arity` arguments
	 * (default: the action's declared parameter count).
	 */
	internalTransition<K extends TTrigger, A extends TParams[K]>(
		trigger: K,
		action: (...args: A) => void,
		arity?: number
	): this {
		return this.#add(trigger, {
			kind: "internal",
			action,
			arity: this.#arity(trigger, action, arity),
		});
	}

	/** Guarded variant of `internalTransition()`. */
	internalTransitionIf<K extends TTrigger, A extends TParams[K]>(
		trigger: K,
		guard: Guard,
		action: (...args: A) => void,
		arity?: number
	): this {
		return this.#add(trigger, {
			kind: "internal",
			action,
			arity: this.#arity(trigger, action, arity),
			guard,
		});
	}

	/**
	 * Makes this state a substate of `parent`. Triggers not handled here are
	 * looked up on the parent (and its ancestors).
	 *
	 * @throws ConfigurationError if a parent is already set or a cycle would result
	 */
	substateOf(parent: TState): this {
		if (this.#parent !== undefined) {
			// prettier-ignore
			throw new ConfigurationError(`State "${String(this.state)}" is already a substate of "${String(this.#parent)}"`, this.state);
		}
		if (parent === this.state || this.isAncestorOf(parent)) {
			// prettier-ignore
			throw new ConfigurationError(`Making "${String(this.state)}" a substate of "${String(parent)}" would create a cycle`, this.state);
		}
		this.#parent = parent;
		return this;
	}

	/**
	 * Declares the substate to cascade into whenever this state is entered.
	 * The substate must be configured with `substateOf(this state)` before it is reached.
	 *
	 * @throws ConfigurationError if already set or if `substate` is this state
	 */
	initialTransition(substate: TState): this {
		if (this.#initialSubstate !== undefined) {
			// prettier-ignore
			throw new ConfigurationError(`State "${String(this.state)}" already has initial substate "${String(this.#initialSubstate)}"`, this.state);
		}
		if (substate === this.state) {
			// prettier-ignore
			throw new ConfigurationError(`State "${String(this.state)}" cannot be its own initial substate`, this.state);
		}
		this.#initialSubstate = substate;
		return this;
	}

	/** Sets the entry callback (last write wins). */
	onEntry(cb: StateCallback<TState, TTrigger>): this {
		this.#onEntry = cb;
		return this;
	}

	/** Sets the exit callback (last write wins). */
	onExit(cb: StateCallback<TState, TTrigger>): this {
		this.#onExit = cb;
		return this;
	}

	/**
	 * Entry callback for when `trigger` is fired with exactly `arity` arguments
	 * (default: as many as `cb` declares). It runs instead of the plain
	 * `onEntry` callback, never with it.
	 */
	onEntryFrom<K extends TTrigger, A extends TParams[K]>(
		trigger: K,
		cb: (...args: A) => void,
		arity?: number
	): this {
		setTyped(this.#typedEntry, trigger, cb, this.#arity(trigger, cb, arity));
		return this;
	}

	/** Exit counterpart of `onEntryFrom()`. */
	onExitFrom<K extends TTrigger, A extends TParams[K]>(
		trigger: K,
		cb: (...args: A) => void,
		arity?: number
	): this {
		setTyped(this.#typedExit, trigger, cb, this.#arity(trigger, cb, arity));
		return this;
	}

	/**
	 * Returns the first action registered for `trigger` on this state (ancestors
	 * are not consulted) whose signature matches `args` and whose guard is absent
	 * or passes.
	 */
	findAction(
		trigger: TTrigger,
		args: readonly unknown[] = []
	): TriggerAction<TState> | undefined {
		for (const action of this.actionsFor(trigger)) {
			if (
				(action.kind === "dynamic" || action.kind === "internal") &&
				action.arity !== args.length
			) {
				continue;
			}
			if (!action.guard || action.guard()) return action;
		}
		return undefined;
	}

	/** True if this state is `state` or one of its substates (at any depth). */
	isDescendantOf(state: TState): boolean {
		return (
			this.state === state ||
			(this.#parent !== undefined &&
				this.#registry.getNode(this.#parent).isDescendantOf(state))
		);
	}

	/**
	 * True if this state is a proper ancestor of `state`.
	 * Unconfigured states along the way are treated as roots.
	 */
	isAncestorOf(state: TState): boolean {
		let current = this.#registry.findNode(state)?.parent;
		while (current !== undefined) {
			if (current === this.state) return true;
			current = this.#registry.findNode(current)?.parent;
		}
		return false;
	}

	/**
	 * Runs the entry callback for the transition: the typed one registered for
	 * its trigger and argument count if any, the plain one otherwise.
	 */
	enter(transition: Transition<TState, TTrigger>): void {
		runCallback(this.#typedEntry, this.#onEntry, transition);
	}

	/** Exit counterpart of `enter()`. */
	exit(transition: Transition<TState, TTrigger>): void {
		runCallback(this.#typedExit, this.#onExit, transition);
	}
}

function setTyped<TTrigger extends Identity>(
	map: Map<TTrigger, Map<number, AnyArgsFn<void>>>,
	trigger: TTrigger,
	cb: AnyArgsFn<void>,
	arity: number
): void {
	let byArity = map.get(trigger);
	if (!byArity) {
		byArity = new Map();
		map.set(trigger, byArity);
	}
	byArity.set(arity, cb);
}

function runCallback<TState extends Identity, TTrigger extends Identity>(
	typed: Map<TTrigger, Map<number, AnyArgsFn<void>>>,
	plain: StateCallback<TState, TTrigger> | undefined,
	transition: Transition<TState, TTrigger>
): void {
	const cb = typed.get(transition.trigger)?.get(transition.args.length);
	if (cb) {
		cb(...transition.args);
	} else if (typeof plain === "function") {
		plain(transition);
	}
}
