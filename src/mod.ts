/**
 * @module
 *
 * A typed, embeddable hierarchical finite state machine.
 *
 * States form a parent/child hierarchy: a substate inherits the triggers of its
 * ancestors, and transitions exit and enter only the states between the source,
 * the destination and their lowest common ancestor. Entering a state can cascade
 * into its initial substate. The machine is synchronous and contains no business
 * logic; hosts attach it through guards, selectors and entry/exit callbacks.
 *
 * @example Fluent configuration
 * ```typescript
 * import { Machine } from "hierarchical-fsm";
 *
 * const m = new Machine<"PLAY" | "EDIT" | "MOVE" | "ROTATE", "edit" | "play" | "rotate">("PLAY");
 * m.configure("PLAY").permit("edit", "EDIT");
 * m.configure("EDIT").initialTransition("MOVE").permit("play", "PLAY").permit("rotate", "ROTATE");
 * m.configure("MOVE").substateOf("EDIT");
 * m.configure("ROTATE").substateOf("EDIT");
 *
 * m.fire("edit");    // → "MOVE"
 * m.isInState("EDIT"); // true
 * ```
 *
 * @example Parameterized triggers
 * ```typescript
 * type Params = { compare: [number, number]; reset: [] };
 * const m = new Machine<"IDLE" | "LESS" | "MORE", "compare" | "reset", Params>("IDLE");
 * m.configure("IDLE").permitDynamic("compare", (a: number, b: number) => (a < b ? "LESS" : "MORE"));
 * m.fire("compare", 1, 2); // → "LESS"
 * ```
 *
 * @example Declarative configuration
 * ```typescript
 * import { composeMachineConfig, createMachine } from "hierarchical-fsm";
 *
 * const config = composeMachineConfig([coreFragment, featureFragment]);
 * const m = createMachine(config);
 * ```
 */

export * from "./types.ts";
export * from "./errors.ts";
export * from "./state-node.ts";
export * from "./machine.ts";
export * from "./compose-machine-config.ts";
