import { expect, test } from "vitest";
import {
	ConfigurationError,
	HsmError,
	InitialSubstateInvariantError,
	Machine,
	UnhandledTriggerError,
	UnknownStateError,
	type Logger,
	type StateNode,
	type Transition,
} from "../src/mod.ts";

/** Records ">X" on entry and "<X" on exit of each given state */
function track(log: string[], ...nodes: StateNode<string, string>[]) {
	for (const node of nodes) {
		node
			.onEntry(() => log.push(`>${node.state}`))
			.onExit(() => log.push(`<${node.state}`));
	}
}

test("permit", () => {
	// A   B
	const log: string[] = [];
	const m = new Machine<string, string>("A");
	track(log, m.configure("A").permit("X", "B"), m.configure("B"));

	expect(m.isInState("A")).toBe(true);
	expect(m.fire("X")).toBe("B");
	expect(m.isInState("B")).toBe(true);
	expect(log.join("")).toBe("<A>B");
});

test("entering a state cascades into its initial substate", () => {
	// A   B
	//     |
	//     C
	const log: string[] = [];
	const m = new Machine<string, string>("A");
	track(
		log,
		m.configure("A").permit("X", "B"),
		m.configure("B").initialTransition("C"),
		m.configure("C").substateOf("B")
	);

	expect(m.fire("X")).toBe("C");
	expect(m.isInState("C")).toBe(true);
	expect(m.isInState("B")).toBe(true);
	expect(log.join("")).toBe("<A>B>C");
});

test("leaving a substate exits its parent", () => {
	// A   B
	//     |
	//     C
	const log: string[] = [];
	const m = new Machine<string, string>("C");
	track(
		log,
		m.configure("A"),
		m.configure("B"),
		m.configure("C").substateOf("B").permit("X", "A")
	);

	m.fire("X");
	expect(m.isInState("A")).toBe(true);
	expect(log.join("")).toBe("<C<B>A");
});

test("sibling transition does not exit or enter the common parent", () => {
	//     A
	//    / \
	//   B   C
	const log: string[] = [];
	const m = new Machine<string, string>("B");
	track(
		log,
		m.configure("A"),
		m.configure("B").substateOf("A").permit("X", "C"),
		m.configure("C").substateOf("A")
	);

	m.fire("X");
	expect(m.state).toBe("C");
	expect(log.join("")).toBe("<B>C");
});

test("exit climbs to the common ancestor", () => {
	//     A
	//    / \
	//   B   C
	//       |
	//       D
	const log: string[] = [];
	const m = new Machine<string, string>("D");
	track(
		log,
		m.configure("A"),
		m.configure("B").substateOf("A"),
		m.configure("C").substateOf("A"),
		m.configure("D").substateOf("C").permit("X", "B")
	);

	m.fire("X");
	expect(m.state).toBe("B");
	expect(log.join("")).toBe("<D<C>B");
});

test("enter descends from the common ancestor", () => {
	//     A
	//    / \
	//   B   C
	//       |
	//       D
	const log: string[] = [];
	const m = new Machine<string, string>("B");
	track(
		log,
		m.configure("A"),
		m.configure("B").substateOf("A").permit("X", "D"),
		m.configure("C").substateOf("A"),
		m.configure("D").substateOf("C")
	);

	m.fire("X");
	expect(m.state).toBe("D");
	expect(m.isInState("C")).toBe(true);
	expect(m.isInState("A")).toBe(true);
	expect(m.isInState("B")).toBe(false);
	expect(log.join("")).toBe("<B>C>D");
});

test("reentry exits and enters again, then cascades", () => {
	// A
	// |
	// B
	const log: string[] = [];
	const m = new Machine<string, string>("A");
	track(
		log,
		m.configure("A").initialTransition("B").permitReentry("X"),
		m.configure("B").substateOf("A")
	);

	m.fire("X");
	expect(m.isInState("B")).toBe(true);
	expect(log.join("")).toBe("<A>A>B");
});

test("reentry of a substate keeps its parent active", () => {
	const log: string[] = [];
	const m = new Machine<string, string>("B");
	track(log, m.configure("A"), m.configure("B").substateOf("A").permitReentry("X"));

	m.fire("X");
	expect(m.state).toBe("B");
	expect(log).toEqual(["<B", ">B"]);
});

test("dynamic destination selected from the fired argument", () => {
	type Params = { go: [number]; back: [] };
	const m = new Machine<"A" | "B" | "C", "go" | "back", Params>("A");
	m.configure("A").permitDynamic("go", (i: number) => (i > 0 ? "B" : "C"));
	m.configure("B").permit("back", "A");
	m.configure("C").permit("back", "A");

	expect(m.fire("go", 1)).toBe("B");
	expect(m.fire("back")).toBe("A");
	expect(m.fire("go", -1)).toBe("C");
});

test("dynamic selector with two arguments", () => {
	type State = "IDLE" | "LESS" | "EQUAL" | "GREATER";
	type Params = { compare: [number, number]; reset: [] };
	const m = new Machine<State, "compare" | "reset", Params>("IDLE");
	m.configure("IDLE").permitDynamic("compare", (a: number, b: number) =>
		a < b ? "LESS" : a > b ? "GREATER" : "EQUAL"
	);
	for (const state of ["LESS", "EQUAL", "GREATER"] as const) {
		m.configure(state).permit("reset", "IDLE");
	}

	m.fire("compare", 1, 2);
	expect(m.isInState("LESS")).toBe(true);
	m.fire("reset");
	m.fire("compare", 3, 3);
	expect(m.state).toBe("EQUAL");
});

test("guarded dynamic transition falls through when its guard fails", () => {
	type Params = { go: [number] };
	let allowed = true;
	const m = new Machine<"A" | "B" | "C" | "D", "go", Params>("A");
	m.configure("A")
		.permitDynamicIf("go", (i: number) => (i > 0 ? "B" : "C"), () => allowed)
		.permit("go", "D");
	m.configure("B");
	m.configure("C");
	m.configure("D");

	expect(m.fire("go", 1)).toBe("B");
	m.reset();
	expect(m.fire("go", -1)).toBe("C");
	m.reset();
	allowed = false;
	expect(m.fire("go", 1)).toBe("D");
});

test("explicit argument count for default and rest parameters", () => {
	type Params = { go: [number]; add: [number, number] };
	let sum = 0;
	const m = new Machine<"A" | "B" | "C", "go" | "add", Params>("A");
	m.configure("A")
		.permitDynamic("go", (i: number = 0) => (i > 0 ? "B" : "C"), 1)
		.internalTransition(
			"add",
			(...n: [number, number]) => {
				sum = n[0] + n[1];
			},
			2
		);
	m.configure("B");
	m.configure("C");

	expect(m.canFire("go")).toBe(false);
	expect(m.fire("add", 1, 2)).toBe("A");
	expect(sum).toBe(3);
	expect(m.fire("go", 1)).toBe("B");
});

test("argument count must be a non-negative integer", () => {
	type Params = { add: [number, number] };
	const node = new Machine<"A", "add", Params>("A").configure("A");

	expect(() => node.internalTransition("add", () => {}, -1)).toThrow(
		ConfigurationError
	);
	expect(() => node.permitDynamic("add", () => "A", 1.5)).toThrow(
		`Argument count for trigger "add" must be a non-negative integer, got 1.5`
	);
	expect(node.triggers).toEqual([]);
});

test("ignore is a no-op", () => {
	const log: string[] = [];
	const m = new Machine<string, string>("A");
	track(log, m.configure("A").ignore("X"));

	expect(m.fire("X")).toBe("A");
	expect(m.previous).toBe(null);
	expect(log).toEqual([]);
});

test("ancestor trigger inheritance", () => {
	const log: string[] = [];
	const m = new Machine<string, string>("C");
	track(
		log,
		m.configure("P").permit("X", "Q"),
		m.configure("C").substateOf("P"),
		m.configure("Q")
	);

	expect(m.canFire("X")).toBe(true);
	m.fire("X");
	expect(m.state).toBe("Q");
	expect(log.join("")).toBe("<C<P>Q");
});

test("substate handling overrides the ancestor", () => {
	const m = new Machine<string, string>("C");
	m.configure("P").permit("X", "Q");
	m.configure("C").substateOf("P").ignore("X");
	m.configure("Q");

	m.fire("X");
	expect(m.state).toBe("C");
});

test("guard precedence: first passing entry wins", () => {
	let consulted = false;
	const m = new Machine<string, string>("A");
	m.configure("A")
		.permitIf("X", "B", () => true)
		.ignoreIf("X", () => {
			consulted = true;
			return true;
		});
	m.configure("B");

	m.fire("X");
	expect(m.state).toBe("B");
	expect(consulted).toBe(false);
});

test("guard precedence: failing guard falls through to the next entry", () => {
	const m = new Machine<string, string>("A");
	m.configure("A")
		.permitIf("X", "B", () => false)
		.ignoreIf("X", () => true);
	m.configure("B");

	m.fire("X");
	expect(m.state).toBe("A");
});

test("unconditional entry is a fallback only when registered later", () => {
	const later = new Machine<string, string>("A");
	later.configure("A").permitIf("X", "B", () => false).permit("X", "C");
	later.configure("B");
	later.configure("C");
	expect(later.fire("X")).toBe("C");

	const earlier = new Machine<string, string>("A");
	earlier.configure("A").permit("X", "C").permitIf("X", "B", () => true);
	earlier.configure("B");
	earlier.configure("C");
	expect(earlier.fire("X")).toBe("C");
});

test("failing guards everywhere make the trigger unhandled", () => {
	const m = new Machine<string, string>("A");
	m.configure("A").permitIf("X", "B", () => false);
	m.configure("B");

	expect(m.canFire("X")).toBe(false);
	expect(() => m.fire("X")).toThrow(UnhandledTriggerError);
});

test("unhandled trigger without hook throws", () => {
	const m = new Machine<string, string>("A");
	m.configure("A").permit("X", "B");
	m.configure("B");

	let error: unknown;
	try {
		m.fire("Y");
	} catch (e) {
		error = e;
	}
	expect(error).toBeInstanceOf(UnhandledTriggerError);
	expect(error).toBeInstanceOf(HsmError);
	if (error instanceof UnhandledTriggerError) {
		expect(error.state).toBe("A");
		expect(error.trigger).toBe("Y");
		expect(error.message).toBe(`Trigger "Y" is not handled in state "A"`);
	}
	expect(m.state).toBe("A");
});

test("unhandled trigger with hook receives state and trigger", () => {
	const calls: [string, string][] = [];
	const m = new Machine<string, string>("A");
	m.configure("A").permit("X", "B");
	m.configure("B");
	m.onUnhandledTrigger((state, trigger) => calls.push([state, trigger]));

	expect(m.fire("Y")).toBe("A");
	expect(calls).toEqual([["A", "Y"]]);
	expect(m.state).toBe("A");
});

test("onTransitioned runs between exits and entries", () => {
	const log: string[] = [];
	const m = new Machine<string, string>("A");
	track(
		log,
		m.configure("A").permit("X", "B"),
		m.configure("B").initialTransition("C"),
		m.configure("C").substateOf("B")
	);
	m.onTransitioned((source, destination, trigger) => {
		log.push(`${source}-${trigger}-${destination}@${m.state}`);
	});

	m.fire("X");
	expect(log).toEqual(["<A", "A-X-B@B", ">B", ">C"]);
});

test("initial substate cascade of depth 3", () => {
	const log: string[] = [];
	const m = new Machine<string, string>("X");
	track(
		log,
		m.configure("X").permit("go", "A"),
		m.configure("A").initialTransition("B"),
		m.configure("B").substateOf("A").initialTransition("C"),
		m.configure("C").substateOf("B").initialTransition("D"),
		m.configure("D").substateOf("C")
	);

	m.fire("go");
	expect(log).toEqual(["<X", ">A", ">B", ">C", ">D"]);
	expect(m.state).toBe("D");
	expect(m.isInState("A")).toBe(true);
});

test("transition to an ancestor enters it again and cascades", () => {
	const log: string[] = [];
	const m = new Machine<string, string>("C");
	track(
		log,
		m.configure("P").initialTransition("C"),
		m.configure("C").substateOf("P").permit("up", "P")
	);

	m.fire("up");
	expect(log.join("")).toBe("<C>P>C");
	expect(m.state).toBe("C");
});

test("transition to a descendant exits nothing", () => {
	const log: string[] = [];
	const m = new Machine<string, string>("P");
	track(
		log,
		m.configure("P").permit("down", "C"),
		m.configure("C").substateOf("P")
	);

	m.fire("down");
	expect(log.join("")).toBe(">C");
	expect(m.state).toBe("C");
});

test("internal transition runs its action only", () => {
	const log: string[] = [];
	let volume = 5;
	type Params = { volume: [number] };
	const m = new Machine<"PLAYING", "volume", Params>("PLAYING");
	const playing = m
		.configure("PLAYING")
		.internalTransition("volume", (delta: number) => {
			volume += delta;
		})
		.onEntry(() => log.push("enter"))
		.onExit(() => log.push("exit"));
	const published: string[] = [];
	m.subscribe(({ current }) => published.push(current));

	expect(m.fire("volume", 2)).toBe("PLAYING");
	expect(volume).toBe(7);
	expect(log).toEqual([]);
	expect(published).toEqual(["PLAYING"]);
	expect(playing.triggers).toEqual(["volume"]);
});

test("guarded internal transition skips its action while the guard fails", () => {
	type Params = { volume: [number] };
	let volume = 5;
	let muted = true;
	const m = new Machine<"PLAYING", "volume", Params>("PLAYING");
	m.configure("PLAYING").internalTransitionIf(
		"volume",
		() => !muted,
		(delta: number) => {
			volume += delta;
		}
	);

	expect(() => m.fire("volume", 2)).toThrow(UnhandledTriggerError);
	expect(volume).toBe(5);
	muted = false;
	expect(m.fire("volume", 2)).toBe("PLAYING");
	expect(volume).toBe(7);
});

test("guarded reentry only while the guard holds", () => {
	const log: string[] = [];
	let allowed = true;
	const m = new Machine<string, string>("A");
	track(log, m.configure("A").permitReentryIf("X", () => allowed).ignore("X"));

	m.fire("X");
	allowed = false;
	m.fire("X");
	expect(m.state).toBe("A");
	expect(log.join("")).toBe("<A>A");
});

test("argument count must match exactly", () => {
	type Params = { volume: [number] | [] };
	const m = new Machine<"A", "volume", Params>("A");
	m.configure("A").internalTransition("volume", (delta: number) => {
		void delta;
	});

	expect(m.canFire("volume")).toBe(false);
	expect(m.canFire("volume", 1)).toBe(true);
	expect(() => m.fire("volume")).toThrow(UnhandledTriggerError);
	expect(m.fire("volume", 1)).toBe("A");
});

test("typed entry/exit callbacks replace the plain ones", () => {
	type Params = { go: [number] | []; back: [] };
	const log: string[] = [];
	const m = new Machine<"A" | "B", "go" | "back", Params>("A");
	m.configure("A")
		.permit("go", "B")
		.onEntry(() => log.push(">A"))
		.onExit(() => log.push("<A"))
		.onExitFrom("go", (n: number) => log.push(`<A(${n})`));
	m.configure("B")
		.permit("back", "A")
		.onEntry(() => log.push(">B"))
		.onExit(() => log.push("<B"))
		.onEntryFrom("go", (n: number) => log.push(`>B(${n})`));

	m.fire("go", 5);
	m.fire("back");
	m.fire("go");
	expect(log).toEqual(["<A(5)", ">B(5)", "<B", ">A", "<A", ">B"]);
});

test("typed callbacks with an explicit argument count", () => {
	type Params = { go: [number] };
	const log: string[] = [];
	const m = new Machine<"A" | "B", "go", Params>("A");
	m.configure("A")
		.permit("go", "B")
		.onExit(() => log.push("<A"))
		.onExitFrom(
			"go",
			(n: number = 0) => {
				log.push(`<A(${n})`);
			},
			1
		);
	m.configure("B")
		.onEntry(() => log.push(">B"))
		.onEntryFrom(
			"go",
			(...n: [number]) => {
				log.push(`>B(${n[0]})`);
			},
			1
		);

	m.fire("go", 5);
	expect(log).toEqual(["<A(5)", ">B(5)"]);
});

test("plain callbacks receive the transition", () => {
	const seen: Transition<string, string>[] = [];
	const m = new Machine<string, string>("A");
	m.configure("A")
		.permit("X", "B")
		.onExit((t) => seen.push(t));
	m.configure("B");

	m.fire("X", "payload");
	expect(seen).toEqual([
		{
			source: "A",
			destination: "B",
			trigger: "X",
			args: ["payload"],
			isReentry: false,
		},
	]);
});

test("unknown destination fails before anything runs", () => {
	const log: string[] = [];
	const m = new Machine<string, string>("A");
	track(log, m.configure("A").permit("X", "Z"));

	expect(() => m.fire("X")).toThrow(UnknownStateError);
	expect(() => m.fire("X")).toThrow(`State "Z" is not configured`);
	expect(m.state).toBe("A");
	expect(log).toEqual([]);
});

test("unconfigured current state is reported on fire", () => {
	const m = new Machine<string, string>("A");
	expect(() => m.fire("X")).toThrow(UnknownStateError);
});

test("initial substate must be configured as a substate", () => {
	const log: string[] = [];
	let transitioned = 0;
	const m = new Machine<string, string>("S");
	track(
		log,
		m.configure("S").permit("go", "A"),
		m.configure("A").initialTransition("B"),
		m.configure("B")
	);
	m.onTransitioned(() => transitioned++);

	expect(() => m.fire("go")).toThrow(InitialSubstateInvariantError);
	expect(m.state).toBe("S");
	expect(m.previous).toBe(null);
	expect(transitioned).toBe(0);
	expect(log).toEqual([]);
});

test("unconfigured state deep in the initial chain fails before anything runs", () => {
	const log: string[] = [];
	const m = new Machine<string, string>("S");
	track(
		log,
		m.configure("S").permit("go", "A"),
		m.configure("A").initialTransition("B"),
		m.configure("B").substateOf("A").initialTransition("C")
	);

	expect(() => m.fire("go")).toThrow(`State "C" is not configured`);
	expect(m.state).toBe("S");
	expect(log).toEqual([]);
});

test("callback errors propagate to the caller", () => {
	const m = new Machine<string, string>("A");
	m.configure("A")
		.permit("X", "B")
		.onExit(() => {
			throw new Error("boom");
		});
	m.configure("B");

	expect(() => m.fire("X")).toThrow("boom");
	expect(m.state).toBe("A");
});

test("canFire does not execute anything", () => {
	const log: string[] = [];
	type Params = { go: [number]; x: []; y: [] };
	const m = new Machine<"P" | "C" | "Q", "go" | "x" | "y", Params>("C");
	m.configure("P").permit("x", "Q");
	m.configure("C")
		.substateOf("P")
		.permitDynamic("go", (n: number) => (n > 0 ? "Q" : "P"))
		.onExit(() => log.push("<C"));
	m.configure("Q");

	expect(m.canFire("x")).toBe(true);
	expect(m.canFire("y")).toBe(false);
	expect(m.canFire("go")).toBe(false);
	expect(m.canFire("go", 1)).toBe(true);
	expect(m.state).toBe("C");
	expect(log).toEqual([]);
});

test("permittedTriggers lists resolvable triggers nearest first", () => {
	const m = new Machine<string, string>("C");
	m.configure("P").permit("a", "Q").permit("c", "Q");
	m.configure("C")
		.substateOf("P")
		.ignoreIf("a", () => false)
		.permit("b", "Q");
	m.configure("Q");

	expect(m.permittedTriggers()).toEqual(["a", "b", "c"]);
});

test("numeric enums as identities", () => {
	enum State {
		Off,
		On,
	}
	enum Trigger {
		Switch,
	}
	const m = new Machine<State, Trigger>(State.Off);
	m.configure(State.Off).permit(Trigger.Switch, State.On);
	m.configure(State.On).permit(Trigger.Switch, State.Off);

	expect(m.isInState(State.Off)).toBe(true);
	m.fire(Trigger.Switch);
	expect(m.isInState(State.On)).toBe(true);
	m.fire(Trigger.Switch);
	expect(m.state).toBe(State.Off);
});

test("subscribe and reset", () => {
	const published: unknown[] = [];
	const m = new Machine<string, string>("A");
	m.configure("A").permit("X", "B").ignore("I");
	m.configure("B").initialTransition("C");
	m.configure("C").substateOf("B");

	const unsub = m.subscribe((x) => published.push(x));
	m.fire("X");
	m.reset();
	m.fire("I");
	unsub();
	m.fire("X");

	expect(published).toEqual([
		{ current: "A", previous: null },
		{ current: "C", previous: "A" },
		{ current: "A", previous: null },
	]);
	expect(m.state).toBe("C");
});

test("configure returns the same node", () => {
	const m = new Machine<string, string>("A");
	expect(m.configure("A")).toBe(m.configure("A"));
	m.configure("B");
	expect(m.states).toEqual(["A", "B"]);
});

test("describe lists triggers of the state and its ancestors", () => {
	const m = new Machine<string, string>("C");
	m.configure("P")
		.permit("x", "Q")
		.ignoreIf("y", () => true);
	m.configure("C")
		.substateOf("P")
		.permit("z", "Q")
		.internalTransition("w", () => {})
		.permitDynamic("d", (n: number) => (n > 0 ? "Q" : "P"));
	m.configure("Q");

	expect(m.describe()).toBe(
		[
			"Currently in C, possible triggers are:",
			"  z to state Q",
			"  w runs an internal action",
			"  d to a dynamically selected state",
			"  x to state Q",
			"  y [guarded] is ignored",
		].join("\n")
	);
});

test("toMermaid", () => {
	const m = new Machine<string, string>("PLAY");
	m.configure("PLAY").permit("edit", "EDIT");
	m.configure("EDIT")
		.initialTransition("MOVE")
		.permit("play", "PLAY")
		.permitIf("rotate", "ROTATE", () => true);
	m.configure("MOVE")
		.substateOf("EDIT")
		.internalTransition("nudge", () => {});
	m.configure("ROTATE").substateOf("EDIT").ignore("rotate");

	expect(m.toMermaid()).toBe(
		`stateDiagram-v2
    [*] --> PLAY
    PLAY
    state EDIT {
        [*] --> MOVE
        MOVE
        ROTATE
    }
    PLAY --> EDIT: edit
    EDIT --> PLAY: play
    EDIT --> ROTATE: rotate [guarded]
    MOVE --> MOVE: nudge / (action internal)
`
	);
});

test("toMermaid numbers guarded entries sharing a trigger", () => {
	const m = new Machine<string, string>("A");
	m.configure("A")
		.permitIf("x", "B", () => true)
		.permit("x", "C")
		.permitDynamic("d", () => "B");

	expect(m.toMermaid()).toBe(
		`stateDiagram-v2
    [*] --> A
    A
    A --> B: x [guard 1]
    A --> C: x
    A --> A: d / (dynamic)
`
	);
});

test("debug logging", () => {
	const messages: unknown[][] = [];
	const logger: Logger = {
		debug: (...args: unknown[]) => {
			messages.push(args);
			return "";
		},
		log: () => "",
		warn: () => "",
		error: () => "",
	};

	const m = new Machine<string, string>("A", { debug: true, logger });
	m.configure("A").permit("x", "B");
	m.configure("B");
	m.fire("x");

	expect(m.debug).toBe(true);
	expect(m.logger).toBe(logger);
	expect(messages).toEqual([
		["[HSM]", `Machine created with initial state "A"`],
		["[HSM]", `fire("x") called from state "A"`],
		["[HSM]", `fire("x"): "A" -> "B"`],
		["[HSM]", `exiting "A"`],
		["[HSM]", `entering "B"`],
	]);

	messages.length = 0;
	const quiet = new Machine<string, string>("A", { logger });
	quiet.configure("A").permit("x", "B");
	quiet.configure("B");
	quiet.fire("x");
	expect(messages).toEqual([]);
});
