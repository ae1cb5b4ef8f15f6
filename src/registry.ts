import { StateMachineInitError } from "./errors.ts";
import type { Logger } from "./logger.ts";
import { MultiKeyCollection } from "./multi-key-collection.ts";
import { ANY, TransitionKey } from "./transition-key.ts";

/**
 * The single callable shape the engine invokes. Guard hooks, transition
 * listeners and enter/leave actions all receive the concrete key of the
 * transition being taken.
 */
export type TransitionHook = (key: TransitionKey) => void;

/**
 * What users register. Zero-arg callables which do not care about the key are
 * accepted too; every handle is wrapped on registration.
 */
export type HookHandle = (key: TransitionKey) => void;

/** No-op guard hook: registering it under a key permits that transition. */
export const ALLOW: TransitionHook = () => {};

/** Selects the enter or leave action registry. */
export type Direction = "enter" | "leave";

/**
 * A state declaration. `value` is typed loosely on purpose: descriptions may
 * come from parsers or other untyped sources and are validated on build.
 */
export type StateDescriptor = {
	/** Name of the declaring field/entry, used in error messages */
	id: string;
	value: unknown;
	initial?: boolean;
};

/** Guard hook or transition listener declaration keyed by `(from, to)`. */
export type TransitionHookDescriptor = {
	kind: "guard" | "listener";
	handle: HookHandle;
	/** Source state, or `""` for any */
	from: string;
	/** Target state, or `""` for any */
	to: string;
	/** Static handles are never bound to the description's `host` */
	static?: boolean;
};

/** Enter or leave action declaration keyed by a single state. */
export type StateHookDescriptor = {
	kind: Direction;
	handle: HookHandle;
	/** The state entered/left, or `""` for any */
	state: string;
	static?: boolean;
};

export type HookDescriptor = TransitionHookDescriptor | StateHookDescriptor;

/**
 * Declarative description a machine is built from.
 *
 * @example
 * ```typescript
 * const description: StateMachineDescription = {
 *   states: [
 *     { id: "idle", value: "IDLE", initial: true },
 *     { id: "running", value: "RUNNING" },
 *   ],
 *   hooks: [
 *     { kind: "guard", from: "IDLE", to: "RUNNING", handle: () => {} },
 *     { kind: "enter", state: "RUNNING", handle: (key) => console.log(key) },
 *   ],
 * };
 * ```
 */
export type StateMachineDescription = {
	/** Receiver (`this`) for every non-static hook handle */
	host?: object;
	states: StateDescriptor[];
	hooks?: HookDescriptor[];
};

/** Everything the transition engine needs, as produced by `buildRegistries`. */
export type Registries = {
	states: Set<string>;
	initial: string;
	guards: MultiKeyCollection<TransitionKey, TransitionHook>;
	listeners: MultiKeyCollection<TransitionKey, TransitionHook>;
	enterActions: MultiKeyCollection<string, TransitionHook>;
	leaveActions: MultiKeyCollection<string, TransitionHook>;
};

/**
 * Turns user handles into `TransitionHook`s. The same handle with the same
 * receiver always maps to the same hook, so registering it twice is
 * de-duplicated and removing it by the same reference finds the adapted one.
 */
export class HookAdapter {
	#cache = new WeakMap<HookHandle, Map<object | undefined, TransitionHook>>();

	adapt(handle: HookHandle, receiver?: object): TransitionHook {
		let byReceiver = this.#cache.get(handle);
		if (!byReceiver) {
			byReceiver = new Map();
			this.#cache.set(handle, byReceiver);
		}
		let hook = byReceiver.get(receiver);
		if (!hook) {
			// always pass the key; handles declaring no parameter just ignore it
			hook = (key: TransitionKey) => {
				Reflect.apply(handle, receiver, [key]);
			};
			byReceiver.set(receiver, hook);
		}
		return hook;
	}

	/** Returns every hook previously adapted from `handle`, one per receiver. */
	lookup(handle: HookHandle): TransitionHook[] {
		return [...(this.#cache.get(handle)?.values() ?? [])];
	}
}

const NON_VOID_TAGS = new Set([
	"[object AsyncFunction]",
	"[object GeneratorFunction]",
	"[object AsyncGeneratorFunction]",
]);

/**
 * Returns why `handle` can't be used as a hook, or null when it can.
 * Hooks take zero arguments or a single `TransitionKey` and return nothing.
 */
export function hookShapeProblem(handle: HookHandle): string | null {
	if (handle.length > 1) {
		return `Hook must take zero arguments or a single TransitionKey, takes ${handle.length}`;
	}
	if (NON_VOID_TAGS.has(Object.prototype.toString.call(handle))) {
		return "Hook must be a plain synchronous function returning nothing";
	}
	return null;
}

/**
 * Builds the state set and all hook registries from `description`, validating
 * it along the way.
 *
 * @throws StateMachineInitError on any structural defect
 */
export function buildRegistries(
	description: StateMachineDescription,
	logger: Logger,
	adapter: HookAdapter = new HookAdapter()
): Registries {
	if (!description || !Array.isArray(description.states)) {
		throw new StateMachineInitError("Description must define a states list");
	}

	const states = new Set<string>();
	let initial: string | undefined;

	// 1. states
	for (const { id, value, initial: isInitial } of description.states) {
		if (typeof value !== "string") {
			throw new StateMachineInitError(
				`State value must be a string, got ${typeof value}. field: ${id}`
			);
		}
		if (value === ANY) {
			throw new StateMachineInitError(
				`State value must not be empty. field: ${id}`
			);
		}
		if (isInitial) {
			if (initial !== undefined) {
				throw new StateMachineInitError(
					`Duplicate initial state. field: ${id}, state: ${value} (already "${initial}")`
				);
			}
			initial = value;
		}
		if (states.has(value)) {
			logger.warn(`Duplicate state ignored. field: ${id}, state: ${value}`);
			continue;
		}
		states.add(value);
	}

	// 2. initial
	if (initial === undefined) {
		throw new StateMachineInitError("No initial state declared");
	}

	const registries: Registries = {
		states,
		initial,
		guards: new MultiKeyCollection(TransitionKey.idOf),
		listeners: new MultiKeyCollection(TransitionKey.idOf),
		enterActions: new MultiKeyCollection(),
		leaveActions: new MultiKeyCollection(),
	};

	const assertKnown = (state: unknown, side: string, label: string) => {
		if (typeof state !== "string") {
			throw new StateMachineInitError(
				`${side} state must be a string. hook: ${label}`
			);
		}
		if (state !== ANY && !states.has(state)) {
			throw new StateMachineInitError(
				`Unknown ${side} state "${state}". hook: ${label}`
			);
		}
		return state;
	};

	// 3.-5. hooks
	for (const descriptor of description.hooks ?? []) {
		const { handle } = descriptor;
		const label = describe(descriptor);

		// 3. shape
		if (typeof handle !== "function") {
			throw new StateMachineInitError(`Hook handle must be a function. hook: ${label}`);
		}
		const problem = hookShapeProblem(handle);
		if (problem) {
			throw new StateMachineInitError(`${problem}. hook: ${label}`);
		}

		const receiver = descriptor.static ? undefined : description.host;
		const hook = adapter.adapt(handle, receiver);

		switch (descriptor.kind) {
			// 4. keyed by (from, to)
			case "guard":
			case "listener": {
				const from = assertKnown(descriptor.from, "from", label);
				const to = assertKnown(descriptor.to, "to", label);
				const registry =
					descriptor.kind === "guard"
						? registries.guards
						: registries.listeners;
				if (!registry.put(new TransitionKey(from, to), hook)) {
					logger.warn(`Duplicate hook registration ignored. hook: ${label}`);
				}
				break;
			}
			// 5. keyed by state
			case "enter":
			case "leave": {
				const state = assertKnown(descriptor.state, "action", label);
				const registry =
					descriptor.kind === "enter"
						? registries.enterActions
						: registries.leaveActions;
				if (!registry.put(state, hook)) {
					logger.warn(`Duplicate hook registration ignored. hook: ${label}`);
				}
				break;
			}
			default:
				throw new StateMachineInitError(`Unknown hook kind. hook: ${label}`);
		}
	}

	return registries;
}

/** Human-readable hook label for log and error messages. */
function describe(descriptor: HookDescriptor): string {
	const name =
		typeof descriptor.handle === "function" && descriptor.handle.name
			? descriptor.handle.name
			: "<anonymous>";
	const any = (s: string) => (s === ANY ? "<Any>" : s);
	if (descriptor.kind === "guard" || descriptor.kind === "listener") {
		return `${descriptor.kind} ${name} (${any(descriptor.from)} -> ${any(descriptor.to)})`;
	}
	if (descriptor.kind === "enter" || descriptor.kind === "leave") {
		return `${descriptor.kind} ${name} (${any(descriptor.state)})`;
	}
	return name;
}
