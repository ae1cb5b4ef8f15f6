import { createPubSub, type Unsubscriber } from "@marianmeres/pubsub";
import {
	ArgumentError,
	StateNotFoundError,
	SwitchStateError,
} from "./errors.ts";
import { defaultLogger, type Logger } from "./logger.ts";
import { fromMermaid as fromMermaidParser, renderMermaid } from "./mermaid.ts";
import type { MultiKeyCollection } from "./multi-key-collection.ts";
import {
	ALLOW,
	buildRegistries,
	HookAdapter,
	hookShapeProblem,
	type Direction,
	type HookHandle,
	type Registries,
	type StateMachineDescription,
	type TransitionHook,
} from "./registry.ts";
import { ANY, TransitionKey } from "./transition-key.ts";

/**
 * Receives failures raised by transition listeners, enter/leave actions and
 * change subscribers. Those run after the transition is committed, so their
 * failures can never undo it.
 */
export type NotificationErrorHandler = (
	error: unknown,
	key: TransitionKey
) => void;

/** Runtime options, separate from the declarative description. */
export type StateMachineOptions = {
	/** Enable debug logging (default: false) */
	debug?: boolean;
	/** Custom logger implementing Logger interface (default: clog) */
	logger?: Logger;
	/** Where notification failures go (default: logged as errors) */
	onNotificationError?: NotificationErrorHandler;
};

/**
 * Published state data sent to subscribers.
 * `previous` is null until the first successful transition.
 */
export type PublishedState = {
	current: string;
	previous: string | null;
};

/** Internal "change" event payload, captured at commit. */
type ChangeEvent = {
	data: PublishedState;
	key: TransitionKey;
};

/**
 * Factory function to create a state machine instance.
 * Equivalent to calling `new StateMachine(description, options)`.
 *
 * @throws StateMachineInitError if the description is malformed
 */
export function createStateMachine(
	description: StateMachineDescription,
	options?: StateMachineOptions
): StateMachine {
	return new StateMachine(description, options);
}

/**
 * A synchronous, declaratively described finite state machine.
 *
 * The machine moves only when asked to (`requestTransition`) and only along
 * pairs which have at least one *exact* guard hook. Guard hooks run before the
 * state changes and veto by throwing. Listeners, enter and leave actions run
 * after the change and can't veto; their failures are isolated.
 *
 * Execution order of a successful transition `A -> B`:
 * 1. guard hooks `(any, any)`, `(A, any)`, `(any, B)`, `(A, B)`
 * 2. state changes, `A` appended to history
 * 3. leave actions of `A`
 * 4. transition listeners `(A, B)`
 * 5. enter actions of `B`
 * 6. subscribers notified
 *
 * Not safe for overlapping transitions on the same instance. Hooks may call
 * `requestTransition` recursively; keeping that sane is up to the hook.
 *
 * @example
 * ```typescript
 * const machine = new StateMachine({
 *   states: [
 *     { id: "off", value: "OFF", initial: true },
 *     { id: "on", value: "ON" },
 *   ],
 *   hooks: [{ kind: "guard", from: "OFF", to: "ON", handle: StateMachine.ALLOW }],
 * });
 *
 * machine.requestTransition("ON"); // true
 * machine.requestTransition("OFF"); // false, no OFF <- ON guard
 * machine.lastFailure; // SwitchStateError
 * ```
 */
export class StateMachine {
	/** No-op guard hook: registering it under a key permits that transition. */
	static readonly ALLOW: TransitionHook = ALLOW;

	/** Current state */
	#state: string;

	/** Previously held states, oldest first */
	#history: string[] = [];

	/** Most recent rejected-transition condition */
	#lastFailure: Error | null = null;

	#registries: Registries;

	#adapter = new HookAdapter();

	/** Internal pub sub */
	#pubsub = createPubSub();

	/** Logger instance */
	#logger: Logger;

	/** Debug mode flag */
	#debug: boolean;

	/**
	 * Failure handler for post-commit notifications. When unset, failures are
	 * logged with `logger.error`.
	 */
	onNotificationError: NotificationErrorHandler | undefined;

	/**
	 * Creates a new machine from a declarative description.
	 * @throws StateMachineInitError if the description is malformed or contradictory
	 */
	constructor(
		description: StateMachineDescription,
		options: StateMachineOptions = {}
	) {
		this.#debug = options.debug ?? false;
		this.#logger = options.logger ?? defaultLogger;
		this.onNotificationError = options.onNotificationError;
		this.#registries = buildRegistries(description, this.#logger, this.#adapter);
		this.#state = this.#registries.initial;
		this.#debugLog(
			`created with ${this.#registries.states.size} states, initial "${this.#state}"`
		);
	}

	/** Log debug message if debug mode is enabled */
	#debugLog(...args: unknown[]): void {
		if (this.#debug) {
			this.#logger.debug("[StateMachine]", ...args);
		}
	}

	get debug(): boolean {
		return this.#debug;
	}

	get logger(): Logger {
		return this.#logger;
	}

	/** Current state. Non-reactive; use `subscribe()` for updates. */
	get state(): string {
		return this.#state;
	}

	get initial(): string {
		return this.#registries.initial;
	}

	/** Snapshot of the state set. */
	get states(): ReadonlySet<string> {
		return new Set(this.#registries.states);
	}

	/** Snapshot of previously held states, oldest first. */
	get history(): readonly string[] {
		return [...this.#history];
	}

	/**
	 * The condition which made the most recent `requestTransition` return false:
	 * a `StateNotFoundError`, a `SwitchStateError`, or whatever a guard hook threw.
	 * A successful transition does not clear it.
	 */
	get lastFailure(): Error | null {
		return this.#lastFailure;
	}

	is(state: string): boolean {
		return this.#state === state;
	}

	#getNotifyData(): PublishedState {
		return {
			current: this.#state,
			previous: this.#history.at(-1) ?? null,
		};
	}

	/**
	 * Subscribes to state changes. The callback is invoked immediately with the
	 * current state and after every successful transition (after enter actions).
	 * A throwing subscriber is handled like a throwing listener.
	 *
	 * @returns Unsubscriber function to stop receiving updates
	 */
	subscribe(cb: (data: PublishedState) => void): Unsubscriber {
		this.#debugLog("subscribe() called");
		const unsub = this.#pubsub.subscribe("change", (event: ChangeEvent) => {
			this.#invokeSafely(() => cb(event.data), event.key);
		});
		cb(this.#getNotifyData());
		return unsub;
	}

	/**
	 * Requests a transition to `next`.
	 *
	 * Returns false, with `lastFailure` describing why and nothing changed, when:
	 * - `next` is not a known state (`StateNotFoundError`)
	 * - no exact guard hook is registered for `(current, next)`; wildcard hooks
	 *   alone never suffice (`SwitchStateError`)
	 * - a guard hook throws (the thrown error)
	 *
	 * Otherwise commits and notifies, and returns true regardless of how the
	 * notifications fare.
	 *
	 * @throws ArgumentError if `next` is not a non-empty string
	 */
	requestTransition(next: string): boolean {
		if (typeof next !== "string" || next === ANY) {
			throw new ArgumentError("next", "must be a non-empty state");
		}
		const current = this.#state;
		const { states, guards, listeners, enterActions, leaveActions } =
			this.#registries;
		this.#debugLog(`requestTransition("${next}") called from "${current}"`);

		if (!states.has(next)) {
			this.#lastFailure = new StateNotFoundError(current, next);
			this.#debugLog(`requestTransition("${next}") failed: unknown state`);
			return false;
		}

		const key = new TransitionKey(current, next);

		// snapshots, so hooks may add/remove registrations while we iterate
		const exact = guards.valuesClone(key);
		if (exact.size === 0) {
			this.#lastFailure = new SwitchStateError(
				current,
				next,
				`no exact hook registered, add at least one, e.g. ` +
					`addHook(new TransitionKey("${current}", "${next}"), StateMachine.ALLOW)`
			);
			this.#debugLog(`requestTransition("${next}") failed: no exact hook`);
			return false;
		}
		const anyToAny = guards.valuesClone(new TransitionKey(ANY, ANY));
		const currentToAny = guards.valuesClone(new TransitionKey(current, ANY));
		const anyToNext = guards.valuesClone(new TransitionKey(ANY, next));

		try {
			for (const hooks of [anyToAny, currentToAny, anyToNext, exact]) {
				for (const hook of hooks) hook(key);
			}
		} catch (error) {
			this.#lastFailure =
				error instanceof Error
					? error
					: new SwitchStateError(current, next, String(error), {
							cause: error,
					  });
			this.#debugLog(`requestTransition("${next}") failed: guard rejected`);
			return false;
		}

		// commit
		this.#state = next;
		this.#history.push(current);
		this.#debugLog(`"${current}" -> "${next}"`);

		// notify, best effort
		this.#invokeAll(leaveActions.valuesClone(current), key);
		this.#invokeAll(listeners.valuesClone(key), key);
		this.#invokeAll(enterActions.valuesClone(next), key);
		// what was committed here, even if an action moved the machine on
		const event: ChangeEvent = {
			data: { current: next, previous: current },
			key,
		};
		this.#pubsub.publish("change", event);

		return true;
	}

	#invokeAll(hooks: Set<TransitionHook>, key: TransitionKey): void {
		for (const hook of hooks) {
			this.#invokeSafely(() => hook(key), key);
		}
	}

	/** Runs a post-commit callable; its failure never propagates. */
	#invokeSafely(fn: () => void, key: TransitionKey): void {
		try {
			fn();
		} catch (error) {
			const handler = this.onNotificationError;
			if (!handler) {
				this.#logger.error(`Notification failed on ${key}`, error);
				return;
			}
			try {
				handler(error, key);
			} catch (handlerError) {
				this.#logger.error(
					`onNotificationError handler failed on ${key}`,
					handlerError
				);
			}
		}
	}

	/**
	 * Registers a guard hook under `key`. Keys naming unknown states are
	 * accepted, they just never match.
	 * @returns false if the same hook is already registered under `key`
	 * @throws ArgumentError if `key` is not a TransitionKey, or `hook` is not a
	 * synchronous function of at most one parameter
	 */
	addHook(key: TransitionKey, hook: HookHandle): boolean {
		assertKey(key);
		return this.#registries.guards.put(key, this.#adapter.adapt(assertAddable(hook)));
	}

	/**
	 * Unregisters a guard hook.
	 * @returns false if it was not registered under `key`
	 */
	removeHook(key: TransitionKey, hook: HookHandle): boolean {
		assertKey(key);
		return this.#removeFrom(this.#registries.guards, key, assertHook(hook));
	}

	/** Registers a transition listener under `key`. */
	addAction(key: TransitionKey, hook: HookHandle): boolean;
	/** Registers an enter or leave action for `state`. */
	addAction(state: string, direction: Direction, hook: HookHandle): boolean;
	addAction(
		target: TransitionKey | string,
		directionOrHook: Direction | HookHandle,
		hook?: HookHandle
	): boolean {
		if (target instanceof TransitionKey) {
			const adapted = this.#adapter.adapt(assertAddable(directionOrHook));
			return this.#registries.listeners.put(target, adapted);
		}
		const registry = this.#stateActions(target, directionOrHook);
		return registry.put(target, this.#adapter.adapt(assertAddable(hook)));
	}

	/** Unregisters a transition listener. */
	removeAction(key: TransitionKey, hook: HookHandle): boolean;
	/** Unregisters an enter or leave action. */
	removeAction(state: string, direction: Direction, hook: HookHandle): boolean;
	removeAction(
		target: TransitionKey | string,
		directionOrHook: Direction | HookHandle,
		hook?: HookHandle
	): boolean {
		if (target instanceof TransitionKey) {
			const handle = assertHook(directionOrHook);
			return this.#removeFrom(this.#registries.listeners, target, handle);
		}
		const registry = this.#stateActions(target, directionOrHook);
		const handle = assertHook(hook);
		if (target === ANY) {
			throw new ArgumentError("state", "must not be empty");
		}
		return this.#removeFrom(registry, target, handle);
	}

	#stateActions(
		state: unknown,
		direction: Direction | HookHandle
	): MultiKeyCollection<string, TransitionHook> {
		if (typeof state !== "string") {
			throw new ArgumentError("state", "must be a string");
		}
		if (direction === "enter") return this.#registries.enterActions;
		if (direction === "leave") return this.#registries.leaveActions;
		throw new ArgumentError("direction", `must be "enter" or "leave"`);
	}

	#removeFrom<K>(
		registry: MultiKeyCollection<K, TransitionHook>,
		key: K,
		handle: HookHandle
	): boolean {
		// a handle may be registered both bound to the host and unbound
		let removed = false;
		for (const adapted of this.#adapter.lookup(handle)) {
			if (registry.removeMapping(key, adapted)) removed = true;
		}
		return removed;
	}

	/**
	 * Renders the exact guard keys as a Mermaid stateDiagram-v2.
	 * Wildcard keys are not edges and are left out.
	 *
	 * @example
	 * ```typescript
	 * console.log(machine.toMermaid());
	 * // stateDiagram-v2
	 * //     [*] --> OFF
	 * //     OFF --> ON
	 * ```
	 */
	toMermaid(): string {
		return renderMermaid(
			this.#registries.initial,
			this.#registries.guards.keySetClone()
		);
	}

	/**
	 * Creates a machine from a Mermaid stateDiagram-v2. Every edge becomes a
	 * state pair permitted by an `ALLOW` guard hook.
	 */
	static fromMermaid(
		diagram: string,
		options?: StateMachineOptions
	): StateMachine {
		return new StateMachine(fromMermaidParser(diagram), options);
	}
}

function assertKey(key: unknown): void {
	if (!(key instanceof TransitionKey)) {
		throw new ArgumentError("key", "must be a TransitionKey");
	}
}

function assertHook(hook: Direction | HookHandle | undefined): HookHandle {
	if (typeof hook !== "function") {
		throw new ArgumentError("hook", "must be a function");
	}
	return hook;
}

function assertAddable(hook: Direction | HookHandle | undefined): HookHandle {
	const handle = assertHook(hook);
	const problem = hookShapeProblem(handle);
	if (problem) {
		throw new ArgumentError("hook", problem);
	}
	return handle;
}
