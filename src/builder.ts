import {
	ALLOW,
	type HookDescriptor,
	type HookHandle,
	type StateDescriptor,
	type StateMachineDescription,
} from "./registry.ts";
import { StateMachine, type StateMachineOptions } from "./state-machine.ts";

type HookOptions = {
	/** Do not bind the handle to the builder's host */
	static?: boolean;
};

/**
 * Fluent alternative to writing a `StateMachineDescription` by hand.
 *
 * The builder only collects declarations. Validation happens when the
 * description is built into a machine, so a builder-made description fails
 * exactly like an equivalent hand-written one.
 *
 * @example
 * ```typescript
 * const machine = describeStateMachine()
 *   .initial("IDLE")
 *   .state("RUNNING")
 *   .allow("IDLE", "RUNNING")
 *   .guard(ANY, "RUNNING", (key) => assertQuota(key))
 *   .onEnter("RUNNING", () => console.log("started"))
 *   .build();
 * ```
 */
export class StateMachineBuilder {
	#host: object | undefined;
	#states: StateDescriptor[] = [];
	#hooks: HookDescriptor[] = [];

	/** Sets the receiver of every non-static handle. */
	host(host: object): this {
		this.#host = host;
		return this;
	}

	state(value: string, options: { initial?: boolean; id?: string } = {}): this {
		this.#states.push({
			id: options.id ?? value,
			value,
			initial: options.initial ?? false,
		});
		return this;
	}

	/** Shortcut for `state(value, { initial: true })`. */
	initial(value: string): this {
		return this.state(value, { initial: true });
	}

	/** Adds a guard hook; use `ANY` (`""`) on either side for a wildcard. */
	guard(
		from: string,
		to: string,
		handle: HookHandle,
		options: HookOptions = {}
	): this {
		this.#hooks.push({ kind: "guard", from, to, handle, ...options });
		return this;
	}

	/** Permits `from -> to` without any check. */
	allow(from: string, to: string): this {
		return this.guard(from, to, ALLOW, { static: true });
	}

	listener(
		from: string,
		to: string,
		handle: HookHandle,
		options: HookOptions = {}
	): this {
		this.#hooks.push({ kind: "listener", from, to, handle, ...options });
		return this;
	}

	onEnter(state: string, handle: HookHandle, options: HookOptions = {}): this {
		this.#hooks.push({ kind: "enter", state, handle, ...options });
		return this;
	}

	onLeave(state: string, handle: HookHandle, options: HookOptions = {}): this {
		this.#hooks.push({ kind: "leave", state, handle, ...options });
		return this;
	}

	/** Returns a copy of the collected description. */
	toDescription(): StateMachineDescription {
		const description: StateMachineDescription = {
			states: this.#states.map((s) => ({ ...s })),
			hooks: this.#hooks.map((h) => ({ ...h })),
		};
		if (this.#host) description.host = this.#host;
		return description;
	}

	/** @throws StateMachineInitError if the collected description is invalid */
	build(options?: StateMachineOptions): StateMachine {
		return new StateMachine(this.toDescription(), options);
	}
}

/** Starts a new `StateMachineBuilder`. */
export function describeStateMachine(): StateMachineBuilder {
	return new StateMachineBuilder();
}
