import { ArgumentError } from "./errors.ts";

/** Wildcard sentinel: matches any state inside a `TransitionKey`. */
export const ANY = "";

/**
 * Identifies a transition from one state to another. Either side may be the
 * `ANY` wildcard. Two keys are equal when both sides are equal.
 *
 * @example
 * ```typescript
 * new TransitionKey("IDLE", "RUNNING"); // exact
 * new TransitionKey(ANY, "FAILED");     // any -> FAILED
 * ```
 */
export class TransitionKey {
	readonly from: string;
	readonly to: string;

	constructor(from: string = ANY, to: string = ANY) {
		if (typeof from !== "string") {
			throw new ArgumentError("from", "must be a string");
		}
		if (typeof to !== "string") {
			throw new ArgumentError("to", "must be a string");
		}
		this.from = from;
		this.to = to;
	}

	/**
	 * Lookup identity of this key. Both sides are encoded as a JSON pair, so no
	 * two distinct keys collide (`("a,b", "")` vs `("a", "b,")` included).
	 */
	get id(): string {
		return JSON.stringify([this.from, this.to]);
	}

	get isWildcard(): boolean {
		return this.from === ANY || this.to === ANY;
	}

	equals(other: TransitionKey): boolean {
		return this.from === other.from && this.to === other.to;
	}

	toString(): string {
		const from = this.from === ANY ? "<Any>" : this.from;
		const to = this.to === ANY ? "<Any>" : this.to;
		return `TransitionKey(${from} -> ${to})`;
	}

	/** `KeyOf` adapter for `MultiKeyCollection`. */
	static idOf(key: TransitionKey): string {
		return key.id;
	}
}
