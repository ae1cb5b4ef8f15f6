/**
 * Base class of every error raised by the state machine.
 */
export class StateMachineError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "StateMachineError";
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/**
 * The declarative description is malformed or contradictory. Thrown from the
 * constructor; no instance is produced.
 */
export class StateMachineInitError extends StateMachineError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "StateMachineInitError";
	}
}

/**
 * A requested transition was rejected: no exact guard hook exists for the
 * pair, or a guard hook threw. Reported through `lastFailure`, never thrown by
 * `requestTransition`.
 */
export class SwitchStateError extends StateMachineError {
	readonly from: string;
	readonly to: string;

	constructor(
		from: string,
		to: string,
		reason?: string,
		options?: { cause?: unknown }
	) {
		super(
			`State can't switch from "${from}" to "${to}"` +
				(reason ? `, ${reason}` : ""),
			options
		);
		this.name = "SwitchStateError";
		this.from = from;
		this.to = to;
	}
}

/** The transition target is not a member of the state set. */
export class StateNotFoundError extends SwitchStateError {
	readonly state: string;

	constructor(from: string, state: string) {
		super(from, state, `state "${state}" not found`);
		this.name = "StateNotFoundError";
		this.state = state;
	}
}

/** A public method was called with a missing or empty argument. */
export class ArgumentError extends StateMachineError {
	readonly argument: string;

	constructor(argument: string, message: string) {
		super(`Invalid argument "${argument}": ${message}`);
		this.name = "ArgumentError";
		this.argument = argument;
	}
}
