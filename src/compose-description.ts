import type {
	HookDescriptor,
	StateDescriptor,
	StateMachineDescription,
} from "./registry.ts";

/**
 * A partial description for composition. Any fragment may declare states,
 * hooks or a host; exactly one initial state must remain after composing.
 */
export type StateMachineDescriptionFragment = Partial<StateMachineDescription>;

/**
 * Options for composing descriptions.
 */
export type ComposeDescriptionOptions = {
	/**
	 * How to handle fragments marking different initial states.
	 *
	 * - 'last-wins': Later fragments override earlier ones (default)
	 * - 'error': Throw an error
	 */
	onConflict?: "last-wins" | "error";
};

/**
 * Composes multiple description fragments into a single description.
 *
 * States and hooks are concatenated in fragment order; duplicates are left in
 * place for the registry builder to log and skip. The host of the last
 * fragment defining one wins.
 *
 * @example
 * ```typescript
 * const core = {
 *   states: [
 *     { id: "idle", value: "IDLE", initial: true },
 *     { id: "running", value: "RUNNING" },
 *   ],
 *   hooks: [{ kind: "guard", from: "IDLE", to: "RUNNING", handle: ALLOW }],
 * };
 *
 * const errorHandling = {
 *   states: [{ id: "failed", value: "FAILED" }],
 *   hooks: [{ kind: "guard", from: "", to: "FAILED", handle: ALLOW }],
 * };
 *
 * const machine = new StateMachine(
 *   composeDescription([core, withErrors && errorHandling])
 * );
 * ```
 *
 * @param fragments - Description fragments (falsy values are filtered out)
 * @throws Error if no valid fragment is given, or on an initial state conflict in 'error' mode
 */
export function composeDescription(
	fragments: (StateMachineDescriptionFragment | false | null | undefined)[],
	options: ComposeDescriptionOptions = {}
): StateMachineDescription {
	const { onConflict = "last-wins" } = options;

	// Filter out falsy values (allows conditional fragments)
	const validFragments = fragments.filter(
		(f): f is StateMachineDescriptionFragment => Boolean(f)
	);

	if (validFragments.length === 0) {
		throw new Error("composeDescription requires at least one valid fragment");
	}

	let host: object | undefined;
	let initial: unknown;
	let hasInitial = false;
	const states: StateDescriptor[] = [];
	const hooks: HookDescriptor[] = [];

	for (const fragment of validFragments) {
		if (fragment.host) host = fragment.host;

		const marked = (fragment.states ?? []).filter((s) => s.initial);
		if (marked.length > 0) {
			for (const s of marked) {
				if (onConflict === "error" && hasInitial && initial !== s.value) {
					throw new Error(
						`Conflict: multiple fragments define different initial states: "${String(initial)}" vs "${String(s.value)}"`
					);
				}
			}
			// the later fragment's marker replaces earlier ones
			for (const s of states) s.initial = false;
			hasInitial = true;
			initial = marked[marked.length - 1].value;
		}

		states.push(...(fragment.states ?? []).map((s) => ({ ...s })));
		hooks.push(...(fragment.hooks ?? []).map((h) => ({ ...h })));
	}

	const result: StateMachineDescription = { states, hooks };
	if (host) result.host = host;
	return result;
}
