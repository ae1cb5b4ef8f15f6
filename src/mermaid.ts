import {
	ALLOW,
	type HookDescriptor,
	type StateMachineDescription,
} from "./registry.ts";
import type { TransitionKey } from "./transition-key.ts";

/**
 * Parses a Mermaid stateDiagram-v2 notation into a state machine description.
 *
 * Every `A --> B` edge declares both states and permits the transition with an
 * `ALLOW` guard hook. Edge labels (`A --> B: label`) are accepted and ignored.
 *
 * **Ignored Mermaid features (non-FSM lines):**
 * - YAML frontmatter (`---\nconfig: ...\n---`)
 * - Comments (`%%`) and directives (`%%{...}%%`)
 * - Styling (`classDef`, `class`, `style`)
 * - State descriptions (`state "Description" as StateName`)
 * - Composite states (`state StateName { ... }`)
 * - Notes (`note left of`, `note right of`)
 * - Final state transitions (`StateName --> [*]`)
 * - Direction statements (`direction LR`, ...)
 * - Any other unrecognized lines
 *
 * @param mermaidDiagram - A Mermaid stateDiagram-v2 string
 * @throws Error if the diagram is invalid (missing header or initial state)
 *
 * @example
 * ```typescript
 * const description = fromMermaid(`
 *   stateDiagram-v2
 *   [*] --> OFF
 *   OFF --> ON: toggle
 *   ON --> OFF: toggle
 * `);
 * const machine = new StateMachine(description);
 * ```
 */
export function fromMermaid(mermaidDiagram: string): StateMachineDescription {
	const lines = mermaidDiagram.trim().split("\n");

	// Find the stateDiagram-v2 header, skipping any YAML frontmatter
	const startIndex = lines.findIndex((line) =>
		line.trim().startsWith("stateDiagram-v2")
	);

	if (startIndex === -1) {
		throw new Error('Invalid mermaid diagram: must contain "stateDiagram-v2"');
	}

	let initial: string | null = null;
	const states: string[] = [];
	const edges = new Map<string, [string, string]>();

	const declare = (state: string) => {
		if (!states.includes(state)) states.push(state);
	};

	for (const raw of lines.slice(startIndex + 1)) {
		const line = raw.trim();

		if (!line) continue;
		if (line.startsWith("%%")) continue;
		if (line.startsWith("direction ")) continue;
		if (/^(classDef|class|style)\s/.test(line)) continue;
		if (/^state\s+["']/.test(line)) continue;
		if (/^state\s+\w+\s*\{/.test(line) || line === "{" || line === "}") {
			continue;
		}
		if (/^note\s/.test(line)) continue;
		if (/-->\s*\[\*\]\s*$/.test(line)) continue;

		// [*] --> StateName
		const initialMatch = line.match(/^\[\*\]\s*-->\s*(\w+)$/);
		if (initialMatch) {
			initial = initialMatch[1];
			declare(initial);
			continue;
		}

		// StateA --> StateB or StateA --> StateB: label
		const edgeMatch = line.match(/^(\w+)\s*-->\s*(\w+)(?:\s*:.*)?$/);
		if (edgeMatch) {
			const [, from, to] = edgeMatch;
			declare(from);
			declare(to);
			edges.set(JSON.stringify([from, to]), [from, to]);
		}
	}

	if (!initial) {
		throw new Error(
			"Invalid mermaid diagram: no initial state found ([*] --> State)"
		);
	}

	const hooks = [...edges.values()].map(([from, to]): HookDescriptor => ({
		kind: "guard",
		from,
		to,
		handle: ALLOW,
		static: true,
	}));

	return {
		states: states.map((state) => ({
			id: state,
			value: state,
			initial: state === initial,
		})),
		hooks,
	};
}

/**
 * Renders a Mermaid stateDiagram-v2 from an initial state and a list of guard
 * keys. Keys with a wildcard side are skipped.
 */
export function renderMermaid(
	initial: string,
	keys: readonly TransitionKey[]
): string {
	let mermaid = "stateDiagram-v2\n";
	mermaid += `    [*] --> ${initial}\n`;
	for (const key of keys) {
		if (key.isWildcard) continue;
		mermaid += `    ${key.from} --> ${key.to}\n`;
	}
	return mermaid;
}
