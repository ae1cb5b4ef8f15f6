/**
 * @module
 *
 * Declarative finite state machine with guarded transitions.
 *
 * A machine is built from a description of states, guard hooks, transition
 * listeners and enter/leave actions. A transition `A -> B` is only possible
 * when at least one exact `(A, B)` guard hook is registered; guard hooks veto
 * by throwing. Listeners and actions run after the change, best effort.
 *
 * @example Basic usage
 * ```typescript
 * import { StateMachine } from "guarded-fsm";
 *
 * const machine = new StateMachine({
 *   states: [
 *     { id: "idle", value: "IDLE", initial: true },
 *     { id: "loading", value: "LOADING" },
 *   ],
 *   hooks: [
 *     { kind: "guard", from: "IDLE", to: "LOADING", handle: StateMachine.ALLOW },
 *     { kind: "enter", state: "LOADING", handle: () => console.log("loading") },
 *   ],
 * });
 *
 * machine.requestTransition("LOADING"); // true
 * machine.history; // ["IDLE"]
 * ```
 *
 * @example Builder
 * ```typescript
 * import { describeStateMachine } from "guarded-fsm";
 *
 * const machine = describeStateMachine()
 *   .initial("IDLE")
 *   .state("LOADING")
 *   .allow("IDLE", "LOADING")
 *   .build();
 * ```
 *
 * @example Mermaid diagram support
 * ```typescript
 * import { StateMachine } from "guarded-fsm";
 *
 * const machine = StateMachine.fromMermaid(`
 *   stateDiagram-v2
 *   [*] --> IDLE
 *   IDLE --> ACTIVE
 *   ACTIVE --> IDLE
 * `);
 * ```
 */

export * from "./errors.ts";
export * from "./logger.ts";
export * from "./multi-key-collection.ts";
export * from "./transition-key.ts";
export * from "./registry.ts";
export * from "./state-machine.ts";
export * from "./builder.ts";
export * from "./compose-description.ts";
export * from "./mermaid.ts";
