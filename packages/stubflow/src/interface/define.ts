import type { WorkflowOptions } from "../types";
import type { MethodDefinition } from "./markers";

/**
 * Methods of a workflow interface, keyed by method identifier.
 */
export type MethodMap = Readonly<Record<string, MethodDefinition>>;

/**
 * A declared workflow interface.
 */
export interface WorkflowInterface<M extends MethodMap = MethodMap> {
  readonly name: string;
  readonly methods: M;
  /** Interface-level option defaults, the lowest precedence layer. */
  readonly defaults: Readonly<WorkflowOptions>;
}

/**
 * Declare a workflow interface.
 *
 * The returned object is frozen and is the identity under which its resolved
 * descriptor is cached, so define each interface once at module scope.
 *
 * @example
 * ```typescript
 * export const Greeter = defineWorkflowInterface("Greeter", {
 *   greet: method<(name: string) => string>(returns.string(), workflowMethod({ name: "Greet" })),
 *   cancel: method<() => void>(returns.void(), signalMethod({ name: "Cancel" })),
 *   greetings: method<() => number>(returns.number(), queryMethod()),
 * }, { defaults: { taskQueue: "greetings" } });
 * ```
 */
export function defineWorkflowInterface<M extends MethodMap>(
  name: string,
  methods: M,
  options: { defaults?: WorkflowOptions } = {}
): WorkflowInterface<M> {
  if (typeof name !== "string" || name.length === 0) {
    throw new TypeError(
      "defineWorkflowInterface: name must be a non-empty string. Example: defineWorkflowInterface('Greeter', { ... })"
    );
  }
  return Object.freeze({
    name,
    methods: Object.freeze({ ...methods }),
    defaults: Object.freeze({ ...options.defaults }),
  });
}
