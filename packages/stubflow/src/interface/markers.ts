/**
 * Declarative markers for workflow interface methods.
 *
 * A method is declared with its call signature, a return type token and any
 * number of markers. Role markers (`workflowMethod`, `signalMethod`,
 * `queryMethod`) give it a role and optionally an explicit name; option
 * markers (`methodRetry`, `cronSchedule`) shape the options of the workflow
 * it starts.
 *
 * @example
 * ```typescript
 * const greet = method<(name: string) => string>(
 *   returns.string(),
 *   workflowMethod({ name: "Greet", taskQueue: "greetings" }),
 *   methodRetry({ attempts: 3 })
 * );
 * ```
 */

import type { ReturnSpec } from "../returns";
import type { MethodRole, RetryOptions, WorkflowIdReusePolicy } from "../types";

// =============================================================================
// Markers
// =============================================================================

/**
 * Options accepted by {@link workflowMethod}. Everything except `name` is a
 * method-level default for the started workflow.
 */
export type WorkflowMethodOptions = {
  /** Workflow type. Defaults to the method identifier. */
  name?: string;
  taskQueue?: string;
  executionTimeoutMs?: number;
  runTimeoutMs?: number;
  idReusePolicy?: WorkflowIdReusePolicy;
};

export type WorkflowMethodMarker = {
  readonly type: "workflow";
  readonly options: Readonly<WorkflowMethodOptions>;
};

export type SignalMethodMarker = {
  readonly type: "signal";
  readonly name?: string;
};

export type QueryMethodMarker = {
  readonly type: "query";
  readonly name?: string;
};

export type MethodRetryMarker = {
  readonly type: "retry";
  readonly retry: Readonly<RetryOptions>;
};

export type CronScheduleMarker = {
  readonly type: "cron";
  readonly schedule: string;
};

export type RoleMarker = WorkflowMethodMarker | SignalMethodMarker | QueryMethodMarker;

export type MethodMarker = RoleMarker | MethodRetryMarker | CronScheduleMarker;

/** Mark a method as the workflow entry point. */
export function workflowMethod(options: WorkflowMethodOptions = {}): WorkflowMethodMarker {
  return Object.freeze({ type: "workflow" as const, options: Object.freeze({ ...options }) });
}

/** Mark a method as a signal. */
export function signalMethod(options: { name?: string } = {}): SignalMethodMarker {
  return Object.freeze({ type: "signal" as const, name: options.name });
}

/** Mark a method as a query. */
export function queryMethod(options: { name?: string } = {}): QueryMethodMarker {
  return Object.freeze({ type: "query" as const, name: options.name });
}

/** Method-level retry options for the workflow this method starts. */
export function methodRetry(retry: RetryOptions): MethodRetryMarker {
  return Object.freeze({ type: "retry" as const, retry: Object.freeze({ ...retry }) });
}

/** Method-level cron schedule for the workflow this method starts. */
export function cronSchedule(schedule: string): CronScheduleMarker {
  return Object.freeze({ type: "cron" as const, schedule });
}

export function isRoleMarker(marker: MethodMarker): marker is RoleMarker {
  return marker.type === "workflow" || marker.type === "signal" || marker.type === "query";
}

/** Role carried by a role marker. */
export function roleOf(marker: RoleMarker): MethodRole {
  return marker.type;
}

// =============================================================================
// Method definitions
// =============================================================================

/**
 * Any method call signature. `never` parameters accept every signature.
 */
export type MethodSignature = (...args: never) => unknown;

/**
 * One declared interface method.
 *
 * @template F - The method's call signature; only used for typing stubs.
 */
export interface MethodDefinition<F extends MethodSignature = MethodSignature> {
  readonly returns: ReturnSpec<ReturnType<F>>;
  readonly markers: readonly MethodMarker[];
  /** Type-only carrier for the call signature. Never set at runtime. */
  readonly signature?: F;
}

/**
 * Declare an interface method.
 *
 * @param returnType - Token for the declared return type of `F`
 * @param markers - Role and option markers
 */
export function method<F extends MethodSignature = () => void>(
  returnType: ReturnSpec<ReturnType<F>>,
  ...markers: MethodMarker[]
): MethodDefinition<F> {
  return Object.freeze({ returns: returnType, markers: Object.freeze([...markers]) });
}
