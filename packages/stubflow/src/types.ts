/**
 * Core types shared by the resolver, the router and the typed stubs.
 *
 * The workflow handle and the signal-with-start batch are collaborators:
 * stubflow only calls them. Transport, payload conversion and retries live
 * behind these interfaces.
 */

import type { ReturnSpec } from "./returns";

// =============================================================================
// Roles and modes
// =============================================================================

/**
 * Role of an interface method.
 * - `workflow`: the entry point that starts an execution and names its type
 * - `signal`: one-way notification to a running execution
 * - `query`: synchronous read of an execution's state
 */
export type MethodRole = "workflow" | "signal" | "query";

/**
 * How the next typed call on a stub is interpreted.
 * - `sync`: run the call and wait for its outcome (the default)
 * - `start`: start the workflow and record its execution
 * - `execute`: start the workflow and record a future of its result
 * - `signalWithStart`: record the call into a signal-with-start batch
 */
export type InvocationMode = "sync" | "start" | "execute" | "signalWithStart";

/** Modes that must be entered explicitly on an invocation context. */
export type AsyncInvocationMode = Exclude<InvocationMode, "sync">;

// =============================================================================
// Options
// =============================================================================

/**
 * Whether starting a workflow whose id already has an execution is an error.
 */
export type WorkflowIdReusePolicy =
  | "AllowDuplicateFailedOnly"
  | "AllowDuplicate"
  | "RejectDuplicate";

/** Reuse policy used when none is configured. */
export const DEFAULT_ID_REUSE_POLICY: WorkflowIdReusePolicy = "AllowDuplicateFailedOnly";

/**
 * Backoff strategy between workflow retries.
 */
export type BackoffStrategy = "fixed" | "linear" | "exponential";

/**
 * Retry options for a workflow execution, declared with `methodRetry()` or
 * passed in {@link WorkflowOptions}.
 */
export type RetryOptions = {
  /**
   * Total number of attempts (1 = no retry).
   */
  attempts: number;

  /**
   * @default 'exponential'
   */
  backoff?: BackoffStrategy;

  /**
   * Initial delay in milliseconds before the first retry.
   */
  initialDelay?: number;

  /**
   * Maximum delay cap in milliseconds.
   */
  maxDelay?: number;

  /**
   * Error type names that are never retried.
   */
  nonRetryableErrors?: readonly string[];
};

/**
 * Options used to start a workflow execution.
 */
export type WorkflowOptions = {
  workflowId?: string;
  taskQueue?: string;
  /**
   * @default 'AllowDuplicateFailedOnly'
   */
  idReusePolicy?: WorkflowIdReusePolicy;
  retry?: RetryOptions;
  cronSchedule?: string;
  executionTimeoutMs?: number;
  runTimeoutMs?: number;
  memo?: Readonly<Record<string, unknown>>;
};

// =============================================================================
// Executions
// =============================================================================

/**
 * Identity of one workflow execution.
 */
export type WorkflowExecution = {
  workflowId: string;
  runId?: string;
};

/**
 * Non-blocking handle to a workflow's eventual result.
 */
export interface WorkflowFuture<R> {
  /** Settles once the execution completes. */
  readonly result: Promise<R>;
}

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Untyped handle to one workflow execution, or to the intent to create one.
 *
 * Implementations own transport, serialization and retries. Results from
 * `query`, `getResult` and `getResultAsync` are parsed here, with the token's
 * `parse` applied once. `start` must reject with a `DuplicateWorkflowError`
 * when the server reports that the workflow is already started.
 */
export interface UntypedWorkflowHandle {
  start(args: readonly unknown[]): Promise<WorkflowExecution>;
  signal(name: string, args: readonly unknown[]): Promise<void>;
  query<R>(name: string, returnType: ReturnSpec<R>, args: readonly unknown[]): Promise<R>;
  getResult<R>(returnType: ReturnSpec<R>): Promise<R>;
  getResultAsync<R>(returnType: ReturnSpec<R>): WorkflowFuture<R>;
  getOptions(): WorkflowOptions | undefined;
  getExecution(): WorkflowExecution | undefined;
}

/**
 * Collects start and signal intents so they can be sent as one
 * signal-with-start operation.
 */
export interface SignalWithStartBatch {
  start(handle: UntypedWorkflowHandle, args: readonly unknown[]): void | Promise<void>;
  signal(
    handle: UntypedWorkflowHandle,
    name: string,
    args: readonly unknown[]
  ): void | Promise<void>;
}

// =============================================================================
// Events
// =============================================================================

/**
 * What the router knows about one intercepted call.
 */
export type DispatchRecord = {
  interfaceName: string;
  /** Method identifier on the interface. */
  method: string;
  role: MethodRole;
  /** Resolved workflow type, signal name or query name. */
  name: string;
  mode: InvocationMode;
  args: readonly unknown[];
};

/**
 * Events emitted by the router through `onEvent`.
 */
export type DispatchEvent =
  | { type: "dispatch_start"; record: DispatchRecord; ts: number }
  | { type: "dispatch_success"; record: DispatchRecord; ts: number; durationMs: number }
  | { type: "dispatch_error"; record: DispatchRecord; ts: number; durationMs: number; error: unknown }
  | {
      type: "duplicate_start_suppressed";
      record: DispatchRecord;
      ts: number;
      execution: WorkflowExecution | undefined;
      error: unknown;
    };

/** Listener for {@link DispatchEvent}s. */
export type DispatchEventListener = (event: DispatchEvent) => void;
