/**
 * Invocation context: the task-scoped mode that decides what the next typed
 * call on a stub means.
 *
 * Each logical task (an async call chain) sees at most one context, held in
 * an AsyncLocalStorage so concurrent tasks never observe each other's mode.
 * Without an active mode every call is dispatched synchronously.
 *
 * @example
 * ```typescript
 * const execution = await runInvocation(
 *   "start",
 *   () => greeter.greet("Ann"),
 *   (ctx) => ctx.currentResult(isWorkflowExecution)
 * );
 * ```
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { NoActiveContextError, NoResultError, ReentrancyError } from "./errors";
import type {
  AsyncInvocationMode,
  InvocationMode,
  SignalWithStartBatch,
  WorkflowExecution,
  WorkflowFuture,
} from "./types";

// =============================================================================
// Types
// =============================================================================

/**
 * Runtime check used to read a result of the expected type.
 */
export type ResultGuard<T> = {
  readonly name: string;
  readonly is: (value: unknown) => value is T;
};

type ActiveInvocation =
  | { readonly mode: "start" | "execute"; result: { value: unknown } | undefined }
  | { readonly mode: "signalWithStart"; readonly batch: SignalWithStartBatch };

// =============================================================================
// Result guards
// =============================================================================

/** Guard for the result of a `start` invocation. */
export const isWorkflowExecution: ResultGuard<WorkflowExecution> = {
  name: "WorkflowExecution",
  is: (value): value is WorkflowExecution =>
    typeof value === "object" &&
    value !== null &&
    "workflowId" in value &&
    typeof value.workflowId === "string",
};

/** Guard for the result of an `execute` invocation. */
export const isWorkflowFuture: ResultGuard<WorkflowFuture<unknown>> = {
  name: "WorkflowFuture",
  is: (value): value is WorkflowFuture<unknown> =>
    typeof value === "object" &&
    value !== null &&
    "result" in value &&
    value.result instanceof Promise,
};

// =============================================================================
// InvocationContext
// =============================================================================

/**
 * Mode state of one task.
 */
export class InvocationContext {
  private active: ActiveInvocation | undefined;

  /** Mode the next typed call is dispatched in. */
  get mode(): InvocationMode {
    return this.active?.mode ?? "sync";
  }

  get isActive(): boolean {
    return this.active !== undefined;
  }

  /** Batch of the active signal-with-start invocation, if any. */
  get batch(): SignalWithStartBatch | undefined {
    return this.active?.mode === "signalWithStart" ? this.active.batch : undefined;
  }

  /**
   * Activate a mode for the following typed call.
   *
   * @throws ReentrancyError if a mode is already active
   */
  enter(mode: "start" | "execute"): void;
  enter(mode: "signalWithStart", batch: SignalWithStartBatch): void;
  enter(mode: AsyncInvocationMode, batch?: SignalWithStartBatch): void;
  enter(mode: AsyncInvocationMode, batch?: SignalWithStartBatch): void {
    if (this.active) {
      throw new ReentrancyError({ activeMode: this.active.mode, requestedMode: mode });
    }
    if (mode === "signalWithStart") {
      if (!batch) {
        throw new TypeError("InvocationContext.enter: signalWithStart requires a batch");
      }
      this.active = { mode, batch };
    } else {
      this.active = { mode, result: undefined };
    }
  }

  /**
   * Clear the active mode. Safe to call when nothing is active.
   */
  exit(): void {
    this.active = undefined;
  }

  /**
   * Store the result of the dispatch that ran in the active mode.
   * Ignored outside start and execute modes.
   */
  recordResult(value: unknown): void {
    if (this.active && this.active.mode !== "signalWithStart") {
      this.active.result = { value };
    }
  }

  /**
   * Read the result produced by the last dispatch in the active mode.
   *
   * @throws NoActiveContextError if no mode is active
   * @throws NoResultError if the mode produces no result, nothing was
   * dispatched yet, or the result does not satisfy `expected`
   */
  currentResult<T>(expected: ResultGuard<T>): T {
    const active = this.active;
    if (!active) throw new NoActiveContextError({});
    if (active.mode === "signalWithStart") {
      throw new NoResultError({ mode: active.mode, reason: "produces no result" });
    }
    if (!active.result) {
      throw new NoResultError({ mode: active.mode, reason: "has not dispatched a workflow method" });
    }
    const { value } = active.result;
    if (!expected.is(value)) {
      throw new NoResultError({
        mode: active.mode,
        reason: `result is not a ${expected.name}`,
      });
    }
    return value;
  }
}

// =============================================================================
// Task scope
// =============================================================================

const storage = new AsyncLocalStorage<InvocationContext>();

/**
 * The calling task's invocation context, if one is bound.
 */
export function currentInvocationContext(): InvocationContext | undefined {
  return storage.getStore();
}

/**
 * Run `fn` with the task's invocation context, binding a new one when the
 * task has none.
 */
export function withInvocationContext<T>(fn: (context: InvocationContext) => T): T {
  const existing = storage.getStore();
  if (existing) return fn(existing);
  const context = new InvocationContext();
  return storage.run(context, () => fn(context));
}

/**
 * Enter `mode`, run `call` in it, read the result and always exit.
 *
 * The mode is only exited by the invocation that entered it, so a rejected
 * nested `enter` leaves the outer invocation intact.
 */
export function runInvocation<T>(
  mode: "start" | "execute",
  call: () => unknown,
  read: (context: InvocationContext) => T
): Promise<T>;
export function runInvocation<T>(
  mode: "signalWithStart",
  call: () => unknown,
  read: (context: InvocationContext) => T,
  batch: SignalWithStartBatch
): Promise<T>;
export function runInvocation<T>(
  mode: AsyncInvocationMode,
  call: () => unknown,
  read: (context: InvocationContext) => T,
  batch?: SignalWithStartBatch
): Promise<T> {
  return withInvocationContext(async (context) => {
    context.enter(mode, batch);
    try {
      await call();
      return read(context);
    } finally {
      context.exit();
    }
  });
}
