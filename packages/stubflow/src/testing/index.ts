/**
 * stubflow/testing
 *
 * In-process stand-ins for the workflow handle and the signal-with-start
 * batch. They record every call so tests can assert exactly what a stub sent.
 */

import { DuplicateWorkflowError } from "../errors";
import type { ReturnSpec } from "../returns";
import type {
  SignalWithStartBatch,
  UntypedWorkflowHandle,
  WorkflowExecution,
  WorkflowFuture,
  WorkflowOptions,
} from "../types";

// =============================================================================
// Types
// =============================================================================

/**
 * One call received by a fake handle.
 */
export type HandleCall =
  | { op: "start"; args: readonly unknown[] }
  | { op: "signal"; name: string; args: readonly unknown[] }
  | { op: "query"; name: string; returnType: string; args: readonly unknown[] }
  | { op: "getResult"; returnType: string }
  | { op: "getResultAsync"; returnType: string };

/**
 * A scripted outcome for one `start` call.
 * - `ok`: start succeeds with a fresh execution
 * - `duplicate`: start rejects with a DuplicateWorkflowError
 * - `throw`: start rejects with `error`
 */
export type ScriptedStart =
  | { type: "ok" }
  | { type: "duplicate" }
  | { type: "throw"; error: unknown };

export type FakeWorkflowHandleOptions = {
  /**
   * Workflow id of executions the fake creates.
   * @default options.workflowId ?? 'workflow-1'
   */
  workflowId?: string;
  /** Execution known before the first call. */
  execution?: WorkflowExecution;
  /** Returned by getOptions(). */
  options?: WorkflowOptions;
  /** Workflow type used in duplicate errors. */
  workflowType?: string;
  /** Outcomes for successive `start` calls; afterwards the default applies. */
  starts?: readonly ScriptedStart[];
  /**
   * Default start outcome when a known execution exists: reject as duplicate.
   * @default true
   */
  rejectDuplicateStarts?: boolean;
  /** Result of the workflow, for getResult and getResultAsync. */
  result?: unknown;
  /** When set, getResult and getResultAsync reject with it. */
  resultError?: unknown;
  /** Query handlers by query name. */
  queries?: Readonly<Record<string, (args: readonly unknown[]) => unknown>>;
  /** When set, signal() rejects with it. */
  signalError?: unknown;
};

export interface FakeWorkflowHandle extends UntypedWorkflowHandle {
  /** Every call, in order. */
  readonly calls: readonly HandleCall[];
  /** Calls of one operation, in order. */
  callsTo<Op extends HandleCall["op"]>(op: Op): Extract<HandleCall, { op: Op }>[];
}

// =============================================================================
// Fake handle
// =============================================================================

function toResult<R>(returnType: ReturnSpec<R>, value: unknown): R {
  if (returnType.kind === "value" && returnType.parse) return returnType.parse(value);
  // Scripted values are trusted to match the requested type.
  return value as R;
}

/**
 * Create an in-memory workflow handle.
 *
 * @example
 * ```typescript
 * const handle = createFakeWorkflowHandle({ result: "Hello, Ann" });
 * const greeter = createWorkflowStub(Greeter, handle);
 *
 * expect(await greeter.greet("Ann")).toBe("Hello, Ann");
 * expect(handle.calls).toEqual([
 *   { op: "start", args: ["Ann"] },
 *   { op: "getResult", returnType: "string" },
 * ]);
 * ```
 */
export function createFakeWorkflowHandle(
  fakeOptions: FakeWorkflowHandleOptions = {}
): FakeWorkflowHandle {
  const {
    options,
    workflowType,
    rejectDuplicateStarts = true,
    queries = {},
  } = fakeOptions;
  const workflowId = fakeOptions.workflowId ?? options?.workflowId ?? "workflow-1";
  const scriptedStarts = [...(fakeOptions.starts ?? [])];
  const calls: HandleCall[] = [];
  let execution = fakeOptions.execution;
  let runs = 0;

  const duplicate = () =>
    new DuplicateWorkflowError({
      workflowId: execution?.workflowId ?? workflowId,
      runId: execution?.runId,
      workflowType,
    });

  const resultPromise = <R>(returnType: ReturnSpec<R>): Promise<R> =>
    "resultError" in fakeOptions
      ? Promise.reject(fakeOptions.resultError)
      : Promise.resolve(toResult(returnType, fakeOptions.result));

  return {
    calls,

    callsTo<Op extends HandleCall["op"]>(op: Op) {
      return calls.filter((call): call is Extract<HandleCall, { op: Op }> => call.op === op);
    },

    async start(args) {
      calls.push({ op: "start", args });
      const scripted = scriptedStarts.shift();
      const outcome: ScriptedStart =
        scripted ?? (execution && rejectDuplicateStarts ? { type: "duplicate" } : { type: "ok" });
      switch (outcome.type) {
        case "duplicate":
          throw duplicate();
        case "throw":
          throw outcome.error;
        case "ok":
          runs += 1;
          execution = { workflowId, runId: `run-${runs}` };
          return execution;
      }
    },

    async signal(name, args) {
      calls.push({ op: "signal", name, args });
      if ("signalError" in fakeOptions) throw fakeOptions.signalError;
    },

    async query<R>(name: string, returnType: ReturnSpec<R>, args: readonly unknown[]) {
      calls.push({ op: "query", name, returnType: returnType.name, args });
      const handler = queries[name];
      if (!handler) throw new Error(`Fake handle has no query handler for "${name}"`);
      return toResult(returnType, handler(args));
    },

    getResult<R>(returnType: ReturnSpec<R>) {
      calls.push({ op: "getResult", returnType: returnType.name });
      return resultPromise(returnType);
    },

    getResultAsync<R>(returnType: ReturnSpec<R>): WorkflowFuture<R> {
      calls.push({ op: "getResultAsync", returnType: returnType.name });
      return { result: resultPromise(returnType) };
    },

    getOptions() {
      return options;
    },

    getExecution() {
      return execution;
    },
  };
}

// =============================================================================
// Recording batch
// =============================================================================

export type BatchCall =
  | { op: "start"; handle: UntypedWorkflowHandle; args: readonly unknown[] }
  | { op: "signal"; handle: UntypedWorkflowHandle; name: string; args: readonly unknown[] };

export interface RecordingBatch extends SignalWithStartBatch {
  readonly calls: readonly BatchCall[];
}

/**
 * Signal-with-start batch that only records what it receives.
 */
export function createRecordingBatch(): RecordingBatch {
  const calls: BatchCall[] = [];
  return {
    calls,
    start(handle, args) {
      calls.push({ op: "start", handle, args });
    },
    signal(handle, name, args) {
      calls.push({ op: "signal", handle, name, args });
    },
  };
}
