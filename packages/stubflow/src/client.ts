/**
 * Stub construction and scoped invocations.
 *
 * `createStubFactory` resolves interfaces, merges options and wraps the
 * handles it creates with interceptors. `startWorkflow`, `executeWorkflow` and
 * `signalWithStart` give the next typed call a non-sync meaning for the
 * duration of one callback.
 *
 * @example
 * ```typescript
 * const stubs = createStubFactory({ createHandle: (request) => client.handle(request) });
 * const greeter = stubs.newWorkflowStub(Greeter, { workflowId: "greet-ann" });
 *
 * const execution = await startWorkflow(() => greeter.greet("Ann"));
 * const future = await executeWorkflow(() => greeter.greet("Ann"));
 * const greeting = await future.result;
 * ```
 */

import { SignalWithStartBatchRequest, type SignalWithStartRequest } from "./batch";
import { isWorkflowExecution, isWorkflowFuture, runInvocation } from "./context";
import type { WorkflowRouterOptions } from "./dispatch/router";
import { MissingWorkflowMethodError } from "./errors";
import type { MethodMap, WorkflowInterface } from "./interface/define";
import { mergeWorkflowOptions } from "./interface/options";
import { resolveInterface } from "./interface/resolve";
import { createWorkflowStub, type WorkflowStub } from "./stub";
import type {
  SignalWithStartBatch,
  UntypedWorkflowHandle,
  WorkflowExecution,
  WorkflowFuture,
  WorkflowOptions,
} from "./types";

// =============================================================================
// Types
// =============================================================================

/**
 * What a handle factory is asked to create.
 */
export type HandleRequest =
  | {
      kind: "new";
      /** Resolved name of the interface's workflow method. */
      workflowType: string;
      /** Effective options after merging every layer. */
      options: Readonly<WorkflowOptions>;
    }
  | {
      kind: "existing";
      /** Present when the interface has a workflow method. */
      workflowType: string | undefined;
      execution: WorkflowExecution;
    };

/**
 * Wraps a handle, e.g. to add tracing or headers.
 */
export type HandleInterceptor = (
  handle: UntypedWorkflowHandle,
  request: HandleRequest
) => UntypedWorkflowHandle;

export type StubFactoryOptions = Pick<WorkflowRouterOptions, "onEvent"> & {
  /** Creates the untyped handle for a stub. */
  createHandle: (request: HandleRequest) => UntypedWorkflowHandle;
  /**
   * Applied in order; the last interceptor wraps the outermost handle.
   * @default []
   */
  interceptors?: readonly HandleInterceptor[];
};

export interface StubFactory {
  /**
   * Stub for starting a new workflow.
   *
   * @throws MissingWorkflowMethodError when the interface has no workflow method
   */
  newWorkflowStub<M extends MethodMap>(
    iface: WorkflowInterface<M>,
    options?: WorkflowOptions
  ): WorkflowStub<M>;

  /**
   * Stub attached to an existing execution, for signals, queries and results.
   */
  newWorkflowStubForExecution<M extends MethodMap>(
    iface: WorkflowInterface<M>,
    execution: WorkflowExecution
  ): WorkflowStub<M>;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a factory for typed workflow stubs.
 */
export function createStubFactory(options: StubFactoryOptions): StubFactory {
  const { createHandle, interceptors = [], onEvent } = options;

  const intercept = (request: HandleRequest): UntypedWorkflowHandle =>
    interceptors.reduce((handle, interceptor) => interceptor(handle, request), createHandle(request));

  return {
    newWorkflowStub(iface, explicit) {
      const descriptor = resolveInterface(iface);
      const workflowMethod = descriptor.workflowMethod;
      if (!workflowMethod) {
        throw new MissingWorkflowMethodError({ interfaceName: descriptor.interfaceName });
      }
      const workflowOptions = mergeWorkflowOptions(workflowMethod.options, explicit);
      const handle = intercept({
        kind: "new",
        workflowType: workflowMethod.name,
        options: workflowOptions,
      });
      return createWorkflowStub(iface, handle, { onEvent, workflowOptions });
    },

    newWorkflowStubForExecution(iface, execution) {
      const descriptor = resolveInterface(iface);
      const handle = intercept({
        kind: "existing",
        workflowType: descriptor.workflowMethod?.name,
        execution,
      });
      return createWorkflowStub(iface, handle, { onEvent });
    },
  };
}

// =============================================================================
// Scoped invocations
// =============================================================================

/**
 * Start the workflow called inside `call` without waiting for its result.
 *
 * `start` is attempted even if the handle already knows an execution; the
 * handle's outcome is returned or thrown unfiltered.
 *
 * @example
 * ```typescript
 * const { workflowId, runId } = await startWorkflow(() => greeter.greet("Ann"));
 * ```
 */
export function startWorkflow(call: () => Promise<unknown>): Promise<WorkflowExecution> {
  return runInvocation("start", call, (context) => context.currentResult(isWorkflowExecution));
}

/**
 * Start (or attach to) the workflow called inside `call` and return a future
 * of its result.
 */
export function executeWorkflow<R>(call: () => Promise<R>): Promise<WorkflowFuture<R>> {
  return runInvocation("execute", call, (context) => {
    const future = context.currentResult(isWorkflowFuture);
    return future as WorkflowFuture<R>;
  });
}

/**
 * Record the start and signal called inside `call` into a batch.
 *
 * With no batch argument the default {@link SignalWithStartBatchRequest} is
 * used and its request returned.
 */
export function signalWithStart(call: () => Promise<unknown>): Promise<SignalWithStartRequest>;
export function signalWithStart(
  call: () => Promise<unknown>,
  batch: SignalWithStartBatch
): Promise<void>;
export async function signalWithStart(
  call: () => Promise<unknown>,
  batch?: SignalWithStartBatch
): Promise<SignalWithStartRequest | void> {
  if (batch) {
    await runInvocation("signalWithStart", call, () => undefined, batch);
    return;
  }
  const request = new SignalWithStartBatchRequest();
  return runInvocation("signalWithStart", call, () => request.toRequest(), request);
}
