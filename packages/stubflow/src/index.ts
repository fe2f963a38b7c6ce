/**
 * stubflow
 *
 * Typed workflow stubs over untyped workflow handles.
 *
 * ## Quick Start
 *
 * ```typescript
 * import {
 *   defineWorkflowInterface, method, returns,
 *   workflowMethod, signalMethod, queryMethod,
 *   createStubFactory, startWorkflow,
 * } from 'stubflow';
 *
 * const Greeter = defineWorkflowInterface('Greeter', {
 *   greet: method<(name: string) => string>(returns.string(), workflowMethod({ name: 'Greet' })),
 *   cancel: method(returns.void(), signalMethod({ name: 'Cancel' })),
 *   greetings: method<() => number>(returns.number(), queryMethod()),
 * });
 *
 * const stubs = createStubFactory({ createHandle: (request) => client.handle(request) });
 * const greeter = stubs.newWorkflowStub(Greeter, { workflowId: 'greet-ann' });
 *
 * const greeting = await greeter.greet('Ann');                 // sync: start + result
 * const execution = await startWorkflow(() => greeter.greet('Ann'));
 * ```
 *
 * ## Entry Points
 *
 * - `stubflow` - interfaces, stubs, invocation modes and errors
 * - `stubflow/errors` - error classes and guards only
 * - `stubflow/testing` - in-process fake handle and recording batch
 */

// =============================================================================
// Interfaces
// =============================================================================

export {
  workflowMethod,
  signalMethod,
  queryMethod,
  methodRetry,
  cronSchedule,
  method,
  type WorkflowMethodOptions,
  type WorkflowMethodMarker,
  type SignalMethodMarker,
  type QueryMethodMarker,
  type MethodRetryMarker,
  type CronScheduleMarker,
  type RoleMarker,
  type MethodMarker,
  type MethodSignature,
  type MethodDefinition,
} from "./interface/markers";

export {
  defineWorkflowInterface,
  type MethodMap,
  type WorkflowInterface,
} from "./interface/define";

export {
  resolveInterface,
  type InterfaceDescriptor,
  type ResolvedMethod,
  type ResolvedWorkflowMethod,
  type ResolvedSignalMethod,
  type ResolvedQueryMethod,
} from "./interface/resolve";

export { mergeWorkflowOptions } from "./interface/options";

export {
  returns,
  zeroValueOf,
  type ReturnSpec,
  type VoidReturn,
  type ValueReturn,
} from "./returns";

// =============================================================================
// Stubs and invocation modes
// =============================================================================

export {
  createWorkflowStub,
  isWorkflowStub,
  getUntypedHandle,
  type StubMethod,
  type WorkflowStub,
  type StubOf,
} from "./stub";

export {
  createStubFactory,
  startWorkflow,
  executeWorkflow,
  signalWithStart,
  type HandleRequest,
  type HandleInterceptor,
  type StubFactoryOptions,
  type StubFactory,
} from "./client";

export {
  SignalWithStartBatchRequest,
  type SignalWithStartRequest,
} from "./batch";

export {
  InvocationContext,
  currentInvocationContext,
  withInvocationContext,
  runInvocation,
  isWorkflowExecution,
  isWorkflowFuture,
  type ResultGuard,
} from "./context";

export {
  WorkflowRouter,
  DESCRIBE_METHOD,
  UNTYPED_HANDLE_METHOD,
  isReservedMethod,
  type WorkflowRouterOptions,
} from "./dispatch/router";

export {
  startWithDuplicatePolicy,
  type DuplicateStartOptions,
} from "./dispatch/duplicate-start";

// =============================================================================
// Types
// =============================================================================

export {
  DEFAULT_ID_REUSE_POLICY,
  type MethodRole,
  type InvocationMode,
  type AsyncInvocationMode,
  type WorkflowIdReusePolicy,
  type BackoffStrategy,
  type RetryOptions,
  type WorkflowOptions,
  type WorkflowExecution,
  type WorkflowFuture,
  type UntypedWorkflowHandle,
  type SignalWithStartBatch,
  type DispatchRecord,
  type DispatchEvent,
  type DispatchEventListener,
} from "./types";

// =============================================================================
// Errors
// =============================================================================

export * from "./errors-entry";
