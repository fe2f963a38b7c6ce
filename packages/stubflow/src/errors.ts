/**
 * stubflow/errors
 *
 * Errors raised while resolving workflow interfaces and dispatching typed
 * calls. All of them are TaggedErrors and propagate to the caller; none are
 * retried.
 *
 * @example
 * ```typescript
 * try {
 *   await startWorkflow(() => greeter.cancel());
 * } catch (error) {
 *   if (isRoleNotAllowedError(error)) {
 *     console.log(`${error.method} cannot be used in ${error.mode} mode`);
 *   }
 * }
 * ```
 */

import { TaggedError } from "./tagged-error";
import type { InvocationMode, MethodRole } from "./types";

// =============================================================================
// Interface resolution
// =============================================================================

/**
 * A method carries more than one of workflowMethod, signalMethod or queryMethod.
 */
export class AmbiguousRoleError extends TaggedError("AmbiguousRoleError", {
  message: (p: {
    interfaceName: string;
    method: string;
    /** Roles found on the method, in declaration order */
    roles: readonly MethodRole[];
  }) =>
    `AmbiguousRoleError: ${p.interfaceName}.${p.method} must carry at most one of workflowMethod, signalMethod or queryMethod (found ${p.roles.join(", ")})`,
}) {}

/**
 * Two methods of the same role resolve to the same name.
 */
export class DuplicateMethodNameError extends TaggedError("DuplicateMethodNameError", {
  message: (p: {
    interfaceName: string;
    role: MethodRole;
    name: string;
    methods: readonly string[];
  }) =>
    `DuplicateMethodNameError: ${p.role} name "${p.name}" is used by ${p.methods.join(" and ")} in ${p.interfaceName}`,
}) {}

/**
 * An interface declares more than one workflow method.
 */
export class MultipleWorkflowMethodsError extends TaggedError("MultipleWorkflowMethodsError", {
  message: (p: { interfaceName: string; methods: readonly string[] }) =>
    `MultipleWorkflowMethodsError: ${p.interfaceName} declares more than one workflow method (${p.methods.join(", ")})`,
}) {}

/**
 * A stub for starting a new workflow was requested from an interface without
 * a workflow method.
 */
export class MissingWorkflowMethodError extends TaggedError("MissingWorkflowMethodError", {
  message: (p: { interfaceName: string }) =>
    `MissingWorkflowMethodError: ${p.interfaceName} has no workflow method, so it cannot start a workflow`,
}) {}

// =============================================================================
// Dispatch
// =============================================================================

/**
 * A call targeted something that is not a method of the workflow interface.
 */
export class InvalidTargetError extends TaggedError("InvalidTargetError", {
  message: (p: { interfaceName: string; method: string }) =>
    `InvalidTargetError: ${p.method} is not a method of workflow interface ${p.interfaceName}`,
}) {}

/**
 * A declared method has no role, so it has no resolved name.
 */
export class UnknownMethodError extends TaggedError("UnknownMethodError", {
  message: (p: { interfaceName: string; method: string }) =>
    `UnknownMethodError: ${p.interfaceName}.${p.method} is not a workflow, signal or query method`,
}) {}

/**
 * A method's role cannot be used in the active invocation mode.
 */
export class RoleNotAllowedError extends TaggedError("RoleNotAllowedError", {
  message: (p: {
    interfaceName: string;
    method: string;
    role: MethodRole;
    mode: InvocationMode;
  }) =>
    `RoleNotAllowedError: ${p.mode} can only be called on a workflow method, but ${p.interfaceName}.${p.method} is a ${p.role} method`,
}) {}

/**
 * A query method was called while recording a signal-with-start batch.
 */
export class UnsupportedInBatchError extends TaggedError("UnsupportedInBatchError", {
  message: (p: { interfaceName: string; method: string }) =>
    `UnsupportedInBatchError: signal-with-start batches do not accept query methods (${p.interfaceName}.${p.method})`,
}) {}

/**
 * A signal method declares a value, or a query method declares void.
 */
export class ReturnTypeMismatchError extends TaggedError("ReturnTypeMismatchError", {
  message: (p: {
    interfaceName: string;
    method: string;
    role: "signal" | "query";
  }) =>
    p.role === "signal"
      ? `ReturnTypeMismatchError: signal method ${p.interfaceName}.${p.method} must return void`
      : `ReturnTypeMismatchError: query method ${p.interfaceName}.${p.method} cannot return void`,
}) {}

// =============================================================================
// Invocation context
// =============================================================================

/**
 * An invocation mode was entered while another one is active on the task.
 */
export class ReentrancyError extends TaggedError("ReentrancyError", {
  message: (p: { activeMode: InvocationMode; requestedMode: InvocationMode }) =>
    `ReentrancyError: cannot enter ${p.requestedMode} while ${p.activeMode} is active`,
}) {}

/**
 * A result was requested without an active invocation context.
 */
export class NoActiveContextError extends TaggedError("NoActiveContextError", {
  message: () => "NoActiveContextError: no invocation is active on this task",
}) {}

/**
 * The active invocation has no result of the requested kind.
 */
export class NoResultError extends TaggedError("NoResultError", {
  message: (p: { mode: InvocationMode; reason: string }) =>
    `NoResultError: ${p.mode} invocation ${p.reason}`,
}) {}

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Raised by a workflow handle when the workflow id already has an execution.
 */
export class DuplicateWorkflowError extends TaggedError("DuplicateWorkflowError", {
  message: (p: { workflowId: string; runId?: string; workflowType?: string }) =>
    p.workflowType
      ? `DuplicateWorkflowError: workflow ${p.workflowId} of type ${p.workflowType} is already started`
      : `DuplicateWorkflowError: workflow ${p.workflowId} is already started`,
}) {}

/**
 * A signal-with-start batch was used incorrectly.
 */
export class InvalidBatchError extends TaggedError("InvalidBatchError", {
  message: (p: { reason: string }) => `InvalidBatchError: ${p.reason}`,
}) {}

// =============================================================================
// Union Type
// =============================================================================

/**
 * Union of every error stubflow raises.
 */
export type StubflowError =
  | AmbiguousRoleError
  | DuplicateMethodNameError
  | MultipleWorkflowMethodsError
  | MissingWorkflowMethodError
  | InvalidTargetError
  | UnknownMethodError
  | RoleNotAllowedError
  | UnsupportedInBatchError
  | ReturnTypeMismatchError
  | ReentrancyError
  | NoActiveContextError
  | NoResultError
  | DuplicateWorkflowError
  | InvalidBatchError;

const STUBFLOW_ERROR_TAGS: ReadonlySet<string> = new Set([
  "AmbiguousRoleError",
  "DuplicateMethodNameError",
  "MultipleWorkflowMethodsError",
  "MissingWorkflowMethodError",
  "InvalidTargetError",
  "UnknownMethodError",
  "RoleNotAllowedError",
  "UnsupportedInBatchError",
  "ReturnTypeMismatchError",
  "ReentrancyError",
  "NoActiveContextError",
  "NoResultError",
  "DuplicateWorkflowError",
  "InvalidBatchError",
]);

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error reports an already started workflow.
 *
 * Matches by tag so handles bundling their own copy of stubflow are recognised.
 */
export function isDuplicateWorkflowError(error: unknown): error is DuplicateWorkflowError {
  return (
    error instanceof DuplicateWorkflowError ||
    TaggedError.isTaggedError(error, "DuplicateWorkflowError")
  );
}

/**
 * Check if an error is a ReentrancyError.
 */
export function isReentrancyError(error: unknown): error is ReentrancyError {
  return error instanceof ReentrancyError;
}

/**
 * Check if an error is a RoleNotAllowedError.
 */
export function isRoleNotAllowedError(error: unknown): error is RoleNotAllowedError {
  return error instanceof RoleNotAllowedError;
}

/**
 * Check if an error is any StubflowError.
 */
export function isStubflowError(error: unknown): error is StubflowError {
  return TaggedError.isTaggedError(error) && STUBFLOW_ERROR_TAGS.has(error._tag);
}
