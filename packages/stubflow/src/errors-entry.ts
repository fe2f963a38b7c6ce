/**
 * stubflow/errors
 *
 * Error classes and type guards, without the rest of the runtime.
 *
 * @example
 * ```typescript
 * import { isDuplicateWorkflowError } from 'stubflow/errors';
 * ```
 */

export {
  // Factory function
  TaggedError,

  // Types
  type TaggedErrorBase,
  type TaggedErrorOptions,
  type TaggedErrorCreateOptions,
  type TaggedErrorConstructor,
  type TagOf,
  type ErrorByTag,
  type PropsOf,
} from "./tagged-error";

export {
  // Error classes
  AmbiguousRoleError,
  DuplicateMethodNameError,
  MultipleWorkflowMethodsError,
  MissingWorkflowMethodError,
  InvalidTargetError,
  UnknownMethodError,
  RoleNotAllowedError,
  UnsupportedInBatchError,
  ReturnTypeMismatchError,
  ReentrancyError,
  NoActiveContextError,
  NoResultError,
  DuplicateWorkflowError,
  InvalidBatchError,

  // Union type
  type StubflowError,

  // Type guards
  isDuplicateWorkflowError,
  isReentrancyError,
  isRoleNotAllowedError,
  isStubflowError,
} from "./errors";
