/**
 * Typed workflow stubs.
 *
 * A stub is a Proxy that forwards every method call to a {@link WorkflowRouter}.
 * Its type is derived from the interface's method signatures, with each method
 * returning a Promise of its declared result.
 *
 * @example
 * ```typescript
 * const greeter = createWorkflowStub(Greeter, handle);
 * const greeting = await greeter.greet("Ann");
 * await greeter.cancel();
 * ```
 */

import {
  DESCRIBE_METHOD,
  UNTYPED_HANDLE_METHOD,
  WorkflowRouter,
  isReservedMethod,
  type WorkflowRouterOptions,
} from "./dispatch/router";
import type { MethodMap, WorkflowInterface } from "./interface/define";
import type { MethodDefinition, MethodSignature } from "./interface/markers";
import { resolveInterface } from "./interface/resolve";
import type { UntypedWorkflowHandle } from "./types";

// =============================================================================
// Types
// =============================================================================

/**
 * Stub-side signature of one interface method.
 */
export type StubMethod<D> =
  D extends MethodDefinition<infer F extends MethodSignature>
    ? (...args: Parameters<F>) => Promise<Awaited<ReturnType<F>>>
    : never;

/**
 * Typed stub for a workflow interface.
 */
export type WorkflowStub<M extends MethodMap> = {
  readonly [K in keyof M]: StubMethod<M[K]>;
};

/** Extract the stub type of a workflow interface. */
export type StubOf<I> = I extends WorkflowInterface<infer M> ? WorkflowStub<M> : never;

type DispatchFn = (...args: unknown[]) => Promise<unknown>;

// =============================================================================
// Construction
// =============================================================================

const routers = new WeakMap<object, WorkflowRouter>();

/**
 * Create a typed stub that routes calls on `iface` to `handle`.
 *
 * @throws AmbiguousRoleError and the other resolution errors when the
 * interface is malformed
 */
export function createWorkflowStub<M extends MethodMap>(
  iface: WorkflowInterface<M>,
  handle: UntypedWorkflowHandle,
  options?: WorkflowRouterOptions
): WorkflowStub<M> {
  const router = new WorkflowRouter(resolveInterface(iface), handle, options);
  const methods = new Map<string, DispatchFn>();
  const { declared } = router.descriptor;

  const stub = new Proxy<object>(
    {},
    {
      get(_target, property) {
        // Symbols and `then` stay undefined so stubs are never mistaken for promises.
        if (typeof property === "symbol" || property === "then") return undefined;
        if (property === DESCRIBE_METHOD) return () => router.describe();
        if (property === UNTYPED_HANDLE_METHOD) return () => router.handle;
        // JSON.stringify reads toJSON; only a declared method answers it.
        if (property === "toJSON" && !declared.has(property)) return undefined;

        let fn = methods.get(property);
        if (!fn) {
          fn = (...args: unknown[]) => router.dispatch(property, args);
          methods.set(property, fn);
        }
        return fn;
      },
      has(_target, property) {
        return (
          typeof property === "string" && (declared.has(property) || isReservedMethod(property))
        );
      },
      set() {
        return false;
      },
      deleteProperty() {
        return false;
      },
    }
  );

  routers.set(stub, router);
  // The Proxy answers every declared method, which is what the mapped type describes.
  return stub as WorkflowStub<M>;
}

/**
 * Check whether a value is a stub created by {@link createWorkflowStub}.
 */
export function isWorkflowStub(value: unknown): boolean {
  return typeof value === "object" && value !== null && routers.has(value);
}

/**
 * The untyped handle behind a stub.
 *
 * @throws TypeError when `stub` is not a workflow stub
 */
export function getUntypedHandle(stub: object): UntypedWorkflowHandle {
  const router = routers.get(stub);
  if (!router) {
    throw new TypeError("getUntypedHandle: value is not a workflow stub");
  }
  return router.handle;
}
