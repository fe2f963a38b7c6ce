/**
 * Dispatch router: turns one typed call into operations on an untyped
 * workflow handle.
 *
 * Per call the router validates the target, reads the task's invocation
 * mode (sync when none is active), looks the method up in the precomputed
 * role table and runs the protocol for that mode:
 *
 * | mode            | workflow                        | signal          | query            |
 * |-----------------|---------------------------------|-----------------|------------------|
 * | sync            | start (dedup) + getResult       | signal          | query            |
 * | start           | start, record execution         | rejected        | rejected         |
 * | execute         | start (dedup) + getResultAsync  | rejected        | rejected         |
 * | signalWithStart | batch.start                     | batch.signal    | rejected         |
 *
 * Sync calls resolve with the handle's result, which the handle has already
 * parsed with the method's return type token. Every other mode resolves with
 * the declared return type's zero value and leaves its result on the
 * invocation context.
 */

import { currentInvocationContext, type InvocationContext } from "../context";
import {
  InvalidTargetError,
  NoActiveContextError,
  ReturnTypeMismatchError,
  RoleNotAllowedError,
  UnknownMethodError,
  UnsupportedInBatchError,
} from "../errors";
import type { InterfaceDescriptor, ResolvedMethod, ResolvedWorkflowMethod } from "../interface/resolve";
import { zeroValueOf } from "../returns";
import type {
  DispatchEvent,
  DispatchEventListener,
  DispatchRecord,
  InvocationMode,
  UntypedWorkflowHandle,
  WorkflowIdReusePolicy,
  WorkflowOptions,
} from "../types";
import { startWithDuplicatePolicy } from "./duplicate-start";

// =============================================================================
// Reserved methods
// =============================================================================

/** Reserved method returning a description of the stub. */
export const DESCRIBE_METHOD = "toString";

/** Reserved method returning the untyped handle behind a stub. */
export const UNTYPED_HANDLE_METHOD = "getUntypedHandle";

export function isReservedMethod(method: string): boolean {
  return method === DESCRIBE_METHOD || method === UNTYPED_HANDLE_METHOD;
}

// =============================================================================
// Router
// =============================================================================

export type WorkflowRouterOptions = {
  /** Receives dispatch lifecycle events. */
  onEvent?: DispatchEventListener;
  /**
   * Effective options the stub's workflow is started with. Consulted when
   * the handle does not report its own options.
   */
  workflowOptions?: Readonly<WorkflowOptions>;
};

/**
 * Routes calls on one workflow interface to one handle.
 *
 * The router never owns the handle: it only invokes it.
 */
export class WorkflowRouter {
  readonly descriptor: InterfaceDescriptor;
  readonly handle: UntypedWorkflowHandle;
  private readonly onEvent: DispatchEventListener | undefined;
  private readonly workflowOptions: Readonly<WorkflowOptions> | undefined;

  constructor(
    descriptor: InterfaceDescriptor,
    handle: UntypedWorkflowHandle,
    options: WorkflowRouterOptions = {}
  ) {
    this.descriptor = descriptor;
    this.handle = handle;
    this.onEvent = options.onEvent;
    this.workflowOptions = options.workflowOptions;
  }

  /** Fixed description returned for `toString()`. */
  describe(): string {
    return `WorkflowStub<${this.descriptor.interfaceName}>`;
  }

  /**
   * Dispatch one call.
   *
   * @param method - Method identifier on the interface
   * @param args - Call arguments, passed to the handle untouched
   */
  async dispatch(method: string, args: readonly unknown[]): Promise<unknown> {
    if (method === DESCRIBE_METHOD) return this.describe();
    if (method === UNTYPED_HANDLE_METHOD) return this.handle;

    const { descriptor } = this;
    if (!descriptor.declared.has(method)) {
      throw new InvalidTargetError({ interfaceName: descriptor.interfaceName, method });
    }

    const context = currentInvocationContext();
    const mode: InvocationMode = context?.mode ?? "sync";

    const resolved = descriptor.methods.get(method);
    if (!resolved) {
      throw new UnknownMethodError({ interfaceName: descriptor.interfaceName, method });
    }

    const record: DispatchRecord = {
      interfaceName: descriptor.interfaceName,
      method,
      role: resolved.role,
      name: resolved.name,
      mode,
      args,
    };

    const startedAt = Date.now();
    this.emit({ type: "dispatch_start", record, ts: startedAt });
    try {
      const value =
        context && mode !== "sync"
          ? await this.dispatchAsync(mode, context, resolved, args, record)
          : await this.dispatchSync(resolved, args, record);
      const ts = Date.now();
      this.emit({ type: "dispatch_success", record, ts, durationMs: ts - startedAt });
      return value;
    } catch (error) {
      const ts = Date.now();
      this.emit({ type: "dispatch_error", record, ts, durationMs: ts - startedAt, error });
      throw error;
    }
  }

  // ===========================================================================
  // Sync
  // ===========================================================================

  private async dispatchSync(
    resolved: ResolvedMethod,
    args: readonly unknown[],
    record: DispatchRecord
  ): Promise<unknown> {
    const { handle } = this;
    switch (resolved.role) {
      case "workflow": {
        await this.startDeduplicated(resolved, args, record);
        const result = await handle.getResult(resolved.returns);
        return resolved.returns.kind === "void" ? undefined : result;
      }
      case "signal": {
        if (resolved.returns.kind !== "void") {
          throw new ReturnTypeMismatchError({
            interfaceName: record.interfaceName,
            method: resolved.method,
            role: "signal",
          });
        }
        await handle.signal(resolved.name, args);
        return undefined;
      }
      case "query": {
        if (resolved.returns.kind === "void") {
          throw new ReturnTypeMismatchError({
            interfaceName: record.interfaceName,
            method: resolved.method,
            role: "query",
          });
        }
        return handle.query(resolved.name, resolved.returns, args);
      }
      default: {
        const _exhaustive: never = resolved;
        throw new Error(`Unknown method role: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }

  // ===========================================================================
  // Start / Execute / SignalWithStart
  // ===========================================================================

  private async dispatchAsync(
    mode: Exclude<InvocationMode, "sync">,
    context: InvocationContext,
    resolved: ResolvedMethod,
    args: readonly unknown[],
    record: DispatchRecord
  ): Promise<unknown> {
    const { handle } = this;
    switch (mode) {
      case "start": {
        this.requireWorkflowMethod(resolved, mode);
        const execution = await handle.start(args);
        context.recordResult(execution);
        break;
      }
      case "execute": {
        const workflow = this.requireWorkflowMethod(resolved, mode);
        await this.startDeduplicated(workflow, args, record);
        context.recordResult(handle.getResultAsync(workflow.returns));
        break;
      }
      case "signalWithStart": {
        const batch = context.batch;
        if (!batch) throw new NoActiveContextError({});
        if (resolved.role === "query") {
          throw new UnsupportedInBatchError({
            interfaceName: record.interfaceName,
            method: resolved.method,
          });
        }
        if (resolved.role === "workflow") {
          await batch.start(handle, args);
        } else {
          await batch.signal(handle, resolved.name, args);
        }
        break;
      }
      default: {
        const _exhaustive: never = mode;
        throw new Error(`Unknown invocation mode: ${JSON.stringify(_exhaustive)}`);
      }
    }
    return zeroValueOf(resolved.returns);
  }

  private requireWorkflowMethod(
    resolved: ResolvedMethod,
    mode: InvocationMode
  ): ResolvedWorkflowMethod {
    if (resolved.role !== "workflow") {
      throw new RoleNotAllowedError({
        interfaceName: this.descriptor.interfaceName,
        method: resolved.method,
        role: resolved.role,
        mode,
      });
    }
    return resolved;
  }

  /**
   * Reuse policy for duplicate-start handling: the handle's own options
   * first, then the options the stub was created with, then the workflow
   * method's declared options.
   */
  private idReusePolicy(workflow: ResolvedWorkflowMethod): WorkflowIdReusePolicy | undefined {
    return (
      this.handle.getOptions()?.idReusePolicy ??
      this.workflowOptions?.idReusePolicy ??
      workflow.options.idReusePolicy
    );
  }

  private startDeduplicated(
    workflow: ResolvedWorkflowMethod,
    args: readonly unknown[],
    record: DispatchRecord
  ): Promise<void> {
    return startWithDuplicatePolicy(this.handle, args, {
      idReusePolicy: this.idReusePolicy(workflow),
      onSuppressed: (execution, error) =>
        this.emit({ type: "duplicate_start_suppressed", record, ts: Date.now(), execution, error }),
    });
  }

  private emit(event: DispatchEvent): void {
    this.onEvent?.(event);
  }
}
