/**
 * Default signal-with-start batch.
 *
 * Records the workflow start and the signal made while a `signalWithStart`
 * invocation is active, and turns them into one request for the client to
 * send.
 *
 * @example
 * ```typescript
 * const request = await signalWithStart(async () => {
 *   await greeter.greet("Ann");
 *   await greeter.cancel();
 * });
 * await client.signalWithStart(request);
 * ```
 */

import { InvalidBatchError } from "./errors";
import type { SignalWithStartBatch, UntypedWorkflowHandle } from "./types";

/**
 * Combined start and signal, targeting one workflow handle.
 */
export type SignalWithStartRequest = {
  handle: UntypedWorkflowHandle;
  startArgs: readonly unknown[];
  signalName: string;
  signalArgs: readonly unknown[];
};

export class SignalWithStartBatchRequest implements SignalWithStartBatch {
  private handle: UntypedWorkflowHandle | undefined;
  private startArgs: readonly unknown[] | undefined;
  private signalCall: { name: string; args: readonly unknown[] } | undefined;

  start(handle: UntypedWorkflowHandle, args: readonly unknown[]): void {
    this.bind(handle);
    if (this.startArgs) {
      throw new InvalidBatchError({ reason: "the workflow method was already called" });
    }
    this.startArgs = args;
  }

  signal(handle: UntypedWorkflowHandle, name: string, args: readonly unknown[]): void {
    this.bind(handle);
    if (this.signalCall) {
      throw new InvalidBatchError({
        reason: `a signal was already recorded (${this.signalCall.name})`,
      });
    }
    this.signalCall = { name, args };
  }

  /**
   * The recorded request.
   *
   * @throws InvalidBatchError unless both a start and a signal were recorded
   */
  toRequest(): SignalWithStartRequest {
    const { handle, startArgs, signalCall } = this;
    if (!handle || !startArgs) {
      throw new InvalidBatchError({ reason: "no workflow method was called" });
    }
    if (!signalCall) {
      throw new InvalidBatchError({ reason: "no signal method was called" });
    }
    return { handle, startArgs, signalName: signalCall.name, signalArgs: signalCall.args };
  }

  private bind(handle: UntypedWorkflowHandle): void {
    if (this.handle && this.handle !== handle) {
      throw new InvalidBatchError({ reason: "calls target different workflow stubs" });
    }
    this.handle = handle;
  }
}
