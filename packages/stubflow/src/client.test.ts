/**
 * Tests for the stub factory and scoped invocations
 */
import { describe, it, expect } from "vitest";
import {
  createStubFactory,
  executeWorkflow,
  signalWithStart,
  startWorkflow,
  type HandleRequest,
} from "./client";
import {
  DuplicateWorkflowError,
  InvalidBatchError,
  MissingWorkflowMethodError,
  NoResultError,
  ReentrancyError,
  RoleNotAllowedError,
} from "./errors";
import { defineWorkflowInterface } from "./interface/define";
import { method, queryMethod, signalMethod, workflowMethod } from "./interface/markers";
import { returns } from "./returns";
import { getUntypedHandle } from "./stub";
import { createFakeWorkflowHandle, createRecordingBatch, type FakeWorkflowHandle } from "./testing";
import type { DispatchEvent, UntypedWorkflowHandle } from "./types";

const Greeter = defineWorkflowInterface(
  "Greeter",
  {
    greet: method<(name: string) => string>(
      returns.string(),
      workflowMethod({ name: "Greet", executionTimeoutMs: 5_000, taskQueue: "greet-fast" })
    ),
    cancel: method<() => void>(returns.void(), signalMethod({ name: "Cancel" })),
    greetings: method<() => number>(returns.number(), queryMethod()),
  },
  { defaults: { taskQueue: "greetings", runTimeoutMs: 1_000 } }
);

const Signals = defineWorkflowInterface("Signals", {
  cancel: method<() => void>(returns.void(), signalMethod()),
});

function setup(events: DispatchEvent[] = []) {
  const requests: HandleRequest[] = [];
  const handles: FakeWorkflowHandle[] = [];
  const stubs = createStubFactory({
    createHandle: (request) => {
      requests.push(request);
      const handle = createFakeWorkflowHandle({
        workflowId: request.kind === "new" ? request.options.workflowId : request.execution.workflowId,
        execution: request.kind === "existing" ? request.execution : undefined,
        options: request.kind === "new" ? request.options : undefined,
        result: "Hello, Ann",
        queries: { greetings: () => 3 },
      });
      handles.push(handle);
      return handle;
    },
    onEvent: (event) => events.push(event),
  });
  return { stubs, requests, handles };
}

describe("createStubFactory", () => {
  it("creates handles with merged options for new workflows", () => {
    const { stubs, requests } = setup();
    stubs.newWorkflowStub(Greeter, { workflowId: "greet-ann", taskQueue: undefined });
    expect(requests).toEqual([
      {
        kind: "new",
        workflowType: "Greet",
        options: {
          workflowId: "greet-ann",
          taskQueue: "greet-fast",
          executionTimeoutMs: 5_000,
          runTimeoutMs: 1_000,
        },
      },
    ]);
  });

  it("lets explicit options override method and interface defaults", () => {
    const { stubs, requests } = setup();
    stubs.newWorkflowStub(Greeter, { taskQueue: "vip", runTimeoutMs: 10 });
    expect(requests[0]).toMatchObject({ options: { taskQueue: "vip", runTimeoutMs: 10 } });
  });

  it("requires a workflow method for new workflows", () => {
    const { stubs, requests } = setup();
    expect(() => stubs.newWorkflowStub(Signals)).toThrow(MissingWorkflowMethodError);
    expect(requests).toEqual([]);
  });

  it("attaches stubs to existing executions", async () => {
    const { stubs, requests, handles } = setup();
    const signals = stubs.newWorkflowStubForExecution(Signals, { workflowId: "w-7", runId: "r-1" });
    await signals.cancel();
    expect(requests).toEqual([
      { kind: "existing", workflowType: undefined, execution: { workflowId: "w-7", runId: "r-1" } },
    ]);
    expect(handles[0]?.calls).toEqual([{ op: "signal", name: "cancel", args: [] }]);
  });

  it("names the workflow type of existing executions when the interface has one", () => {
    const { stubs, requests } = setup();
    stubs.newWorkflowStubForExecution(Greeter, { workflowId: "w-7" });
    expect(requests[0]).toMatchObject({ kind: "existing", workflowType: "Greet" });
  });

  it("applies interceptors in order", async () => {
    const order: string[] = [];
    const base = createFakeWorkflowHandle();
    const tagging =
      (label: string) =>
      (handle: UntypedWorkflowHandle, request: HandleRequest): UntypedWorkflowHandle => {
        order.push(`${label}:${request.kind}`);
        return {
          ...handle,
          signal: (name, args) => {
            order.push(`${label}:signal`);
            return handle.signal(name, args);
          },
        };
      };
    const stubs = createStubFactory({
      createHandle: () => base,
      interceptors: [tagging("outer-first"), tagging("outer-last")],
    });
    const signals = stubs.newWorkflowStubForExecution(Signals, { workflowId: "w-1" });
    await signals.cancel();
    expect(order).toEqual([
      "outer-first:existing",
      "outer-last:existing",
      "outer-last:signal",
      "outer-first:signal",
    ]);
    expect(getUntypedHandle(signals)).not.toBe(base);
    expect(base.calls).toEqual([{ op: "signal", name: "cancel", args: [] }]);
  });

  it("applies the merged reuse policy when the handle does not report options", async () => {
    const Reports = defineWorkflowInterface("Reports", {
      build: method<() => string>(returns.string(), workflowMethod()),
    });
    const handle = createFakeWorkflowHandle({
      execution: { workflowId: "report-1" },
      result: "done",
    });
    const stubs = createStubFactory({ createHandle: () => handle });

    const allowing = stubs.newWorkflowStub(Reports, { idReusePolicy: "AllowDuplicate" });
    await expect(allowing.build()).rejects.toBeInstanceOf(DuplicateWorkflowError);

    const defaulted = stubs.newWorkflowStub(Reports, { workflowId: "report-1" });
    await expect(defaulted.build()).resolves.toBe("done");
  });

  it("applies a reuse policy declared on the workflow method", async () => {
    const Reports = defineWorkflowInterface("Reports", {
      build: method<() => string>(
        returns.string(),
        workflowMethod({ idReusePolicy: "AllowDuplicate" })
      ),
    });
    const stubs = createStubFactory({
      createHandle: () =>
        createFakeWorkflowHandle({ execution: { workflowId: "report-1" }, result: "done" }),
    });
    await expect(stubs.newWorkflowStub(Reports).build()).rejects.toBeInstanceOf(
      DuplicateWorkflowError
    );
  });

  it("forwards dispatch events to the factory listener", async () => {
    const events: DispatchEvent[] = [];
    const { stubs } = setup(events);
    const greeter = stubs.newWorkflowStub(Greeter, { workflowId: "greet-ann" });
    await greeter.greetings();
    expect(events.map((e) => e.type)).toEqual(["dispatch_start", "dispatch_success"]);
  });
});

describe("startWorkflow", () => {
  it("returns the started execution", async () => {
    const { stubs, handles } = setup();
    const greeter = stubs.newWorkflowStub(Greeter, { workflowId: "greet-ann" });
    const execution = await startWorkflow(() => greeter.greet("Ann"));
    expect(execution).toEqual({ workflowId: "greet-ann", runId: "run-1" });
    expect(handles[0]?.calls).toEqual([{ op: "start", args: ["Ann"] }]);
  });

  it("rejects signals and queries", async () => {
    const { stubs } = setup();
    const greeter = stubs.newWorkflowStub(Greeter, { workflowId: "greet-ann" });
    await expect(startWorkflow(() => greeter.cancel())).rejects.toBeInstanceOf(RoleNotAllowedError);
    await expect(startWorkflow(() => greeter.greetings())).rejects.toBeInstanceOf(
      RoleNotAllowedError
    );
  });

  it("fails when the callback dispatches nothing", async () => {
    await expect(startWorkflow(async () => undefined)).rejects.toBeInstanceOf(NoResultError);
  });

  it("cannot be nested", async () => {
    const { stubs } = setup();
    const greeter = stubs.newWorkflowStub(Greeter, { workflowId: "greet-ann" });
    await expect(
      startWorkflow(() => executeWorkflow(() => greeter.greet("Ann")))
    ).rejects.toBeInstanceOf(ReentrancyError);
  });

  it("leaves calls in other tasks synchronous", async () => {
    const { stubs } = setup();
    const greeter = stubs.newWorkflowStub(Greeter, { workflowId: "greet-ann" });
    const [execution, count] = await Promise.all([
      startWorkflow(async () => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        return greeter.greet("Ann");
      }),
      greeter.greetings(),
    ]);
    expect(execution.workflowId).toBe("greet-ann");
    expect(count).toBe(3);
  });

  it("returns to sync mode afterwards", async () => {
    const { stubs } = setup();
    const greeter = stubs.newWorkflowStub(Greeter, { workflowId: "greet-ann" });
    await startWorkflow(() => greeter.greet("Ann"));
    await expect(greeter.greet("Ann")).resolves.toBe("Hello, Ann");
  });
});

describe("executeWorkflow", () => {
  it("returns a future of the workflow result", async () => {
    const { stubs, handles } = setup();
    const greeter = stubs.newWorkflowStub(Greeter, { workflowId: "greet-ann" });
    const future = await executeWorkflow(() => greeter.greet("Ann"));
    await expect(future.result).resolves.toBe("Hello, Ann");
    expect(handles[0]?.calls).toEqual([
      { op: "start", args: ["Ann"] },
      { op: "getResultAsync", returnType: "string" },
    ]);
  });
});

describe("signalWithStart", () => {
  it("builds a request from the recorded start and signal", async () => {
    const { stubs, handles } = setup();
    const greeter = stubs.newWorkflowStub(Greeter, { workflowId: "greet-ann" });
    const request = await signalWithStart(async () => {
      await greeter.greet("Ann");
      await greeter.cancel();
    });
    expect(request).toEqual({
      handle: handles[0],
      startArgs: ["Ann"],
      signalName: "Cancel",
      signalArgs: [],
    });
    expect(handles[0]?.calls).toEqual([]);
  });

  it("fills a caller-supplied batch", async () => {
    const { stubs } = setup();
    const greeter = stubs.newWorkflowStub(Greeter, { workflowId: "greet-ann" });
    const batch = createRecordingBatch();
    await expect(signalWithStart(() => greeter.cancel(), batch)).resolves.toBeUndefined();
    expect(batch.calls).toEqual([
      { op: "signal", handle: getUntypedHandle(greeter), name: "Cancel", args: [] },
    ]);
  });

  it("rejects incomplete batches", async () => {
    const { stubs } = setup();
    const greeter = stubs.newWorkflowStub(Greeter, { workflowId: "greet-ann" });
    await expect(signalWithStart(() => greeter.greet("Ann"))).rejects.toThrow(
      new InvalidBatchError({ reason: "no signal method was called" }).message
    );
  });
});
