/**
 * Tests for the in-process fakes
 */
import { describe, it, expect } from "vitest";
import { DuplicateWorkflowError } from "../errors";
import { returns } from "../returns";
import { createFakeWorkflowHandle, createRecordingBatch } from "./index";

describe("createFakeWorkflowHandle", () => {
  it("assigns a new run on every successful start", async () => {
    const handle = createFakeWorkflowHandle({ rejectDuplicateStarts: false });
    await expect(handle.start([])).resolves.toEqual({ workflowId: "workflow-1", runId: "run-1" });
    await expect(handle.start([])).resolves.toEqual({ workflowId: "workflow-1", runId: "run-2" });
  });

  it("takes the workflow id from its options", async () => {
    const handle = createFakeWorkflowHandle({ options: { workflowId: "order-9" } });
    await expect(handle.start([])).resolves.toEqual({ workflowId: "order-9", runId: "run-1" });
    expect(handle.getOptions()).toEqual({ workflowId: "order-9" });
  });

  it("rejects a start once an execution exists", async () => {
    const handle = createFakeWorkflowHandle({ workflowType: "Greet" });
    await handle.start([]);
    await expect(handle.start([])).rejects.toThrow(
      "DuplicateWorkflowError: workflow workflow-1 of type Greet is already started"
    );
  });

  it("plays scripted starts before the default", async () => {
    const failure = new Error("unavailable");
    const handle = createFakeWorkflowHandle({
      starts: [{ type: "throw", error: failure }, { type: "duplicate" }],
    });
    await expect(handle.start([])).rejects.toBe(failure);
    await expect(handle.start([])).rejects.toBeInstanceOf(DuplicateWorkflowError);
    await expect(handle.start([])).resolves.toEqual({ workflowId: "workflow-1", runId: "run-1" });
  });

  it("parses results with the return type token", async () => {
    const handle = createFakeWorkflowHandle({ result: 42 });
    await expect(handle.getResult(returns.number())).resolves.toBe(42);
    await expect(handle.getResult(returns.string())).rejects.toBeInstanceOf(TypeError);
  });

  it("answers queries from its handlers", async () => {
    const handle = createFakeWorkflowHandle({ queries: { total: (args) => args.length } });
    await expect(handle.query("total", returns.number(), [1, 2])).resolves.toBe(2);
    await expect(handle.query("missing", returns.number(), [])).rejects.toThrow(
      'Fake handle has no query handler for "missing"'
    );
  });

  it("filters calls by operation", async () => {
    const handle = createFakeWorkflowHandle();
    await handle.signal("Cancel", []);
    await handle.start(["a"]);
    expect(handle.callsTo("signal")).toEqual([{ op: "signal", name: "Cancel", args: [] }]);
    expect(handle.callsTo("start")).toEqual([{ op: "start", args: ["a"] }]);
  });
});

describe("createRecordingBatch", () => {
  it("records starts and signals in order", () => {
    const handle = createFakeWorkflowHandle();
    const batch = createRecordingBatch();
    batch.signal(handle, "Cancel", []);
    batch.start(handle, ["Ann"]);
    expect(batch.calls.map((call) => call.op)).toEqual(["signal", "start"]);
  });
});
