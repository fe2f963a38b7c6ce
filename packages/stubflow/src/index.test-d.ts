/**
 * Type tests for stubflow
 * Checked by `tsc --noEmit` and `vitest --typecheck`.
 */
import { describe, expectTypeOf, it } from "vitest";
import {
  defineWorkflowInterface,
  executeWorkflow,
  method,
  queryMethod,
  returns,
  signalMethod,
  signalWithStart,
  startWorkflow,
  workflowMethod,
  type SignalWithStartRequest,
  type StubOf,
  type WorkflowExecution,
  type WorkflowFuture,
} from "./index";
import { createFakeWorkflowHandle } from "./testing-entry";
import { createWorkflowStub } from "./stub";

type Order = { id: string; total: number };

const Orders = defineWorkflowInterface("Orders", {
  place: method<(customer: string, items: string[]) => Order>(
    returns.value<Order>({ name: "Order", zero: { id: "", total: 0 } }),
    workflowMethod()
  ),
  cancel: method<(reason: string) => void>(returns.void(), signalMethod()),
  total: method<() => number>(returns.number(), queryMethod()),
});

const orders = createWorkflowStub(Orders, createFakeWorkflowHandle());

describe("stub typing", () => {
  it("keeps parameters and promises the declared result", () => {
    expectTypeOf(orders.place).parameters.toEqualTypeOf<[customer: string, items: string[]]>();
    expectTypeOf(orders.place).returns.toEqualTypeOf<Promise<Order>>();
    expectTypeOf(orders.cancel).returns.toEqualTypeOf<Promise<void>>();
    expectTypeOf(orders.total).returns.toEqualTypeOf<Promise<number>>();
  });

  it("derives the stub type from the interface", () => {
    expectTypeOf(orders).toEqualTypeOf<StubOf<typeof Orders>>();
  });

  it("types scoped invocation results", () => {
    expectTypeOf(startWorkflow(() => orders.place("c", []))).toEqualTypeOf<
      Promise<WorkflowExecution>
    >();
    expectTypeOf(executeWorkflow(() => orders.place("c", []))).toEqualTypeOf<
      Promise<WorkflowFuture<Order>>
    >();
    expectTypeOf(signalWithStart(() => orders.cancel("late"))).toEqualTypeOf<
      Promise<SignalWithStartRequest>
    >();
  });

  it("rejects mismatched return tokens", () => {
    // @ts-expect-error a string token cannot describe a number result
    method<() => number>(returns.string(), queryMethod());
  });
});
