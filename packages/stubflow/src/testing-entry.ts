/**
 * stubflow/testing
 *
 * In-process workflow handles and batches for testing code that uses typed
 * workflow stubs.
 *
 * @example
 * ```typescript
 * import { createFakeWorkflowHandle } from 'stubflow/testing';
 *
 * const handle = createFakeWorkflowHandle({ result: 'Hello, Ann' });
 * const greeter = createWorkflowStub(Greeter, handle);
 *
 * await greeter.greet('Ann');
 * expect(handle.callsTo('start')).toEqual([{ op: 'start', args: ['Ann'] }]);
 * ```
 */

export {
  // Types
  type HandleCall,
  type ScriptedStart,
  type FakeWorkflowHandleOptions,
  type FakeWorkflowHandle,
  type BatchCall,
  type RecordingBatch,

  // Fakes
  createFakeWorkflowHandle,
  createRecordingBatch,
} from "./testing";
