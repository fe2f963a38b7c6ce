import { isDuplicateWorkflowError } from "../errors";
import type { UntypedWorkflowHandle, WorkflowExecution, WorkflowIdReusePolicy } from "../types";

export type DuplicateStartOptions = {
  /**
   * Effective reuse policy of the workflow.
   * @default handle.getOptions()?.idReusePolicy
   */
  idReusePolicy?: WorkflowIdReusePolicy;
  /** Called with the execution known before the attempt and the suppressed error. */
  onSuppressed?: (execution: WorkflowExecution | undefined, error: unknown) => void;
};

/**
 * Start the workflow behind `handle`, tolerating an already started run.
 *
 * `start` is always attempted. A duplicate-workflow rejection is suppressed
 * unless the reuse policy is `AllowDuplicate`, in which case it propagates:
 * under any other policy a repeated call attaches to the existing run and the
 * caller goes on to read its result. Used by sync and execute dispatch only;
 * start mode calls `handle.start` directly.
 */
export async function startWithDuplicatePolicy(
  handle: UntypedWorkflowHandle,
  args: readonly unknown[],
  options: DuplicateStartOptions = {}
): Promise<void> {
  const knownExecution = handle.getExecution();
  try {
    await handle.start(args);
  } catch (error) {
    if (!isDuplicateWorkflowError(error)) throw error;
    const policy = options.idReusePolicy ?? handle.getOptions()?.idReusePolicy;
    if (policy === "AllowDuplicate") throw error;
    options.onSuppressed?.(knownExecution, error);
  }
}
