import type { OperationSet } from "@synk/core-domain";
import { planOperations, type ExecutionResult, type RemoteOperation } from "@synk/core-application";

const MARKS: Record<RemoteOperation["type"], string> = {
  delete_directory: "- dir ",
  delete_file: "- file",
  create_directory: "+ dir ",
  upload_file: "^ file",
};

export function formatOperation(op: RemoteOperation): string {
  const suffix = op.type === "delete_directory" || op.type === "create_directory" ? "/" : "";
  return `${MARKS[op.type]} ${op.path}${suffix}`;
}

/** One line per operation, in execution order. */
export function formatPlan(ops: OperationSet): string[] {
  return planOperations(ops).map(formatOperation);
}

export function formatFailure(result: Extract<ExecutionResult, { type: "failed" }>): string[] {
  const { operation, failure } = result.failed;
  return [
    `Push stopped after ${result.completed.length} operation(s).`,
    `Failed: ${formatOperation(operation)} (${failure.kind}: ${failure.message})`,
    ...(result.pending.length > 0
      ? [`Not attempted (${result.pending.length}):`, ...result.pending.map((op) => `  ${formatOperation(op)}`)]
      : []),
    "The snapshot was not updated; run 'synk push' again to finish.",
  ];
}
