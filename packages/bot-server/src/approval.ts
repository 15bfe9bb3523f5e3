import type { RenderedReply } from "@taskrelay/shared";
import type { TaskRecord, WrapperClient } from "@taskrelay/wrapper-client";
import { APPROVAL_OUTCOME_VIEW, renderTask } from "./presenter.js";

export type ApprovalDecision = {
  taskId: string;
  actingUserId: string;
  optionId: string;
  customResponse?: string;
};

/**
 * Answers a pending approval. The task id the user typed is the only
 * correlation; the backend decides whether it still waits on a decision.
 */
export async function submitApproval(
  client: WrapperClient,
  decision: ApprovalDecision
): Promise<TaskRecord> {
  return client.submitApproval(decision.taskId, decision.actingUserId, {
    optionId: decision.optionId,
    customResponse: decision.customResponse
  });
}

export function isChainedApproval(task: TaskRecord): boolean {
  return task.status === "needs_approval" && task.approvalRequest !== undefined;
}

export function renderApprovalOutcome(task: TaskRecord): RenderedReply {
  return renderTask(task, APPROVAL_OUTCOME_VIEW);
}
