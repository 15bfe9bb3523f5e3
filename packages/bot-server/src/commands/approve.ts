import { isChainedApproval, renderApprovalOutcome, submitApproval } from "../approval.js";
import { renderFailure } from "../presenter.js";
import { getStringOption, replyImmediately, type CommandContext } from "./context.js";
import { replyInTwoPhases } from "./two-phase.js";

export async function handleApprove(ctx: CommandContext): Promise<void> {
  const { invocation } = ctx;
  const taskId = getStringOption(invocation, "task_id");
  const optionId = getStringOption(invocation, "option");
  if (!taskId || !optionId) {
    await replyImmediately(ctx, "❌ Both `task_id` and `option` are required.");
    return;
  }

  await replyInTwoPhases(ctx, {
    ack: { content: "⏳ Processing approval..." },
    work: async () => {
      const task = await submitApproval(ctx.client, {
        taskId,
        actingUserId: invocation.actingUserId,
        optionId,
        customResponse: getStringOption(invocation, "response")
      });
      ctx.log.info(
        { taskId, optionId, status: task.status, chained: isChainedApproval(task) },
        "approval submitted"
      );
      return renderApprovalOutcome(task);
    },
    failure: (error) => renderFailure("Approval Failed", error)
  });
}
