import { renderFailure, renderTask, STATUS_VIEW } from "../presenter.js";
import { getStringOption, replyImmediately, type CommandContext } from "./context.js";
import { replyInTwoPhases } from "./two-phase.js";

export async function handleStatus(ctx: CommandContext): Promise<void> {
  const taskId = getStringOption(ctx.invocation, "task_id");
  if (!taskId) {
    await replyImmediately(ctx, "❌ A `task_id` is required.");
    return;
  }

  await replyInTwoPhases(ctx, {
    ack: { content: "🔍 Checking task status..." },
    work: async () => {
      const task = await ctx.client.getTask(taskId, ctx.invocation.actingUserId);
      return renderTask(task, STATUS_VIEW);
    },
    failure: (error) => renderFailure("Failed to get task status", error)
  });
}
