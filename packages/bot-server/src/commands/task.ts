import { executionModeSchema, type ExecutionMode } from "@taskrelay/wrapper-client";
import { describeAccessFailure, resolveExecutionTarget } from "../access.js";
import { renderFailure, renderTask, TASK_SUBMISSION_VIEW } from "../presenter.js";
import { getStringOption, replyImmediately, type CommandContext } from "./context.js";
import { replyInTwoPhases } from "./two-phase.js";

export async function handleTask(ctx: CommandContext): Promise<void> {
  const { invocation } = ctx;
  const prompt = getStringOption(invocation, "prompt");
  if (!prompt) {
    await replyImmediately(ctx, "❌ A `prompt` is required.");
    return;
  }

  const rawMode = getStringOption(invocation, "mode");
  let mode: ExecutionMode | undefined;
  if (rawMode !== undefined) {
    const parsed = executionModeSchema.safeParse(rawMode);
    if (!parsed.success) {
      await replyImmediately(ctx, "❌ Mode must be `local` or `cluster`.");
      return;
    }
    mode = parsed.data;
  }

  const project = getStringOption(invocation, "project");
  const sessionId = getStringOption(invocation, "session");
  const target = resolveExecutionTarget(invocation.actingUserId, getStringOption(invocation, "target"));

  ctx.log.info(
    {
      userId: target.actingUserId,
      targetUserId: target.targetUserId,
      project,
      mode,
      promptLength: prompt.length
    },
    "task command received"
  );

  const ackParts = [
    project ? ` on \`${project}\`` : "",
    target.targetUserId ? ` via <@${target.targetUserId}>` : "",
    mode ? ` (${mode})` : ""
  ];

  await replyInTwoPhases(ctx, {
    ack: { content: `Processing your task${ackParts.join("")}...` },
    work: async () => {
      const task = await ctx.client.submitTask({
        prompt,
        sessionId,
        project,
        actingUserId: target.actingUserId,
        targetUserId: target.targetUserId,
        mode
      });
      ctx.log.info({ taskId: task.taskId, status: task.status }, "task submitted");
      return renderTask(task, TASK_SUBMISSION_VIEW);
    },
    failure: (error) => renderFailure("Task Failed", error, describeAccessFailure(error, target))
  });
}
