import { describeError, type ChatMessage, type RenderedReply } from "@taskrelay/shared";
import type { CommandContext } from "./context.js";

export type TwoPhaseReply = {
  ack: ChatMessage;
  work: () => Promise<RenderedReply>;
  failure: (error: unknown) => string;
};

/**
 * Acknowledges, runs the backend call, then edits the acknowledgement into
 * the final reply and sends follow-ups one at a time. Nothing here throws:
 * delivery failures are logged.
 */
export async function replyInTwoPhases(ctx: CommandContext, plan: TwoPhaseReply): Promise<void> {
  const { invocation, responder, log } = ctx;
  const logContext = {
    command: invocation.commandName,
    subcommand: invocation.subcommand,
    interactionId: invocation.interactionId
  };

  try {
    await responder.reply(plan.ack);
  } catch (error) {
    log.error({ ...logContext, error: describeError(error) }, "failed to acknowledge command");
    return;
  }

  let rendered: RenderedReply;
  try {
    rendered = await plan.work();
  } catch (error) {
    log.error({ ...logContext, error: describeError(error) }, "backend call failed");
    rendered = { content: plan.failure(error), followUps: [] };
  }

  try {
    await responder.edit(rendered.content);
  } catch (error) {
    log.error({ ...logContext, error: describeError(error) }, "failed to edit acknowledgement");
    return;
  }

  for (const [index, content] of rendered.followUps.entries()) {
    try {
      await responder.followUp({ content, ephemeral: plan.ack.ephemeral });
    } catch (error) {
      log.error(
        { ...logContext, followUp: index + 1, error: describeError(error) },
        "failed to send follow-up"
      );
    }
  }
}
