import type { FastifyBaseLogger } from "fastify";
import type { ChatResponder, CommandName, Invocation } from "@taskrelay/shared";
import type { WrapperClient } from "@taskrelay/wrapper-client";
import { handleApprove } from "./commands/approve.js";
import { replyImmediately, type CommandHandler } from "./commands/context.js";
import { handleProject } from "./commands/project.js";
import { handleRegister } from "./commands/register.js";
import { handleShare } from "./commands/share.js";
import { handleStatus } from "./commands/status.js";
import { handleTask } from "./commands/task.js";

export const UNKNOWN_COMMAND_MESSAGE = "Unknown command.";

const COMMAND_HANDLERS: Record<CommandName, CommandHandler> = {
  task: handleTask,
  status: handleStatus,
  approve: handleApprove,
  project: handleProject,
  register: handleRegister,
  share: handleShare
};

export type DispatcherDeps = {
  client: WrapperClient;
  log: FastifyBaseLogger;
};

export function isCommandName(name: string): name is CommandName {
  return Object.hasOwn(COMMAND_HANDLERS, name);
}

/** Runs the handler for one invocation. Resolves once every reply was attempted. */
export async function dispatchCommand(
  deps: DispatcherDeps,
  invocation: Invocation,
  responder: ChatResponder
): Promise<void> {
  const log = deps.log.child({
    interactionId: invocation.interactionId,
    userId: invocation.actingUserId
  });
  const ctx = { invocation, responder, client: deps.client, log };

  if (!isCommandName(invocation.commandName)) {
    log.warn({ command: invocation.commandName }, "unknown command");
    await replyImmediately(ctx, UNKNOWN_COMMAND_MESSAGE);
    return;
  }

  log.debug({ command: invocation.commandName, subcommand: invocation.subcommand }, "dispatching command");
  await COMMAND_HANDLERS[invocation.commandName](ctx);
}
