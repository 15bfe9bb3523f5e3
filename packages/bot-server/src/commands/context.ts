import type { FastifyBaseLogger } from "fastify";
import { describeError, type ChatResponder, type Invocation } from "@taskrelay/shared";
import type { WrapperClient } from "@taskrelay/wrapper-client";

export type CommandContext = {
  invocation: Invocation;
  responder: ChatResponder;
  client: WrapperClient;
  log: FastifyBaseLogger;
};

export type CommandHandler = (ctx: CommandContext) => Promise<void>;

export type SubcommandTable = Record<string, CommandHandler>;

/** Blank strings count as missing. */
export function getStringOption(invocation: Invocation, name: string): string | undefined {
  const value = invocation.options[name];
  if (value === undefined) {
    return undefined;
  }
  const text = String(value).trim();
  return text.length > 0 ? text : undefined;
}

/** Display name of a user option, falling back to the raw id. */
export function getUserName(invocation: Invocation, userId: string): string {
  return invocation.resolvedUserNames[userId] ?? userId;
}

export async function routeSubcommand(
  ctx: CommandContext,
  table: SubcommandTable,
  fallback: string,
  unknownMessage: string
): Promise<void> {
  const name = ctx.invocation.subcommand ?? fallback;
  const handler = Object.hasOwn(table, name) ? table[name] : undefined;
  if (!handler) {
    ctx.log.warn(
      { command: ctx.invocation.commandName, subcommand: name },
      "unknown subcommand"
    );
    await replyImmediately(ctx, unknownMessage);
    return;
  }
  await handler(ctx);
}

/** Single ephemeral answer for validation errors and unknown input. */
export async function replyImmediately(ctx: CommandContext, content: string): Promise<void> {
  try {
    await ctx.responder.reply({ content, ephemeral: true });
  } catch (error) {
    ctx.log.error(
      { error: describeError(error), command: ctx.invocation.commandName },
      "failed to send reply"
    );
  }
}
