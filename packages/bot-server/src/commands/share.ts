import type { AccessibleWrapper } from "@taskrelay/wrapper-client";
import { checkShareTarget } from "../access.js";
import { renderFailure } from "../presenter.js";
import {
  getStringOption,
  getUserName,
  replyImmediately,
  routeSubcommand,
  type CommandContext,
  type SubcommandTable
} from "./context.js";
import { replyInTwoPhases } from "./two-phase.js";

const UNKNOWN_SUBCOMMAND =
  "Unknown subcommand. Use `/share add`, `/share remove`, `/share list`, or `/share available`.";

const subcommands: SubcommandTable = {
  add: shareWrapper,
  remove: unshareWrapper,
  list: listShares,
  available: listAvailable
};

export async function handleShare(ctx: CommandContext): Promise<void> {
  await routeSubcommand(ctx, subcommands, "list", UNKNOWN_SUBCOMMAND);
}

export function formatShareList(sharedWith: string[]): string {
  if (sharedWith.length === 0) {
    return (
      "**Your Wrapper Sharing**\n\nYou haven't shared your wrapper with anyone.\n\n" +
      "Use `/share add user:@someone` to grant access."
    );
  }
  const lines = sharedWith.map((userId) => `- <@${userId}>`);
  return `**Your Wrapper Sharing**\n\nYour wrapper is shared with ${sharedWith.length} user(s):\n${lines.join("\n")}`;
}

export function formatAccessibleWrappers(wrappers: AccessibleWrapper[]): string {
  const lines = wrappers.map((wrapper) =>
    wrapper.isOwn
      ? `- **Your wrapper** (<@${wrapper.ownerId}>)`
      : `- <@${wrapper.ownerId}> (\`${wrapper.ownerName || wrapper.ownerId}\`)`
  );
  let content = "**Available Wrappers**\n\n";
  content += lines.length > 0 ? lines.join("\n") : "You don't have access to any wrappers yet.";
  if (wrappers.some((wrapper) => !wrapper.isOwn)) {
    content += "\n\nTo use someone else's wrapper:\n`/task prompt:\"...\" target:@username`";
  }
  return content;
}

async function shareWrapper(ctx: CommandContext): Promise<void> {
  const { invocation } = ctx;
  const targetUserId = getStringOption(invocation, "user");
  if (!targetUserId) {
    await replyImmediately(ctx, "Please specify a user to share with.");
    return;
  }
  const check = checkShareTarget(invocation.actingUserId, targetUserId);
  if (!check.ok) {
    await replyImmediately(ctx, check.message);
    return;
  }
  const targetName = getUserName(invocation, check.targetUserId);

  await replyInTwoPhases(ctx, {
    ack: { content: `🤝 Sharing your wrapper with <@${check.targetUserId}>...` },
    work: async () => {
      const shares = await ctx.client.shareWith(check.ownerId, check.targetUserId);
      ctx.log.info(
        { ownerId: check.ownerId, targetUserId: check.targetUserId },
        "wrapper shared"
      );
      return {
        content:
          `**Wrapper Shared**\n\n<@${check.targetUserId}> (\`${targetName}\`) now has access to your wrapper.\n\n` +
          `They can use it with:\n\`/task prompt:"..." target:@${invocation.actingUserName}\`\n\n` +
          `**Currently shared with:** ${shares.sharedWith.length} user(s)`,
        followUps: []
      };
    },
    failure: (error) => renderFailure("Failed to share wrapper", error)
  });
}

async function unshareWrapper(ctx: CommandContext): Promise<void> {
  const { invocation } = ctx;
  const targetUserId = getStringOption(invocation, "user");
  if (!targetUserId) {
    await replyImmediately(ctx, "Please specify a user to remove.");
    return;
  }
  const ownerId = invocation.actingUserId;
  const targetName = getUserName(invocation, targetUserId);

  await replyInTwoPhases(ctx, {
    ack: { content: `🤝 Removing access for <@${targetUserId}>...` },
    work: async () => {
      const shares = await ctx.client.unshareWith(ownerId, targetUserId);
      ctx.log.info({ ownerId, targetUserId }, "wrapper access removed");
      return {
        content:
          `**Access Removed**\n\n<@${targetUserId}> (\`${targetName}\`) no longer has access to your wrapper.\n\n` +
          `**Currently shared with:** ${shares.sharedWith.length} user(s)`,
        followUps: []
      };
    },
    failure: (error) => renderFailure("Failed to remove access", error)
  });
}

async function listShares(ctx: CommandContext): Promise<void> {
  await replyInTwoPhases(ctx, {
    ack: { content: "🤝 Loading your sharing list...", ephemeral: true },
    work: async () => {
      const shares = await ctx.client.listShared(ctx.invocation.actingUserId);
      return { content: formatShareList(shares.sharedWith), followUps: [] };
    },
    failure: (error) => renderFailure("Failed to list shares", error)
  });
}

async function listAvailable(ctx: CommandContext): Promise<void> {
  await replyInTwoPhases(ctx, {
    ack: { content: "🤝 Loading wrappers you can use...", ephemeral: true },
    work: async () => {
      const wrappers = await ctx.client.listAccessibleWrappers(ctx.invocation.actingUserId);
      return { content: formatAccessibleWrappers(wrappers), followUps: [] };
    },
    failure: (error) => renderFailure("Failed to list available wrappers", error)
  });
}
