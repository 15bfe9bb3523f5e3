import {
  executionModeSchema,
  isWrapperClientError,
  type WrapperUser
} from "@taskrelay/wrapper-client";
import { renderFailure } from "../presenter.js";
import {
  getStringOption,
  replyImmediately,
  routeSubcommand,
  type CommandContext,
  type SubcommandTable
} from "./context.js";
import { replyInTwoPhases } from "./two-phase.js";

const UNKNOWN_SUBCOMMAND =
  "Unknown subcommand. Use `/register local`, `/register unregister`, `/register mode`, or `/register status`.";

export const NOT_REGISTERED_MESSAGE =
  "**Not Registered**\n\nYou haven't registered yet.\n\n" +
  "To use your local machine:\n`/register local url:http://your-ip:8000`\n\n" +
  "To use the cluster (if enabled by admin):\nContact an admin to enable cluster access.";

const MODE_DESTINATIONS = {
  local: "your local machine",
  cluster: "the cluster"
} as const;

const subcommands: SubcommandTable = {
  local: registerLocal,
  unregister: unregisterLocal,
  mode: setDefaultMode,
  status: showStatus
};

export async function handleRegister(ctx: CommandContext): Promise<void> {
  await routeSubcommand(ctx, subcommands, "status", UNKNOWN_SUBCOMMAND);
}

export function formatRegistrationStatus(user: WrapperUser): string {
  const local = user.localWrapperUrl
    ? `✅ Registered: \`${user.localWrapperUrl}\``
    : "❌ Not registered";
  let cluster = "❌ Not enabled";
  if (user.clusterEnabled) {
    cluster = user.clusterStoragePath
      ? `✅ Enabled (storage: \`${user.clusterStoragePath}\`)`
      : "✅ Enabled";
  }
  return [
    "**Your Registration Status**",
    "",
    `**Discord ID:** \`${user.discordId}\``,
    `**Local Wrapper:** ${local}`,
    `**Cluster Access:** ${cluster}`,
    `**Default Mode:** ${user.defaultMode}`,
    `**Last Seen:** ${user.lastSeen}`
  ].join("\n");
}

async function registerLocal(ctx: CommandContext): Promise<void> {
  const { invocation } = ctx;
  const url = getStringOption(invocation, "url");
  if (!url) {
    await replyImmediately(ctx, "❌ URL is required.");
    return;
  }

  await replyInTwoPhases(ctx, {
    ack: { content: "🔗 Registering your local wrapper...", ephemeral: true },
    work: async () => {
      const user = await ctx.client.registerLocal({
        discordId: invocation.actingUserId,
        discordName: invocation.actingUserName,
        wrapperUrl: url
      });
      ctx.log.info({ userId: user.discordId }, "local wrapper registered");
      return {
        content:
          `✅ **Local Wrapper Registered**\n\n**URL:** \`${user.localWrapperUrl ?? url}\`\n` +
          `**Default Mode:** ${user.defaultMode}\n\n` +
          "Start the wrapper service on that machine, then send it work with `/task prompt:\"...\"`.",
        followUps: []
      };
    },
    failure: (error) => renderFailure("Failed to register", error)
  });
}

async function unregisterLocal(ctx: CommandContext): Promise<void> {
  await replyInTwoPhases(ctx, {
    ack: { content: "🔗 Removing your local wrapper...", ephemeral: true },
    work: async () => {
      await ctx.client.unregisterLocal(ctx.invocation.actingUserId);
      return { content: "✅ Local wrapper unregistered.", followUps: [] };
    },
    failure: (error) => renderFailure("Failed to unregister", error)
  });
}

async function setDefaultMode(ctx: CommandContext): Promise<void> {
  const parsed = executionModeSchema.safeParse(getStringOption(ctx.invocation, "default"));
  if (!parsed.success) {
    await replyImmediately(ctx, "❌ Mode must be `local` or `cluster`.");
    return;
  }
  const mode = parsed.data;

  await replyInTwoPhases(ctx, {
    ack: { content: `⚙️ Switching default mode to **${mode}**...`, ephemeral: true },
    work: async () => {
      await ctx.client.setUserMode(ctx.invocation.actingUserId, mode);
      return {
        content: `✅ Default mode set to **${mode}**\n\nYour tasks will now run on: ${MODE_DESTINATIONS[mode]}`,
        followUps: []
      };
    },
    failure: (error) =>
      renderFailure(
        "Failed to set mode",
        error,
        "You may need to register first with `/register local url:<your-url>`"
      )
  });
}

async function showStatus(ctx: CommandContext): Promise<void> {
  await replyInTwoPhases(ctx, {
    ack: { content: "🔍 Looking up your registration...", ephemeral: true },
    work: async () => {
      try {
        const user = await ctx.client.getUser(ctx.invocation.actingUserId);
        return { content: formatRegistrationStatus(user), followUps: [] };
      } catch (error) {
        if (isWrapperClientError(error) && error.status === 404) {
          return { content: NOT_REGISTERED_MESSAGE, followUps: [] };
        }
        throw error;
      }
    },
    failure: (error) => renderFailure("Failed to get registration status", error)
  });
}
