import type { Project } from "@taskrelay/wrapper-client";
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
  "Unknown subcommand. Use `/project list`, `/project add`, `/project remove`, or `/project info`.";

const subcommands: SubcommandTable = {
  list: listProjects,
  add: addProject,
  remove: removeProject,
  info: describeProject
};

export async function handleProject(ctx: CommandContext): Promise<void> {
  await routeSubcommand(ctx, subcommands, "list", UNKNOWN_SUBCOMMAND);
}

export function formatProjectList(projects: Project[]): string {
  if (projects.length === 0) {
    return "No projects registered.\n\nUse `/project add name:<name> path:<path>` to add one.";
  }
  const lines = projects.map(
    (project) =>
      `\`${project.name}\` → \`${project.path}\`${project.description ? ` - ${project.description}` : ""}`
  );
  return `**Your Projects:**\n${lines.join("\n")}`;
}

async function listProjects(ctx: CommandContext): Promise<void> {
  await replyInTwoPhases(ctx, {
    ack: { content: "📂 Loading your projects..." },
    work: async () => {
      const projects = await ctx.client.listProjects(ctx.invocation.actingUserId);
      return { content: formatProjectList(projects), followUps: [] };
    },
    failure: (error) => renderFailure("Failed to list projects", error)
  });
}

async function addProject(ctx: CommandContext): Promise<void> {
  const { invocation } = ctx;
  const name = getStringOption(invocation, "name");
  const path = getStringOption(invocation, "path");
  if (!name || !path) {
    await replyImmediately(ctx, "❌ Both `name` and `path` are required.");
    return;
  }

  await replyInTwoPhases(ctx, {
    ack: { content: `📂 Adding project \`${name}\`...` },
    work: async () => {
      const project = await ctx.client.addProject({
        name,
        path,
        description: getStringOption(invocation, "description"),
        ownerId: invocation.actingUserId
      });
      return {
        content:
          `✅ **Project Added**\n\n**Name:** \`${project.name}\`\n**Path:** \`${project.path}\`\n\n` +
          `Use \`/task prompt:"..." project:${project.name}\` to work on this project.`,
        followUps: []
      };
    },
    failure: (error) => renderFailure("Failed to add project", error)
  });
}

async function removeProject(ctx: CommandContext): Promise<void> {
  const name = getStringOption(ctx.invocation, "name");
  if (!name) {
    await replyImmediately(ctx, "❌ Project `name` is required.");
    return;
  }

  await replyInTwoPhases(ctx, {
    ack: { content: `📂 Removing project \`${name}\`...` },
    work: async () => {
      await ctx.client.removeProject(ctx.invocation.actingUserId, name);
      return { content: `✅ Project \`${name}\` has been removed.`, followUps: [] };
    },
    failure: (error) => renderFailure("Failed to remove project", error)
  });
}

async function describeProject(ctx: CommandContext): Promise<void> {
  const name = getStringOption(ctx.invocation, "name");
  if (!name) {
    await replyImmediately(ctx, "❌ Project `name` is required.");
    return;
  }

  await replyInTwoPhases(ctx, {
    ack: { content: `📂 Looking up project \`${name}\`...` },
    work: async () => {
      const project = await ctx.client.getProject(ctx.invocation.actingUserId, name);
      const lines = [
        `**Project \`${project.name}\`**`,
        "",
        `**Path:** \`${project.path}\``,
        `**Description:** ${project.description || "(none)"}`,
        `**Created:** ${project.createdAt}`
      ];
      return { content: lines.join("\n"), followUps: [] };
    },
    failure: (error) => renderFailure("Failed to get project", error)
  });
}
