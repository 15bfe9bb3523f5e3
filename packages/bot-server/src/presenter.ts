import {
  chunkText,
  describeError,
  truncateText,
  type ChunkLimits,
  type RenderedReply
} from "@taskrelay/shared";
import type { ApprovalRequest, TaskRecord, TaskStatus } from "@taskrelay/wrapper-client";
import { DISCORD_MESSAGE_LIMIT } from "./discord-api.js";

export const STATUS_GLYPHS: Record<TaskStatus, string> = {
  pending: "⏳",
  running: "🔄",
  completed: "✅",
  failed: "❌",
  needs_approval: "⚠️"
};

export const STATUS_LABELS: Record<TaskStatus, string> = {
  pending: "Pending",
  running: "Running",
  completed: "Completed",
  failed: "Failed",
  needs_approval: "Needs Approval"
};

export type OutputPolicy =
  | { mode: "chunk"; limits: ChunkLimits }
  | { mode: "truncate"; cap: number };

export type TaskView = {
  title(task: TaskRecord): string;
  details(task: TaskRecord): string[];
  output: OutputPolicy;
  approvalHeading: string;
};

const baseDetails = (task: TaskRecord): string[] => [
  `**Status:** ${STATUS_LABELS[task.status]}`,
  `**Task ID:** \`${task.taskId}\``
];

export const TASK_SUBMISSION_VIEW: TaskView = {
  title: (task) => `Task ${STATUS_LABELS[task.status]}`,
  details: (task) => [...baseDetails(task), `**Session:** \`${task.sessionId}\``],
  output: { mode: "truncate", cap: 1500 },
  approvalHeading: "Approval Required"
};

export const STATUS_VIEW: TaskView = {
  title: () => "Task Status",
  details: (task) => [
    ...baseDetails(task),
    `**Session:** \`${task.sessionId}\``,
    `**Created:** ${task.createdAt}`,
    `**Updated:** ${task.updatedAt}`
  ],
  output: { mode: "chunk", limits: { threshold: 1200, chunkSize: 1900 } },
  approvalHeading: "Awaiting Approval"
};

export const APPROVAL_OUTCOME_VIEW: TaskView = {
  title: () => "Approval Processed",
  details: baseDetails,
  output: { mode: "truncate", cap: 1800 },
  approvalHeading: "Additional Approval Required"
};

export function renderTask(task: TaskRecord, view: TaskView): RenderedReply {
  let content = `${STATUS_GLYPHS[task.status]} **${view.title(task)}**\n\n${view.details(task).join("\n")}`;
  const followUps: string[] = [];

  if (task.output) {
    const rendered = renderOutput(task, view.output);
    content += rendered.content;
    followUps.push(...rendered.followUps);
  }

  if (task.error) {
    content += `\n\n**Error:**\n${fence(task.error)}`;
  }

  if (task.approvalRequest) {
    const block = renderApprovalBlock(task.taskId, task.approvalRequest, view.approvalHeading);
    // The options must never be clipped; a block that does not fit goes out last on its own.
    if (content.length + 2 + block.length > DISCORD_MESSAGE_LIMIT) {
      followUps.push(block);
    } else {
      content += `\n\n${block}`;
    }
  }

  return { content, followUps };
}

function renderOutput(task: TaskRecord, policy: OutputPolicy): RenderedReply {
  if (policy.mode === "truncate") {
    const cut = truncateText(task.output, policy.cap);
    if (!cut.truncated) {
      return { content: `\n\n**Output:**\n${fence(cut.text)}`, followUps: [] };
    }
    return {
      content:
        `\n\n**Output:**\n${fence(`${cut.text}...`)}\n` +
        `(truncated - ${cut.totalLength} chars total) Use \`/status task_id:${task.taskId}\` for full output`,
      followUps: []
    };
  }

  const chunks = chunkText(task.output, policy.limits);
  const [first, ...rest] = chunks;
  if (!first || first.total === 1) {
    return { content: `\n\n**Output:**\n${fence(task.output)}`, followUps: [] };
  }
  return {
    content: `\n\n**Output (chunk 1 of ${first.total}):**\n${fence(first.text)}`,
    followUps: rest.map(
      (chunk) => `**Output (chunk ${chunk.index} of ${chunk.total}):**\n${fence(chunk.text)}`
    )
  };
}

export function renderApprovalBlock(
  taskId: string,
  request: ApprovalRequest,
  heading: string
): string {
  let block =
    `**${heading}:**\n${request.description}\n\n` +
    `Use \`/approve task_id:${taskId} option:<option>\` to respond.`;
  if (request.options.length > 0) {
    const lines = request.options.map(
      (option) =>
        `- ${option.id}: ${option.label}${option.description ? ` - ${option.description}` : ""}`
    );
    block += `\n\nOptions:\n${lines.join("\n")}`;
  }
  return block;
}

/** `❌ **{title}**` followed by the error in a fenced block and an optional hint. */
export function renderFailure(title: string, error: unknown, hint?: string): string {
  const body = `❌ **${title}**\n\n${fence(describeError(error))}`;
  return hint ? `${body}\n\n${hint}` : body;
}

function fence(text: string): string {
  return `\`\`\`\n${text}\n\`\`\``;
}
