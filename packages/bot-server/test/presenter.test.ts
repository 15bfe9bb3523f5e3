import { describe, expect, it } from "vitest";
import { REGISTER_HINT } from "../src/access.js";
import { renderApprovalOutcome } from "../src/approval.js";
import {
  renderFailure,
  renderTask,
  STATUS_VIEW,
  TASK_SUBMISSION_VIEW
} from "../src/presenter.js";
import { deleteApproval, makeTask } from "./fixtures.js";

describe("renderTask", () => {
  it("renders a completed submission as a single message", () => {
    expect(renderTask(makeTask(), TASK_SUBMISSION_VIEW)).toEqual({
      content:
        "✅ **Task Completed**\n\n**Status:** Completed\n**Task ID:** `task-1`\n**Session:** `session-1`" +
        "\n\n**Output:**\n```\nhello\n```",
      followUps: []
    });
  });

  it("omits the output block when output is empty", () => {
    const rendered = renderTask(makeTask({ status: "running", output: "" }), TASK_SUBMISSION_VIEW);
    expect(rendered.content).toBe(
      "🔄 **Task Running**\n\n**Status:** Running\n**Task ID:** `task-1`\n**Session:** `session-1`"
    );
  });

  it("adds timestamps to the status view", () => {
    const rendered = renderTask(makeTask({ status: "pending", output: "" }), STATUS_VIEW);
    expect(rendered.content).toBe(
      "⏳ **Task Status**\n\n**Status:** Pending\n**Task ID:** `task-1`\n**Session:** `session-1`" +
        "\n**Created:** 2026-01-01T00:00:00Z\n**Updated:** 2026-01-01T00:00:05Z"
    );
  });

  it("keeps status output at the threshold in the primary message", () => {
    const output = "x".repeat(1200);
    const rendered = renderTask(makeTask({ output }), STATUS_VIEW);
    expect(rendered.followUps).toEqual([]);
    expect(rendered.content.endsWith(`**Output:**\n\`\`\`\n${output}\n\`\`\``)).toBe(true);
  });

  it("chunks long status output into labelled follow-ups", () => {
    const output = "a".repeat(1200) + "b".repeat(1800);
    const rendered = renderTask(makeTask({ output }), STATUS_VIEW);
    expect(rendered.content.endsWith(`**Output (chunk 1 of 2):**\n\`\`\`\n${"a".repeat(1200)}\n\`\`\``)).toBe(
      true
    );
    expect(rendered.followUps).toEqual([`**Output (chunk 2 of 2):**\n\`\`\`\n${"b".repeat(1800)}\n\`\`\``]);
  });

  it("truncates submission output with a pointer to the status command", () => {
    const rendered = renderTask(makeTask({ output: "y".repeat(1600) }), TASK_SUBMISSION_VIEW);
    expect(rendered.followUps).toEqual([]);
    expect(
      rendered.content.endsWith(
        `**Output:**\n\`\`\`\n${"y".repeat(1500)}...\n\`\`\`\n` +
          "(truncated - 1600 chars total) Use `/status task_id:task-1` for full output"
      )
    ).toBe(true);
  });

  it("shows the error in full", () => {
    const error = "e".repeat(3000);
    const rendered = renderTask(makeTask({ status: "failed", output: "", error }), TASK_SUBMISSION_VIEW);
    expect(rendered.content).toBe(
      "❌ **Task Failed**\n\n**Status:** Failed\n**Task ID:** `task-1`\n**Session:** `session-1`" +
        `\n\n**Error:**\n\`\`\`\n${error}\n\`\`\``
    );
  });

  it("lists approval options in order", () => {
    const rendered = renderTask(
      makeTask({ status: "needs_approval", output: "", approvalRequest: deleteApproval }),
      TASK_SUBMISSION_VIEW
    );
    expect(rendered.content).toBe(
      "⚠️ **Task Needs Approval**\n\n**Status:** Needs Approval\n**Task ID:** `task-1`\n**Session:** `session-1`" +
        "\n\n**Approval Required:**\nDelete config.yaml?\n\n" +
        "Use `/approve task_id:task-1 option:<option>` to respond.\n\n" +
        "Options:\n- yes: Yes\n- no: No - Keep the file"
    );
  });

  it("sends an approval block that would overflow the message as the last follow-up", () => {
    const approval = { ...deleteApproval, description: "x".repeat(300) };
    const rendered = renderTask(
      makeTask({ status: "needs_approval", output: "y".repeat(1600), approvalRequest: approval }),
      TASK_SUBMISSION_VIEW
    );
    expect(rendered.content.length).toBeLessThanOrEqual(2000);
    expect(rendered.content).not.toContain("**Approval Required:**");
    expect(rendered.followUps).toEqual([
      `**Approval Required:**\n${"x".repeat(300)}\n\n` +
        "Use `/approve task_id:task-1 option:<option>` to respond.\n\n" +
        "Options:\n- yes: Yes\n- no: No - Keep the file"
    ]);
  });

  it("uses the awaiting heading on the status view", () => {
    const rendered = renderTask(
      makeTask({ status: "needs_approval", output: "", approvalRequest: deleteApproval }),
      STATUS_VIEW
    );
    expect(rendered.content).toContain("**Awaiting Approval:**\nDelete config.yaml?");
  });
});

describe("renderApprovalOutcome", () => {
  it("renders a chained approval under its own heading", () => {
    const rendered = renderApprovalOutcome(
      makeTask({
        status: "needs_approval",
        output: "",
        approvalRequest: {
          action: "overwrite",
          description: "Overwrite main.py?",
          options: [{ id: "ok", label: "Overwrite", description: undefined }]
        }
      })
    );
    expect(rendered.content).toBe(
      "⚠️ **Approval Processed**\n\n**Status:** Needs Approval\n**Task ID:** `task-1`" +
        "\n\n**Additional Approval Required:**\nOverwrite main.py?\n\n" +
        "Use `/approve task_id:task-1 option:<option>` to respond.\n\n" +
        "Options:\n- ok: Overwrite"
    );
  });

  it("truncates outcome output at 1800 characters", () => {
    const rendered = renderApprovalOutcome(makeTask({ output: "z".repeat(1900) }));
    expect(rendered.content).toContain(`${"z".repeat(1800)}...\n\`\`\`\n(truncated - 1900 chars total)`);
  });
});

describe("renderFailure", () => {
  it("fences the error and appends the hint", () => {
    expect(renderFailure("Task Failed", new Error("User not registered"), REGISTER_HINT)).toBe(
      `❌ **Task Failed**\n\n\`\`\`\nUser not registered\n\`\`\`\n\n${REGISTER_HINT}`
    );
  });
});
