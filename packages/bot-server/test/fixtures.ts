import type { TaskRecord } from "@taskrelay/wrapper-client";

export function makeTask(overrides: Partial<TaskRecord> = {}): TaskRecord {
  return {
    taskId: "task-1",
    sessionId: "session-1",
    status: "completed",
    output: "hello",
    error: undefined,
    approvalRequest: undefined,
    createdAt: "2026-01-01T00:00:00Z",
    updatedAt: "2026-01-01T00:00:05Z",
    ...overrides
  };
}

export const deleteApproval = {
  action: "delete_file",
  description: "Delete config.yaml?",
  options: [
    { id: "yes", label: "Yes", description: undefined },
    { id: "no", label: "No", description: "Keep the file" }
  ]
};

/** Wire form of a task record as the wrapper service sends it. */
export function taskBody(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    task_id: "task-1",
    session_id: "session-1",
    status: "completed",
    output: "hello",
    error: null,
    approval_request: null,
    created_at: "2026-01-01T00:00:00Z",
    updated_at: "2026-01-01T00:00:05Z",
    ...overrides
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" }
  });
}
