import { describe, expect, it, vi } from "vitest";
import { WrapperClient } from "../src/client.js";
import { WrapperClientError } from "../src/errors.js";

type RecordedCall = {
  url: string;
  method?: string;
  body?: unknown;
};

function createFakeFetch(respond: (call: RecordedCall) => Response) {
  const calls: RecordedCall[] = [];
  const fetchImpl = vi.fn(async (input: string, init?: RequestInit) => {
    const call: RecordedCall = {
      url: input,
      method: init?.method,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined
    };
    calls.push(call);
    return respond(call);
  });
  return { fetchImpl, calls };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" }
  });
}

const completedTask = {
  task_id: "task-1",
  session_id: "session-1",
  status: "completed",
  output: "hello",
  error: null,
  approval_request: null,
  created_at: "2026-01-01T00:00:00Z",
  updated_at: "2026-01-01T00:00:05Z"
};

describe("WrapperClient", () => {
  it("strips trailing slashes from the base url", () => {
    expect(new WrapperClient("http://wrapper.test:8000///").baseUrl).toBe("http://wrapper.test:8000");
  });

  it("omits unset optional fields when submitting a task", async () => {
    const { fetchImpl, calls } = createFakeFetch(() => jsonResponse(completedTask, 201));
    const client = new WrapperClient("http://wrapper.test/", { fetch: fetchImpl });

    const task = await client.submitTask({ prompt: "list files", actingUserId: "u1" });

    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe("http://wrapper.test/api/v1/tasks");
    expect(calls[0]?.method).toBe("POST");
    expect(calls[0]?.body).toEqual({ prompt: "list files", discord_user_id: "u1" });
    expect(task).toEqual({
      taskId: "task-1",
      sessionId: "session-1",
      status: "completed",
      output: "hello",
      error: undefined,
      approvalRequest: undefined,
      createdAt: "2026-01-01T00:00:00Z",
      updatedAt: "2026-01-01T00:00:05Z"
    });
  });

  it("sends the acting user and target as separate fields", async () => {
    const { fetchImpl, calls } = createFakeFetch(() => jsonResponse(completedTask, 201));
    const client = new WrapperClient("http://wrapper.test", { fetch: fetchImpl });

    await client.submitTask({
      prompt: "run",
      actingUserId: "u1",
      targetUserId: "u2",
      mode: "cluster",
      project: "api",
      sessionId: "s9"
    });

    expect(calls[0]?.body).toEqual({
      prompt: "run",
      session_id: "s9",
      project: "api",
      discord_user_id: "u1",
      target_user_id: "u2",
      mode: "cluster"
    });
  });

  it("encodes task ids and the acting user in the approval url", async () => {
    const { fetchImpl, calls } = createFakeFetch(() => jsonResponse(completedTask));
    const client = new WrapperClient("http://wrapper.test", { fetch: fetchImpl });

    await client.submitApproval("task/1", "u 1", { optionId: "yes" });

    expect(calls[0]?.url).toBe("http://wrapper.test/api/v1/tasks/task%2F1/approve?discord_user_id=u%201");
    expect(calls[0]?.body).toEqual({ option_id: "yes" });
  });

  it("decodes approval requests with ordered options", async () => {
    const { fetchImpl } = createFakeFetch(() =>
      jsonResponse({
        ...completedTask,
        status: "needs_approval",
        output: "",
        approval_request: {
          action: "delete_file",
          description: "Delete config.yaml?",
          options: [
            { id: "yes", label: "Yes" },
            { id: "no", label: "No", description: "Keep the file" }
          ]
        }
      })
    );
    const client = new WrapperClient("http://wrapper.test", { fetch: fetchImpl });

    const task = await client.getTask("task-1", "u1");

    expect(task.status).toBe("needs_approval");
    expect(task.approvalRequest).toEqual({
      action: "delete_file",
      description: "Delete config.yaml?",
      options: [
        { id: "yes", label: "Yes", description: undefined },
        { id: "no", label: "No", description: "Keep the file" }
      ]
    });
  });

  it("surfaces the literal response body on non-success status", async () => {
    const { fetchImpl } = createFakeFetch(
      () => new Response('{"detail":"User not registered"}', { status: 404, statusText: "Not Found" })
    );
    const client = new WrapperClient("http://wrapper.test", { fetch: fetchImpl });

    const error = await client.submitTask({ prompt: "x" }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(WrapperClientError);
    expect(error).toMatchObject({
      kind: "rejected",
      status: 404,
      body: '{"detail":"User not registered"}',
      message: 'Task submission failed (404 Not Found): {"detail":"User not registered"}'
    });
  });

  it("reports connection failures as transport errors", async () => {
    const fetchImpl = vi.fn(async () => {
      throw new TypeError("fetch failed", { cause: new Error("connect ECONNREFUSED 127.0.0.1:8000") });
    });
    const client = new WrapperClient("http://wrapper.test", { fetch: fetchImpl });

    await expect(client.getTask("t1", "u1")).rejects.toMatchObject({
      kind: "transport",
      message: "Failed to get task: fetch failed (connect ECONNREFUSED 127.0.0.1:8000)"
    });
  });

  it("reports malformed bodies as decode errors", async () => {
    const { fetchImpl } = createFakeFetch(() => new Response("<html>oops</html>", { status: 200 }));
    const client = new WrapperClient("http://wrapper.test", { fetch: fetchImpl });

    await expect(client.getTask("t1", "u1")).rejects.toMatchObject({
      kind: "decode",
      message: "Failed to parse task response: response body is not valid JSON"
    });
  });

  it("reports unexpected shapes as decode errors", async () => {
    const { fetchImpl } = createFakeFetch(() => jsonResponse({ task_id: "t1", status: "done" }));
    const client = new WrapperClient("http://wrapper.test", { fetch: fetchImpl });

    await expect(client.getTask("t1", "u1")).rejects.toMatchObject({ kind: "decode" });
    await expect(client.getTask("t1", "u1")).rejects.toThrow(/^Failed to parse task response: /);
  });

  it("accepts empty bodies for delete operations", async () => {
    const { fetchImpl, calls } = createFakeFetch(() => new Response(null, { status: 204 }));
    const client = new WrapperClient("http://wrapper.test", { fetch: fetchImpl });

    await expect(client.removeProject("u1", "my api")).resolves.toBeUndefined();
    await expect(client.unregisterLocal("u1")).resolves.toBeUndefined();
    await expect(client.terminateSession("s1")).resolves.toBeUndefined();

    expect(calls.map((call) => `${call.method} ${call.url}`)).toEqual([
      "DELETE http://wrapper.test/api/v1/projects/u1/my%20api",
      "DELETE http://wrapper.test/api/v1/users/u1/local",
      "DELETE http://wrapper.test/api/v1/sessions/s1"
    ]);
  });

  it("maps sharing endpoints with the owner in the path", async () => {
    const { fetchImpl, calls } = createFakeFetch((call) => {
      if (call.url.endsWith("/accessible-wrappers")) {
        return jsonResponse({
          wrappers: [
            { owner_id: "u1", owner_name: "alice", is_own: true },
            { owner_id: "u2", is_own: false }
          ]
        });
      }
      return jsonResponse({ shared_with: ["u2"] });
    });
    const client = new WrapperClient("http://wrapper.test", { fetch: fetchImpl });

    expect(await client.shareWith("u1", "u2")).toEqual({ sharedWith: ["u2"] });
    expect(await client.unshareWith("u1", "u2")).toEqual({ sharedWith: ["u2"] });
    expect(await client.listShared("u1")).toEqual({ sharedWith: ["u2"] });
    expect(await client.listAccessibleWrappers("u1")).toEqual([
      { ownerId: "u1", ownerName: "alice", isOwn: true },
      { ownerId: "u2", ownerName: "", isOwn: false }
    ]);

    expect(calls.map((call) => `${call.method} ${call.url}`)).toEqual([
      "POST http://wrapper.test/api/v1/users/u1/share",
      "DELETE http://wrapper.test/api/v1/users/u1/share/u2",
      "GET http://wrapper.test/api/v1/users/u1/share",
      "GET http://wrapper.test/api/v1/users/u1/accessible-wrappers"
    ]);
    expect(calls[0]?.body).toEqual({ target_user_id: "u2" });
  });

  it("maps user records", async () => {
    const { fetchImpl, calls } = createFakeFetch(() =>
      jsonResponse({
        discord_id: "u1",
        discord_name: "alice",
        local_wrapper_url: "http://10.0.0.5:8000",
        cluster_enabled: false,
        cluster_storage_path: null,
        default_mode: "local",
        created_at: "2026-01-01T00:00:00Z",
        last_seen: "2026-01-02T00:00:00Z"
      })
    );
    const client = new WrapperClient("http://wrapper.test", { fetch: fetchImpl });

    const user = await client.registerLocal({
      discordId: "u1",
      discordName: "alice",
      wrapperUrl: "http://10.0.0.5:8000"
    });

    expect(calls[0]?.body).toEqual({
      discord_id: "u1",
      discord_name: "alice",
      wrapper_url: "http://10.0.0.5:8000"
    });
    expect(user).toEqual({
      discordId: "u1",
      discordName: "alice",
      localWrapperUrl: "http://10.0.0.5:8000",
      clusterEnabled: false,
      clusterStoragePath: undefined,
      defaultMode: "local",
      createdAt: "2026-01-01T00:00:00Z",
      lastSeen: "2026-01-02T00:00:00Z"
    });
  });

  it("enables and disables cluster access", async () => {
    const { fetchImpl, calls } = createFakeFetch((call) =>
      call.method === "DELETE"
        ? new Response(null, { status: 204 })
        : jsonResponse({
            discord_id: "u1",
            discord_name: "alice",
            local_wrapper_url: null,
            cluster_enabled: true,
            cluster_storage_path: null,
            default_mode: "cluster",
            created_at: "2026-01-01T00:00:00Z",
            last_seen: "2026-01-02T00:00:00Z"
          })
    );
    const client = new WrapperClient("http://wrapper.test", { fetch: fetchImpl });

    const user = await client.enableCluster({ discordId: "u1", discordName: "alice" });
    await client.disableCluster("u1");

    expect(calls).toEqual([
      {
        url: "http://wrapper.test/api/v1/users/enable-cluster",
        method: "POST",
        body: { discord_id: "u1", discord_name: "alice" }
      },
      { url: "http://wrapper.test/api/v1/users/u1/cluster", method: "DELETE", body: undefined }
    ]);
    expect(user.clusterEnabled).toBe(true);
    expect(user.defaultMode).toBe("cluster");
  });

  it("lists projects and sessions", async () => {
    const { fetchImpl } = createFakeFetch((call) => {
      if (call.url.includes("/sessions")) {
        return jsonResponse([
          {
            session_id: "s1",
            task_count: 3,
            created_at: "2026-01-01T00:00:00Z",
            last_activity: "2026-01-01T01:00:00Z",
            status: "active"
          }
        ]);
      }
      return jsonResponse([
        {
          name: "api",
          path: "/srv/api",
          description: "",
          owner_id: "u1",
          created_at: "2026-01-01T00:00:00Z"
        }
      ]);
    });
    const client = new WrapperClient("http://wrapper.test", { fetch: fetchImpl });

    expect(await client.listProjects("u1")).toEqual([
      { name: "api", path: "/srv/api", description: "", ownerId: "u1", createdAt: "2026-01-01T00:00:00Z" }
    ]);
    expect(await client.listSessions()).toEqual([
      {
        sessionId: "s1",
        taskCount: 3,
        createdAt: "2026-01-01T00:00:00Z",
        lastActivity: "2026-01-01T01:00:00Z",
        status: "active"
      }
    ]);
  });
});
