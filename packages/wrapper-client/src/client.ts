import type { z } from "zod";
import { WrapperClientError } from "./errors.js";
import { joinPath, WRAPPER_ROUTES } from "./routes.js";
import {
  accessibleWrappersSchema,
  healthStatusSchema,
  projectSchema,
  sessionInfoSchema,
  shareListSchema,
  taskRecordSchema,
  wrapperUserSchema,
  type AccessibleWrapper,
  type ExecutionMode,
  type HealthStatus,
  type Project,
  type SessionInfo,
  type ShareList,
  type TaskRecord,
  type WrapperUser
} from "./schemas.js";
import type {
  ApprovalSubmission,
  ClusterEnrollment,
  LocalRegistration,
  NewProject,
  TaskSubmission
} from "./types.js";

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type WrapperClientOptions = {
  fetch?: FetchLike;
  headers?: Record<string, string>;
};

type HttpMethod = "GET" | "POST" | "DELETE";

type RequestOptions = {
  method: HttpMethod;
  path: string;
  query?: Record<string, string>;
  body?: Record<string, unknown>;
  /** Message prefix when the request never got a response. */
  sendContext: string;
  /** Message prefix when the service answered with a non-success status. */
  failure: string;
};

type JsonRequestOptions<T> = RequestOptions & {
  /** Message prefix when the body cannot be decoded. */
  parseContext: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
};

const projectListSchema = arrayOf(projectSchema);
const sessionListSchema = arrayOf(sessionInfoSchema);

export class WrapperClient {
  readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly headers: Record<string, string>;

  constructor(baseUrl: string, options: WrapperClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.headers = options.headers ?? {};
  }

  async healthCheck(): Promise<HealthStatus> {
    return this.requestJson({
      method: "GET",
      path: WRAPPER_ROUTES.HEALTH,
      sendContext: "Failed to connect to wrapper service",
      failure: "Health check failed",
      parseContext: "Failed to parse health response",
      schema: healthStatusSchema
    });
  }

  async submitTask(submission: TaskSubmission): Promise<TaskRecord> {
    return this.requestJson({
      method: "POST",
      path: WRAPPER_ROUTES.TASKS,
      body: {
        prompt: submission.prompt,
        session_id: submission.sessionId,
        project: submission.project,
        working_dir: submission.workingDir,
        discord_user_id: submission.actingUserId,
        target_user_id: submission.targetUserId,
        mode: submission.mode
      },
      sendContext: "Failed to submit task",
      failure: "Task submission failed",
      parseContext: "Failed to parse task response",
      schema: taskRecordSchema
    });
  }

  async getTask(taskId: string, actingUserId: string): Promise<TaskRecord> {
    return this.requestJson({
      method: "GET",
      path: joinPath(WRAPPER_ROUTES.TASKS, taskId),
      query: { discord_user_id: actingUserId },
      sendContext: "Failed to get task",
      failure: "Failed to get task",
      parseContext: "Failed to parse task response",
      schema: taskRecordSchema
    });
  }

  async submitApproval(
    taskId: string,
    actingUserId: string,
    submission: ApprovalSubmission
  ): Promise<TaskRecord> {
    return this.requestJson({
      method: "POST",
      path: `${joinPath(WRAPPER_ROUTES.TASKS, taskId)}/approve`,
      query: { discord_user_id: actingUserId },
      body: {
        option_id: submission.optionId,
        custom_response: submission.customResponse
      },
      sendContext: "Failed to submit approval",
      failure: "Approval submission failed",
      parseContext: "Failed to parse approval response",
      schema: taskRecordSchema
    });
  }

  async listSessions(): Promise<SessionInfo[]> {
    return this.requestJson({
      method: "GET",
      path: WRAPPER_ROUTES.SESSIONS,
      sendContext: "Failed to list sessions",
      failure: "Failed to list sessions",
      parseContext: "Failed to parse sessions response",
      schema: sessionListSchema
    });
  }

  async terminateSession(sessionId: string): Promise<void> {
    await this.requestVoid({
      method: "DELETE",
      path: joinPath(WRAPPER_ROUTES.SESSIONS, sessionId),
      sendContext: "Failed to terminate session",
      failure: "Session termination failed"
    });
  }

  async listProjects(ownerId: string): Promise<Project[]> {
    return this.requestJson({
      method: "GET",
      path: joinPath(WRAPPER_ROUTES.PROJECTS, ownerId),
      sendContext: "Failed to list projects",
      failure: "Failed to list projects",
      parseContext: "Failed to parse projects response",
      schema: projectListSchema
    });
  }

  async getProject(ownerId: string, name: string): Promise<Project> {
    return this.requestJson({
      method: "GET",
      path: joinPath(WRAPPER_ROUTES.PROJECTS, ownerId, name),
      sendContext: "Failed to get project",
      failure: "Failed to get project",
      parseContext: "Failed to parse project response",
      schema: projectSchema
    });
  }

  async addProject(project: NewProject): Promise<Project> {
    return this.requestJson({
      method: "POST",
      path: WRAPPER_ROUTES.PROJECTS,
      body: {
        name: project.name,
        path: project.path,
        description: project.description,
        discord_user_id: project.ownerId
      },
      sendContext: "Failed to add project",
      failure: "Failed to add project",
      parseContext: "Failed to parse project response",
      schema: projectSchema
    });
  }

  async removeProject(ownerId: string, name: string): Promise<void> {
    await this.requestVoid({
      method: "DELETE",
      path: joinPath(WRAPPER_ROUTES.PROJECTS, ownerId, name),
      sendContext: "Failed to remove project",
      failure: "Failed to remove project"
    });
  }

  async getUser(discordId: string): Promise<WrapperUser> {
    return this.requestJson({
      method: "GET",
      path: joinPath(WRAPPER_ROUTES.USERS, discordId),
      sendContext: "Failed to get user",
      failure: "Failed to get user",
      parseContext: "Failed to parse user response",
      schema: wrapperUserSchema
    });
  }

  async registerLocal(registration: LocalRegistration): Promise<WrapperUser> {
    return this.requestJson({
      method: "POST",
      path: `${WRAPPER_ROUTES.USERS}/register-local`,
      body: {
        discord_id: registration.discordId,
        discord_name: registration.discordName,
        wrapper_url: registration.wrapperUrl,
        auth_token: registration.authToken
      },
      sendContext: "Failed to register local wrapper",
      failure: "Failed to register local wrapper",
      parseContext: "Failed to parse user response",
      schema: wrapperUserSchema
    });
  }

  async unregisterLocal(discordId: string): Promise<void> {
    await this.requestVoid({
      method: "DELETE",
      path: `${joinPath(WRAPPER_ROUTES.USERS, discordId)}/local`,
      sendContext: "Failed to unregister local wrapper",
      failure: "Failed to unregister local wrapper"
    });
  }

  async enableCluster(enrollment: ClusterEnrollment): Promise<WrapperUser> {
    return this.requestJson({
      method: "POST",
      path: `${WRAPPER_ROUTES.USERS}/enable-cluster`,
      body: {
        discord_id: enrollment.discordId,
        discord_name: enrollment.discordName,
        storage_path: enrollment.storagePath
      },
      sendContext: "Failed to enable cluster access",
      failure: "Failed to enable cluster access",
      parseContext: "Failed to parse user response",
      schema: wrapperUserSchema
    });
  }

  async disableCluster(discordId: string): Promise<void> {
    await this.requestVoid({
      method: "DELETE",
      path: `${joinPath(WRAPPER_ROUTES.USERS, discordId)}/cluster`,
      sendContext: "Failed to disable cluster access",
      failure: "Failed to disable cluster access"
    });
  }

  async setUserMode(discordId: string, mode: ExecutionMode): Promise<WrapperUser> {
    return this.requestJson({
      method: "POST",
      path: `${joinPath(WRAPPER_ROUTES.USERS, discordId)}/set-mode`,
      body: { mode },
      sendContext: "Failed to set user mode",
      failure: "Failed to set user mode",
      parseContext: "Failed to parse user response",
      schema: wrapperUserSchema
    });
  }

  async shareWith(ownerId: string, targetId: string): Promise<ShareList> {
    return this.requestJson({
      method: "POST",
      path: `${joinPath(WRAPPER_ROUTES.USERS, ownerId)}/share`,
      body: { target_user_id: targetId },
      sendContext: "Failed to share wrapper",
      failure: "Failed to share wrapper",
      parseContext: "Failed to parse share response",
      schema: shareListSchema
    });
  }

  async unshareWith(ownerId: string, targetId: string): Promise<ShareList> {
    return this.requestJson({
      method: "DELETE",
      path: `${joinPath(WRAPPER_ROUTES.USERS, ownerId)}/share/${encodeURIComponent(targetId)}`,
      sendContext: "Failed to unshare wrapper",
      failure: "Failed to unshare wrapper",
      parseContext: "Failed to parse unshare response",
      schema: shareListSchema
    });
  }

  async listShared(ownerId: string): Promise<ShareList> {
    return this.requestJson({
      method: "GET",
      path: `${joinPath(WRAPPER_ROUTES.USERS, ownerId)}/share`,
      sendContext: "Failed to list shared users",
      failure: "Failed to list shared users",
      parseContext: "Failed to parse share list response",
      schema: shareListSchema
    });
  }

  async listAccessibleWrappers(discordId: string): Promise<AccessibleWrapper[]> {
    return this.requestJson({
      method: "GET",
      path: `${joinPath(WRAPPER_ROUTES.USERS, discordId)}/accessible-wrappers`,
      sendContext: "Failed to list accessible wrappers",
      failure: "Failed to list accessible wrappers",
      parseContext: "Failed to parse accessible wrappers response",
      schema: accessibleWrappersSchema
    });
  }

  private async requestJson<T>(request: JsonRequestOptions<T>): Promise<T> {
    const response = await this.send(request);

    let raw: unknown;
    try {
      raw = JSON.parse(await response.text());
    } catch (error) {
      throw new WrapperClientError(
        "decode",
        `${request.parseContext}: response body is not valid JSON`,
        { status: response.status, cause: error }
      );
    }

    const parsed = request.schema.safeParse(raw);
    if (!parsed.success) {
      throw new WrapperClientError(
        "decode",
        `${request.parseContext}: ${describeIssues(parsed.error)}`,
        { status: response.status, cause: parsed.error }
      );
    }
    return parsed.data;
  }

  private async requestVoid(request: RequestOptions): Promise<void> {
    await this.send(request);
  }

  private async send(request: RequestOptions): Promise<Response> {
    const url = this.buildUrl(request.path, request.query);
    const headers: Record<string, string> = { ...this.headers };
    if (request.body) {
      headers["content-type"] = "application/json";
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: request.method,
        headers,
        body: request.body ? JSON.stringify(request.body) : undefined
      });
    } catch (error) {
      throw new WrapperClientError(
        "transport",
        `${request.sendContext}: ${describeTransportError(error)}`,
        { cause: error }
      );
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new WrapperClientError(
        "rejected",
        `${request.failure} (${formatStatus(response)}): ${body}`,
        { status: response.status, body }
      );
    }
    return response;
  }

  private buildUrl(path: string, query?: Record<string, string>): string {
    const url = `${this.baseUrl}${path}`;
    if (!query) {
      return url;
    }
    const search = Object.entries(query)
      .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`)
      .join("&");
    return `${url}?${search}`;
  }
}

function arrayOf<T>(item: z.ZodType<T, z.ZodTypeDef, unknown>): z.ZodType<T[], z.ZodTypeDef, unknown> {
  return item.array();
}

function formatStatus(response: Response): string {
  const text = response.statusText.trim();
  return text ? `${response.status} ${text}` : String(response.status);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "body";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

function describeTransportError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : "";
    return `${error.message}${cause}`;
  }
  return String(error);
}
