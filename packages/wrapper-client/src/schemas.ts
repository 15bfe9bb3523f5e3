import { z } from "zod";

// Wire format of the wrapper service. Each schema maps the snake_case body to
// the camelCase value the rest of the code works with.

export const taskStatusSchema = z.enum([
  "pending",
  "running",
  "completed",
  "failed",
  "needs_approval"
]);

export type TaskStatus = z.infer<typeof taskStatusSchema>;

export const executionModeSchema = z.enum(["local", "cluster"]);

export type ExecutionMode = z.infer<typeof executionModeSchema>;

const approvalOptionSchema = z
  .object({
    id: z.string(),
    label: z.string(),
    description: z.string().nullish()
  })
  .transform((raw) => ({
    id: raw.id,
    label: raw.label,
    description: raw.description ?? undefined
  }));

export type ApprovalOption = z.infer<typeof approvalOptionSchema>;

const approvalRequestSchema = z.object({
  action: z.string(),
  description: z.string(),
  options: z.array(approvalOptionSchema).default([])
});

export type ApprovalRequest = z.infer<typeof approvalRequestSchema>;

export const taskRecordSchema = z
  .object({
    task_id: z.string(),
    session_id: z.string(),
    status: taskStatusSchema,
    output: z.string().nullish(),
    error: z.string().nullish(),
    approval_request: approvalRequestSchema.nullish(),
    created_at: z.string().default(""),
    updated_at: z.string().default("")
  })
  .transform((raw) => ({
    taskId: raw.task_id,
    sessionId: raw.session_id,
    status: raw.status,
    output: raw.output ?? "",
    error: raw.error ?? undefined,
    approvalRequest: raw.approval_request ?? undefined,
    createdAt: raw.created_at,
    updatedAt: raw.updated_at
  }));

export type TaskRecord = z.infer<typeof taskRecordSchema>;

export const healthStatusSchema = z
  .object({
    status: z.string(),
    version: z.string(),
    uptime_seconds: z.number()
  })
  .transform((raw) => ({
    status: raw.status,
    version: raw.version,
    uptimeSeconds: raw.uptime_seconds
  }));

export type HealthStatus = z.infer<typeof healthStatusSchema>;

export const sessionInfoSchema = z
  .object({
    session_id: z.string(),
    task_count: z.number().int(),
    created_at: z.string(),
    last_activity: z.string(),
    status: z.string()
  })
  .transform((raw) => ({
    sessionId: raw.session_id,
    taskCount: raw.task_count,
    createdAt: raw.created_at,
    lastActivity: raw.last_activity,
    status: raw.status
  }));

export type SessionInfo = z.infer<typeof sessionInfoSchema>;

export const projectSchema = z
  .object({
    name: z.string(),
    path: z.string(),
    description: z.string().nullish(),
    owner_id: z.string(),
    created_at: z.string()
  })
  .transform((raw) => ({
    name: raw.name,
    path: raw.path,
    description: raw.description ?? "",
    ownerId: raw.owner_id,
    createdAt: raw.created_at
  }));

export type Project = z.infer<typeof projectSchema>;

export const wrapperUserSchema = z
  .object({
    discord_id: z.string(),
    discord_name: z.string(),
    local_wrapper_url: z.string().nullish(),
    cluster_enabled: z.boolean(),
    cluster_storage_path: z.string().nullish(),
    default_mode: z.string(),
    created_at: z.string(),
    last_seen: z.string()
  })
  .transform((raw) => ({
    discordId: raw.discord_id,
    discordName: raw.discord_name,
    localWrapperUrl: raw.local_wrapper_url ?? undefined,
    clusterEnabled: raw.cluster_enabled,
    clusterStoragePath: raw.cluster_storage_path ?? undefined,
    defaultMode: raw.default_mode,
    createdAt: raw.created_at,
    lastSeen: raw.last_seen
  }));

export type WrapperUser = z.infer<typeof wrapperUserSchema>;

export const shareListSchema = z
  .object({
    shared_with: z.array(z.string()).default([])
  })
  .transform((raw) => ({ sharedWith: raw.shared_with }));

export type ShareList = z.infer<typeof shareListSchema>;

const accessibleWrapperSchema = z
  .object({
    owner_id: z.string(),
    owner_name: z.string().default(""),
    is_own: z.boolean()
  })
  .transform((raw) => ({
    ownerId: raw.owner_id,
    ownerName: raw.owner_name,
    isOwn: raw.is_own
  }));

export type AccessibleWrapper = z.infer<typeof accessibleWrapperSchema>;

export const accessibleWrappersSchema = z
  .object({
    wrappers: z.array(accessibleWrapperSchema).default([])
  })
  .transform((raw) => raw.wrappers);
