export { WrapperClient, type WrapperClientOptions } from "./client.js";
export { isWrapperClientError, WrapperClientError, type WrapperClientErrorKind } from "./errors.js";
export {
  executionModeSchema,
  taskStatusSchema,
  type AccessibleWrapper,
  type ApprovalOption,
  type ApprovalRequest,
  type ExecutionMode,
  type HealthStatus,
  type Project,
  type SessionInfo,
  type ShareList,
  type TaskRecord,
  type TaskStatus,
  type WrapperUser
} from "./schemas.js";
export type {
  ApprovalSubmission,
  ClusterEnrollment,
  LocalRegistration,
  NewProject,
  TaskSubmission
} from "./types.js";
