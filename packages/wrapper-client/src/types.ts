import type { ExecutionMode } from "./schemas.js";

export type TaskSubmission = {
  prompt: string;
  sessionId?: string;
  project?: string;
  workingDir?: string;
  /** Authenticated chat identity issuing the task. */
  actingUserId?: string;
  /** Owner of the execution endpoint to run on; authorised by the backend. */
  targetUserId?: string;
  mode?: ExecutionMode;
};

export type ApprovalSubmission = {
  optionId: string;
  customResponse?: string;
};

export type NewProject = {
  name: string;
  path: string;
  description?: string;
  ownerId: string;
};

export type LocalRegistration = {
  discordId: string;
  discordName: string;
  wrapperUrl: string;
  authToken?: string;
};

export type ClusterEnrollment = {
  discordId: string;
  discordName: string;
  storagePath?: string;
};
