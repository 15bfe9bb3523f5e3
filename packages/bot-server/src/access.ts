import { describeError } from "@taskrelay/shared";
import { isWrapperClientError } from "@taskrelay/wrapper-client";

export const SELF_SHARE_DENIAL = "You already have access to your own wrapper!";

export const REGISTER_HINT =
  "**Hint:** You may need to register first with `/register local url:<your-wrapper-url>`";

/**
 * Identities attached to a task request. `actingUserId` is always the
 * authenticated caller; `targetUserId` is only a request that the backend
 * authorises against its sharing registry.
 */
export type ExecutionTarget = {
  actingUserId: string;
  targetUserId?: string;
};

export type ShareCheck =
  | { ok: true; ownerId: string; targetUserId: string }
  | { ok: false; message: string };

export function resolveExecutionTarget(
  actingUserId: string,
  requestedTargetId?: string
): ExecutionTarget {
  const targetUserId = requestedTargetId?.trim();
  if (!targetUserId) {
    return { actingUserId };
  }
  return { actingUserId, targetUserId };
}

/** Share management always runs with the caller as owner. */
export function checkShareTarget(actingUserId: string, targetUserId: string): ShareCheck {
  if (targetUserId === actingUserId) {
    return { ok: false, message: SELF_SHARE_DENIAL };
  }
  return { ok: true, ownerId: actingUserId, targetUserId };
}

export function describeAccessFailure(error: unknown, target: ExecutionTarget): string | undefined {
  const message = describeError(error).toLowerCase();
  const status = isWrapperClientError(error) ? error.status : undefined;

  if (target.targetUserId) {
    if (status === 403 || message.includes("access")) {
      return `**Hint:** <@${target.targetUserId}> has to run \`/share add\` for you before you can use their wrapper.`;
    }
    if (message.includes("target user")) {
      return `**Hint:** <@${target.targetUserId}> has not registered a wrapper yet.`;
    }
  }
  if (message.includes("not found") || message.includes("not registered")) {
    return REGISTER_HINT;
  }
  return undefined;
}
