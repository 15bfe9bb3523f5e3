export const WRAPPER_ROUTES = {
  HEALTH: "/api/v1/health",
  TASKS: "/api/v1/tasks",
  SESSIONS: "/api/v1/sessions",
  PROJECTS: "/api/v1/projects",
  USERS: "/api/v1/users"
} as const;

export function joinPath(base: string, ...segments: string[]): string {
  return [base, ...segments.map((segment) => encodeURIComponent(segment))].join("/");
}
