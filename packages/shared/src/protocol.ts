export type CommandName = "task" | "status" | "approve" | "project" | "register" | "share";

export type OptionValue = string | number | boolean;

/**
 * One slash-command invocation as delivered by the chat platform.
 *
 * `actingUserId` comes from the authenticated interaction payload and is the
 * only identity handlers trust. User-supplied identities (a `target` or `user`
 * option) stay in `options` and are passed on as requests.
 */
export type Invocation = {
  interactionId: string;
  commandName: string;
  subcommand?: string;
  options: Record<string, OptionValue>;
  actingUserId: string;
  actingUserName: string;
  channelId?: string;
  /** Display names of users referenced by user-typed options, keyed by id. */
  resolvedUserNames: Record<string, string>;
};

export type ChatMessage = {
  content: string;
  ephemeral?: boolean;
};

/**
 * Reply capability of the chat platform for one invocation.
 * `reply` must be called once before `edit` or `followUp`.
 */
export interface ChatResponder {
  reply(message: ChatMessage): Promise<void>;
  edit(content: string): Promise<void>;
  followUp(message: ChatMessage): Promise<void>;
}

export type RenderedReply = {
  content: string;
  followUps: string[];
};
