import type { ChatMessage } from "@taskrelay/shared";
import type { CommandDefinition } from "./command-definitions.js";

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export const DISCORD_MESSAGE_LIMIT = 2000;

const CHANNEL_MESSAGE_WITH_SOURCE = 4;
const EPHEMERAL_FLAG = 1 << 6;

export type DiscordApiConfig = {
  applicationId: string;
  botToken: string;
  baseUrl?: string;
  fetch?: FetchLike;
};

export class DiscordApiError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(operation: string, status: number, body: string) {
    super(`discord ${operation} failed: http=${status} body=${body}`);
    this.name = "DiscordApiError";
    this.status = status;
    this.body = body;
  }
}

export class DiscordRestClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly config: DiscordApiConfig) {
    this.baseUrl = (config.baseUrl ?? "https://discord.com/api/v10").replace(/\/+$/, "");
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  async createInteractionResponse(
    interactionId: string,
    token: string,
    message: ChatMessage
  ): Promise<void> {
    await this.send(
      "interaction callback",
      "POST",
      `/interactions/${encodeURIComponent(interactionId)}/${encodeURIComponent(token)}/callback`,
      { type: CHANNEL_MESSAGE_WITH_SOURCE, data: toMessageData(message) }
    );
  }

  async editOriginalResponse(token: string, content: string): Promise<void> {
    await this.send(
      "edit original response",
      "PATCH",
      `${this.webhookPath(token)}/messages/@original`,
      { content: clipContent(content) }
    );
  }

  async createFollowupMessage(token: string, message: ChatMessage): Promise<void> {
    await this.send("follow-up message", "POST", this.webhookPath(token), toMessageData(message));
  }

  /** Replaces the command set, scoped to one guild when `guildId` is given. */
  async overwriteCommands(commands: CommandDefinition[], guildId?: string): Promise<void> {
    const appPath = `/applications/${encodeURIComponent(this.config.applicationId)}`;
    const path = guildId
      ? `${appPath}/guilds/${encodeURIComponent(guildId)}/commands`
      : `${appPath}/commands`;
    await this.send("command registration", "PUT", path, commands, {
      authorization: `Bot ${this.config.botToken}`
    });
  }

  private webhookPath(token: string): string {
    return `/webhooks/${encodeURIComponent(this.config.applicationId)}/${encodeURIComponent(token)}`;
  }

  private async send(
    operation: string,
    method: "POST" | "PATCH" | "PUT",
    path: string,
    payload: unknown,
    headers: Record<string, string> = {}
  ): Promise<void> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers: { "content-type": "application/json", ...headers },
      body: JSON.stringify(payload)
    });
    if (!response.ok) {
      throw new DiscordApiError(operation, response.status, await response.text());
    }
  }
}

function toMessageData(message: ChatMessage): { content: string; flags?: number } {
  const data: { content: string; flags?: number } = { content: clipContent(message.content) };
  if (message.ephemeral) {
    data.flags = EPHEMERAL_FLAG;
  }
  return data;
}

export function clipContent(content: string): string {
  if (content.length <= DISCORD_MESSAGE_LIMIT) {
    return content;
  }
  return `${content.slice(0, DISCORD_MESSAGE_LIMIT - 3)}...`;
}
