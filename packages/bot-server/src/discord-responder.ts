import type { ChatMessage, ChatResponder } from "@taskrelay/shared";
import type { DiscordRestClient } from "./discord-api.js";

export type InteractionHandle = {
  id: string;
  token: string;
};

/** Replies to one interaction through its token. */
export class DiscordInteractionResponder implements ChatResponder {
  private replied = false;

  constructor(
    private readonly api: DiscordRestClient,
    private readonly interaction: InteractionHandle,
    private readonly onReplied: () => void = () => {}
  ) {}

  async reply(message: ChatMessage): Promise<void> {
    if (this.replied) {
      throw new Error("interaction already acknowledged");
    }
    await this.api.createInteractionResponse(this.interaction.id, this.interaction.token, message);
    this.replied = true;
    this.onReplied();
  }

  async edit(content: string): Promise<void> {
    await this.api.editOriginalResponse(this.interaction.token, content);
  }

  async followUp(message: ChatMessage): Promise<void> {
    await this.api.createFollowupMessage(this.interaction.token, message);
  }
}
