import type { FastifyServerOptions } from "fastify";
import Fastify from "fastify";
import { describeError } from "@taskrelay/shared";
import { WrapperClient } from "@taskrelay/wrapper-client";
import type { BotConfig } from "./config.js";
import { DiscordRestClient } from "./discord-api.js";
import { DiscordInteractionResponder } from "./discord-responder.js";
import { createDiscordPublicKey, verifyDiscordSignature } from "./discord-signature.js";
import { dispatchCommand } from "./dispatcher.js";
import { InteractionType, interactionSchema, toInvocation } from "./interaction.js";

export type BotServerDeps = {
  config: BotConfig;
  wrapperClient?: WrapperClient;
  discord?: DiscordRestClient;
};

export async function createBotServer(options: FastifyServerOptions = {}, deps: BotServerDeps) {
  const app = Fastify({ logger: true, ...options });
  const { config } = deps;
  const publicKey = createDiscordPublicKey(config.discordPublicKey);
  const wrapperClient = deps.wrapperClient ?? new WrapperClient(config.wrapperUrl);
  const discord =
    deps.discord ??
    new DiscordRestClient({
      applicationId: config.discordApplicationId,
      botToken: config.discordToken,
      baseUrl: config.discordApiBaseUrl
    });

  // Signatures cover the exact bytes, so the body stays a string until verified.
  app.removeContentTypeParser("application/json");
  app.addContentTypeParser("application/json", { parseAs: "string" }, (_req, body, done) => {
    done(null, body);
  });

  app.get("/healthz", async () => ({ status: "ok" }));

  app.post("/interactions", async (request, reply) => {
    const signature = headerValue(request.headers["x-signature-ed25519"]);
    const timestamp = headerValue(request.headers["x-signature-timestamp"]);
    const rawBody = typeof request.body === "string" ? request.body : "";
    if (
      !signature ||
      !timestamp ||
      !verifyDiscordSignature({ publicKey, timestamp, body: rawBody, signature })
    ) {
      request.log.warn("rejected interaction with invalid signature");
      return reply.status(401).send({ error: "invalid_signature" });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawBody);
    } catch (error) {
      request.log.warn({ error: describeError(error) }, "interaction body is not json");
      return reply.status(400).send({ error: "invalid_payload" });
    }
    const parsed = interactionSchema.safeParse(payload);
    if (!parsed.success) {
      request.log.warn({ issues: parsed.error.issues.length }, "malformed interaction");
      return reply.status(400).send({ error: "invalid_payload" });
    }

    const interaction = parsed.data;
    if (interaction.type === InteractionType.PING) {
      return reply.status(200).send({ type: InteractionType.PING });
    }
    if (interaction.type !== InteractionType.APPLICATION_COMMAND) {
      request.log.warn({ type: interaction.type }, "ignored interaction type");
      return reply.status(400).send({ error: "unsupported_interaction_type" });
    }

    const result = toInvocation(interaction);
    if (!result.ok) {
      request.log.warn({ reason: result.reason }, "malformed command interaction");
      return reply.status(400).send({ error: "invalid_payload" });
    }
    const { invocation } = result;
    request.log.info(
      {
        command: invocation.commandName,
        subcommand: invocation.subcommand,
        userId: invocation.actingUserId
      },
      "command received"
    );

    let markReplied = () => {};
    const replied = new Promise<void>((resolve) => {
      markReplied = () => resolve();
    });
    const responder = new DiscordInteractionResponder(
      discord,
      { id: interaction.id, token: interaction.token },
      markReplied
    );
    const dispatched = dispatchCommand(
      { client: wrapperClient, log: app.log },
      invocation,
      responder
    ).catch((error: unknown) => {
      app.log.error(
        { error: describeError(error), interactionId: invocation.interactionId },
        "command dispatch failed"
      );
    });

    await Promise.race([replied, dispatched]);
    return reply.status(202).send();
  });

  return app;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}
