import pino from "pino";
import { describeError } from "@taskrelay/shared";
import { WrapperClient } from "@taskrelay/wrapper-client";
import { COMMAND_DEFINITIONS } from "./command-definitions.js";
import { loadConfig } from "./config.js";
import { DiscordRestClient } from "./discord-api.js";
import { createBotServer } from "./server.js";

void (async () => {
  const config = loadConfig();
  const logger = pino({ level: config.logLevel });
  const wrapperClient = new WrapperClient(config.wrapperUrl);
  const discord = new DiscordRestClient({
    applicationId: config.discordApplicationId,
    botToken: config.discordToken,
    baseUrl: config.discordApiBaseUrl
  });

  try {
    const health = await wrapperClient.healthCheck();
    logger.info({ wrapperUrl: config.wrapperUrl, ...health }, "wrapper service reachable");
  } catch (error) {
    logger.warn(
      { wrapperUrl: config.wrapperUrl, error: describeError(error) },
      "wrapper service health check failed"
    );
  }

  try {
    await discord.overwriteCommands(COMMAND_DEFINITIONS, config.discordGuildId);
    logger.info(
      { count: COMMAND_DEFINITIONS.length, guildId: config.discordGuildId },
      "slash commands registered"
    );
  } catch (error) {
    logger.error({ error: describeError(error) }, "slash command registration failed");
  }

  const app = await createBotServer({ logger }, { config, wrapperClient, discord });
  await app.listen({ host: config.host, port: config.port });
  app.log.info({ host: config.host, port: config.port }, "bot server started");
})().catch((error) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error("[bot-server] startup failed", message);
  process.exitCode = 1;
});
