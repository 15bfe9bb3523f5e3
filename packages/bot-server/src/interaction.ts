import { z } from "zod";
import type { Invocation, OptionValue } from "@taskrelay/shared";
import { OptionType } from "./command-definitions.js";

export const InteractionType = {
  PING: 1,
  APPLICATION_COMMAND: 2
} as const;

type RawOption = {
  name: string;
  type: number;
  value?: OptionValue;
  options?: RawOption[];
};

const optionSchema: z.ZodType<RawOption> = z.lazy(() =>
  z.object({
    name: z.string(),
    type: z.number().int(),
    value: z.union([z.string(), z.number(), z.boolean()]).optional(),
    options: z.array(optionSchema).optional()
  })
);

const userSchema = z.object({
  id: z.string(),
  username: z.string(),
  global_name: z.string().nullish()
});

type DiscordUser = z.infer<typeof userSchema>;

export const interactionSchema = z.object({
  id: z.string(),
  application_id: z.string(),
  type: z.number().int(),
  token: z.string(),
  channel_id: z.string().optional(),
  member: z.object({ user: userSchema }).optional(),
  user: userSchema.optional(),
  data: z
    .object({
      name: z.string(),
      options: z.array(optionSchema).optional(),
      resolved: z
        .object({
          users: z.record(userSchema).optional()
        })
        .optional()
    })
    .optional()
});

export type Interaction = z.infer<typeof interactionSchema>;

export type InvocationParseResult =
  | { ok: true; invocation: Invocation }
  | { ok: false; reason: string };

/**
 * Builds an invocation from an application-command interaction. The acting
 * user comes from `member.user` in guilds and from `user` in direct messages.
 */
export function toInvocation(interaction: Interaction): InvocationParseResult {
  const actor = interaction.member?.user ?? interaction.user;
  if (!actor) {
    return { ok: false, reason: "interaction has no user" };
  }
  if (!interaction.data) {
    return { ok: false, reason: "interaction has no command data" };
  }

  let subcommand: string | undefined;
  let options = interaction.data.options ?? [];
  const nested = options.find((option) => option.type === OptionType.SUB_COMMAND);
  if (nested) {
    subcommand = nested.name;
    options = nested.options ?? [];
  }

  const values: Record<string, OptionValue> = {};
  for (const option of options) {
    if (option.value !== undefined) {
      values[option.name] = option.value;
    }
  }

  const resolvedUserNames: Record<string, string> = {};
  for (const [id, user] of Object.entries(interaction.data.resolved?.users ?? {})) {
    resolvedUserNames[id] = displayName(user);
  }

  return {
    ok: true,
    invocation: {
      interactionId: interaction.id,
      commandName: interaction.data.name,
      subcommand,
      options: values,
      actingUserId: actor.id,
      actingUserName: displayName(actor),
      channelId: interaction.channel_id,
      resolvedUserNames
    }
  };
}

function displayName(user: DiscordUser): string {
  return user.global_name ?? user.username;
}
