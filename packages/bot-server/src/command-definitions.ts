export const OptionType = {
  SUB_COMMAND: 1,
  STRING: 3,
  USER: 6
} as const;

type OptionTypeValue = (typeof OptionType)[keyof typeof OptionType];

export type CommandOptionDefinition = {
  type: OptionTypeValue;
  name: string;
  description: string;
  required?: boolean;
  choices?: Array<{ name: string; value: string }>;
  options?: CommandOptionDefinition[];
};

export type CommandDefinition = {
  name: string;
  description: string;
  options?: CommandOptionDefinition[];
};

const modeChoices = [
  { name: "local", value: "local" },
  { name: "cluster", value: "cluster" }
];

function text(name: string, description: string, required = false): CommandOptionDefinition {
  return { type: OptionType.STRING, name, description, required };
}

function user(name: string, description: string): CommandOptionDefinition {
  return { type: OptionType.USER, name, description, required: true };
}

function sub(
  name: string,
  description: string,
  options: CommandOptionDefinition[] = []
): CommandOptionDefinition {
  return { type: OptionType.SUB_COMMAND, name, description, options };
}

export const COMMAND_DEFINITIONS: CommandDefinition[] = [
  {
    name: "task",
    description: "Send a task to a wrapper",
    options: [
      text("prompt", "What should be done", true),
      text("project", "Registered project to work in"),
      { type: OptionType.USER, name: "target", description: "Run on this user's shared wrapper" },
      { ...text("mode", "Where to run the task"), choices: modeChoices },
      text("session", "Continue an existing session")
    ]
  },
  {
    name: "status",
    description: "Check the status of a task",
    options: [text("task_id", "Task id", true)]
  },
  {
    name: "approve",
    description: "Answer a pending approval",
    options: [
      text("task_id", "Task id", true),
      text("option", "Option id to choose", true),
      text("response", "Free-form response")
    ]
  },
  {
    name: "project",
    description: "Manage your projects",
    options: [
      sub("list", "List your projects"),
      sub("add", "Register a project", [
        text("name", "Project name", true),
        text("path", "Path on the wrapper machine", true),
        text("description", "Short description")
      ]),
      sub("remove", "Remove a project", [text("name", "Project name", true)]),
      sub("info", "Show a project", [text("name", "Project name", true)])
    ]
  },
  {
    name: "register",
    description: "Manage your wrapper registration",
    options: [
      sub("local", "Register your local wrapper", [text("url", "Wrapper URL", true)]),
      sub("unregister", "Remove your local wrapper"),
      sub("mode", "Set your default execution mode", [
        { ...text("default", "Default mode", true), choices: modeChoices }
      ]),
      sub("status", "Show your registration")
    ]
  },
  {
    name: "share",
    description: "Share your wrapper with other users",
    options: [
      sub("add", "Grant a user access", [user("user", "User to share with")]),
      sub("remove", "Revoke a user's access", [user("user", "User to remove")]),
      sub("list", "List users you share with"),
      sub("available", "List wrappers you can use")
    ]
  }
];
