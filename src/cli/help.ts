import type { Formatter } from "../ui/fmt.js";

export type HelpFlag = {
  name: string;
  description: string;
};

export type HelpCommand = {
  name: string;
  summary: string;
  usage: string;
  flags: HelpFlag[];
  examples: string[];
};

const COMMANDS: HelpCommand[] = [
  {
    name: "relay",
    summary: "start the negotiation relay",
    usage: "parley relay [--host <host>] [--port <port>] [--config <file>] [--log <file>]",
    flags: [
      { name: "--host <host>", description: "interface to bind (default: localhost)" },
      { name: "--port <port>", description: "port to listen on (default: 9000)" },
      { name: "--config <file>", description: "config file (default: parley.config.json if present)" },
      { name: "--log <file>", description: "append a timestamped session log" }
    ],
    examples: ["parley relay", "parley relay --port 9100 --log sessions.log"]
  },
  {
    name: "agent",
    summary: "connect an agent for one side of the deal",
    usage: "parley agent --company <name> | --investor <name> [--server <url>] [--config <file>]",
    flags: [
      { name: "--company <name>", description: "negotiate as the company raising capital" },
      { name: "--investor <name>", description: "negotiate as the investor" },
      { name: "--server <url>", description: "relay address (default: ws://localhost:9000)" },
      { name: "--config <file>", description: "config file (default: parley.config.json if present)" }
    ],
    examples: ["parley agent --company Acme", "parley --investor \"Northwind Capital\""]
  }
];

const ENVIRONMENT: HelpFlag[] = [
  { name: "OPENROUTER_API_KEY", description: "required; oracle credentials" },
  { name: "OPENROUTER_BASE_URL", description: "optional; alternate OpenRouter endpoint" },
  { name: "PARLEY_MODEL", description: "optional; model id (default: google/gemini-2.5-flash)" },
  { name: "OPENROUTER_RATE_LIMIT", description: "optional; requests per second, 0 disables" },
  { name: "BRAVE_API_KEY", description: "optional; enables background research for agents" }
];

const renderFlags = (fmt: Formatter, flags: HelpFlag[]): string[] =>
  flags.map((flag) => `  ${fmt.kv(flag.name, flag.description, 20)}`);

export const formatHelp = (fmt: Formatter): string => {
  const lines: string[] = [fmt.header("parley: two-agent investment negotiation"), "", "Usage:"];
  COMMANDS.forEach((command) => lines.push(`  ${command.usage}`));

  COMMANDS.forEach((command) => {
    lines.push("", `${fmt.bold(command.name)}: ${command.summary}`);
    lines.push(...renderFlags(fmt, command.flags));
    lines.push(fmt.muted("  Examples:"));
    command.examples.forEach((example) => lines.push(fmt.muted(`    ${example}`)));
  });

  lines.push("", "Environment:");
  lines.push(...renderFlags(fmt, ENVIRONMENT));
  return lines.join("\n");
};
