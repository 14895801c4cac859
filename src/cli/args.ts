import type { PartyRole } from "../protocol/messages.js";

export type ParsedArgs = {
  positional: string[];
  flags: Record<string, string | boolean>;
};

export const parseArgs = (args: string[]): ParsedArgs => {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        flags[arg] = next;
        i += 1;
      } else {
        flags[arg] = true;
      }
    } else {
      positional.push(arg);
    }
  }
  return { positional, flags };
};

export const getFlag = (flags: ParsedArgs["flags"], name: string): string | undefined => {
  const value = flags[name];
  return typeof value === "string" ? value : undefined;
};

export const hasFlag = (flags: ParsedArgs["flags"], name: string): boolean => Boolean(flags[name]);

/** Integer flag value; a present but malformed value is an error rather than silently ignored. */
export const getFlagInteger = (flags: ParsedArgs["flags"], name: string): number | undefined => {
  const value = flags[name];
  if (value === undefined) {
    return undefined;
  }
  const parsed = typeof value === "string" ? Number(value) : Number.NaN;
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid ${name} value (expected an integer).`);
  }
  return parsed;
};

export type AgentIdentity = {
  role: PartyRole;
  name: string;
};

/** Exactly one of --company NAME / --investor NAME selects the agent's side. */
export const resolveAgentIdentity = (flags: ParsedArgs["flags"]): AgentIdentity => {
  const companyGiven = flags["--company"] !== undefined;
  const investorGiven = flags["--investor"] !== undefined;
  if (companyGiven && investorGiven) {
    throw new Error("Use either --company or --investor (not both).");
  }
  if (!companyGiven && !investorGiven) {
    throw new Error("Specify --company NAME or --investor NAME.");
  }

  const flag = companyGiven ? "--company" : "--investor";
  const name = getFlag(flags, flag)?.trim();
  if (!name) {
    throw new Error(`${flag} requires a name.`);
  }
  return { role: companyGiven ? "proposer" : "evaluator", name };
};

export type CliCommand = "relay" | "agent" | "help";

/** The bare `parley --company NAME` form is shorthand for `parley agent --company NAME`. */
export const resolveCommand = (args: string[]): { command: CliCommand | null; rest: string[] } => {
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    return { command: "help", rest: [] };
  }
  const [first, ...rest] = args;
  if (first === "relay" || first === "agent") {
    return { command: first, rest };
  }
  if (first === "--company" || first === "--investor") {
    return { command: "agent", rest: args };
  }
  return { command: null, rest };
};
