import type { CommandGroup } from "../types";

type CategoryRule = {
  name: string;
  tools: readonly string[];
  parallel: boolean;
};

/**
 * Categories in the order their groups are emitted. System and OS package
 * manager commands share one lock and run sequentially; language package
 * managers have their own namespaces and run in parallel batches.
 */
export const COMMAND_CATEGORIES: readonly CategoryRule[] = [
  {
    name: "System Commands",
    parallel: false,
    tools: ["systemctl", "service", "update-alternatives", "adduser", "usermod"],
  },
  { name: "APT Packages", parallel: false, tools: ["apt", "apt-get"] },
  { name: "Python Packages", parallel: true, tools: ["pip", "pip3"] },
  { name: "NPM Packages", parallel: true, tools: ["npm"] },
  { name: "Yarn Packages", parallel: true, tools: ["yarn"] },
  { name: "PNPM Packages", parallel: true, tools: ["pnpm"] },
];

export const OTHER_COMMANDS = "Other Commands";

export function classifyCommand(command: string): string {
  const normalized = command.trim().toLowerCase();
  const match = COMMAND_CATEGORIES.find((category) =>
    category.tools.some((tool) => normalized.startsWith(`${tool} `))
  );
  return match?.name ?? OTHER_COMMANDS;
}

/**
 * Splits setup commands into ordered groups. Commands keep their original
 * text and relative order; empty groups are left out.
 */
export function categorizeCommands(commands: readonly string[]): CommandGroup[] {
  const buckets = new Map<string, string[]>();
  for (const command of commands) {
    const category = classifyCommand(command);
    const bucket = buckets.get(category) ?? [];
    bucket.push(command);
    buckets.set(category, bucket);
  }

  const groups: CommandGroup[] = [];
  for (const category of COMMAND_CATEGORIES) {
    const bucket = buckets.get(category.name);
    if (bucket) {
      groups.push({
        commands: bucket,
        name: category.name,
        parallel: category.parallel,
      });
    }
  }

  const other = buckets.get(OTHER_COMMANDS);
  if (other) {
    groups.push({ commands: other, name: OTHER_COMMANDS, parallel: false });
  }

  return groups;
}
