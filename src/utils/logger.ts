import ansis from "ansis";
import type { LoggerOptions, ProgressEvent } from "../types";

const colors = [
  ansis.cyan,
  ansis.green,
  ansis.yellow,
  ansis.blue,
  ansis.magenta,
  ansis.gray,
  ansis.white,
] as const;

type Color = (typeof colors)[number];

/**
 * Console output for provisioning runs. Lines written on behalf of a command
 * group carry a coloured `[group] |` prefix, padded so that concurrent groups
 * stay aligned.
 */
export class Logger {
  private readonly colorMap = new Map<string, Color>();
  private colorIndex = 0;
  private maxPrefixLength = 0;
  private readonly options: LoggerOptions;

  constructor(options: LoggerOptions = {}) {
    this.options = {
      prefix: true,
      quiet: false,
      ...options,
    };
  }

  get quiet(): boolean {
    return this.options.quiet === true;
  }

  register(group: string): void {
    if (this.colorMap.has(group)) {
      return;
    }
    const color = colors[this.colorIndex % colors.length];
    if (color) {
      this.colorMap.set(group, color);
    }
    this.colorIndex++;
    this.maxPrefixLength = Math.max(this.maxPrefixLength, group.length);
  }

  log(group: string, message: string): void {
    if (this.quiet) {
      return;
    }
    for (const line of splitLines(message)) {
      console.log(this.formatLine(group, line));
    }
  }

  error(group: string, message: string): void {
    for (const line of splitLines(message)) {
      console.error(this.formatLine(group, ansis.red(line)));
    }
  }

  progress(event: ProgressEvent): void {
    this.log(
      event.group,
      `Step ${event.step}/${event.total}: ${event.command}`
    );
  }

  info(message: string): void {
    if (this.quiet) {
      return;
    }
    console.log(`${ansis.blue("ℹ")} ${message}`);
  }

  success(message: string): void {
    if (this.quiet) {
      return;
    }
    console.log(`${ansis.green("✓")} ${message}`);
  }

  warn(message: string): void {
    console.warn(`${ansis.yellow("⚠")} ${message}`);
  }

  forGroup(group: string): GroupLogger {
    this.register(group);
    return new GroupLogger(this, group);
  }

  private formatLine(group: string, line: string): string {
    if (this.options.prefix === false) {
      return line;
    }

    const color = this.colorMap.get(group) ?? ansis.white;
    if (typeof this.options.prefix === "string") {
      return `${color(this.options.prefix)} ${line}`;
    }

    const prefix = `[${group}]`.padEnd(this.maxPrefixLength + 2);
    return `${color(prefix)} ${ansis.gray("|")} ${line}`;
  }
}

export class GroupLogger {
  private readonly parent: Logger;
  readonly group: string;

  constructor(parent: Logger, group: string) {
    this.parent = parent;
    this.group = group;
  }

  log(message: string): void {
    this.parent.log(this.group, message);
  }

  error(message: string): void {
    this.parent.error(this.group, message);
  }
}

function splitLines(message: string): string[] {
  return message.split("\n").filter((line) => line.trim().length > 0);
}
