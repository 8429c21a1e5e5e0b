import chalk from "chalk";
import boxen from "boxen";
import Table from "cli-table3";
import ora, { type Ora } from "ora";
import { VERSION } from "./constants";
import { RoachyardError, errorMessage } from "./errors";

// Brand colors
const brand = {
  primary: chalk.hex("#6933FF"), // Roach purple
  secondary: chalk.hex("#8B5CF6"), // Violet
  success: chalk.hex("#10B981"), // Emerald
  warning: chalk.hex("#F59E0B"), // Amber
  error: chalk.hex("#EF4444"), // Red
  info: chalk.hex("#3B82F6"), // Blue
  muted: chalk.hex("#6B7280"), // Gray
  highlight: chalk.hex("#F472B6"), // Pink
};

/**
 * Print the Roachyard banner
 */
export function printBanner(): void {
  const versionStr = `v${VERSION}`;
  const padding = " ".repeat(Math.max(0, 12 - versionStr.length));
  const banner = `
${brand.primary("┌─────────────────────────────────────┐")}
${brand.primary("│")}  ${brand.secondary("▓▓▓")} ${chalk.bold.white("Roachyard")} ${brand.muted(versionStr)}${padding}${brand.primary("│")}
${brand.primary("│")}  ${brand.muted("Single-host cluster bootstrap")}      ${brand.primary("│")}
${brand.primary("└─────────────────────────────────────┘")}
`;
  console.log(banner);
}

export function success(message: string): void {
  console.log(`${brand.success("✓")} ${message}`);
}

export function error(message: string): void {
  console.log(`${brand.error("✗")} ${message}`);
}

export function warning(message: string): void {
  console.log(`${brand.warning("⚠")} ${message}`);
}

export function info(message: string): void {
  console.log(`${brand.info("ℹ")} ${message}`);
}

export function muted(message: string): void {
  console.log(brand.muted(message));
}

export function spinner(text: string): Ora {
  return ora({
    text,
    color: "magenta",
    spinner: "dots",
  });
}

/**
 * Print a highlighted value (URL, path) in a rounded box
 */
export function printPanel(value: string, label: string): void {
  console.log(
    boxen(
      `${brand.muted(label)}\n\n${brand.highlight(value)}`,
      {
        padding: 1,
        margin: { top: 1, bottom: 1, left: 0, right: 0 },
        borderStyle: "round",
        borderColor: "magenta",
      }
    )
  );
}

/**
 * Print web UI credentials
 */
export function printCredentials(credentials: { url: string; username: string; password: string }): void {
  const { url, username, password } = credentials;

  console.log(
    boxen(
      `${brand.muted("URL:")}      ${brand.highlight(url)}\n` +
      `${brand.muted("User:")}     ${chalk.white(username)}\n` +
      `${brand.muted("Password:")} ${chalk.white(password)}`,
      {
        padding: 1,
        margin: { top: 1, bottom: 1, left: 0, right: 0 },
        borderStyle: "round",
        borderColor: "magenta",
        title: "Admin UI",
        titleAlignment: "center",
      }
    )
  );
}

/**
 * Create a styled two-or-more column table
 */
export function createTable(head: string[]): Table.Table {
  return new Table({
    head: head.map((h) => brand.primary(h)),
    style: {
      head: [],
      border: ["gray"],
    },
    chars: {
      top: "─",
      "top-mid": "┬",
      "top-left": "┌",
      "top-right": "┐",
      bottom: "─",
      "bottom-mid": "┴",
      "bottom-left": "└",
      "bottom-right": "┘",
      left: "│",
      "left-mid": "├",
      mid: "─",
      "mid-mid": "┼",
      right: "│",
      "right-mid": "┤",
      middle: "│",
    },
  });
}

/**
 * Format a process or certificate status with color
 */
export function formatStatus(status: string): string {
  switch (status) {
    case "running":
      return brand.success("● running");
    case "stopped":
      return brand.warning("○ stopped");
    case "present":
      return brand.success("● present");
    case "missing":
      return brand.muted("○ missing");
    case "stale":
      return brand.error("✗ stale");
    default:
      return brand.muted("? unknown");
  }
}

/**
 * Format bytes to human readable
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";
  const k = 1024;
  const sizes = ["B", "KB", "MB", "GB", "TB"];
  const i = Math.floor(Math.log(bytes) / Math.log(k));
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`;
}

export function printSection(title: string): void {
  console.log(`\n${brand.primary("▸")} ${chalk.bold(title)}`);
}

export function printKeyValue(key: string, value: string, indent: number = 2): void {
  const padding = " ".repeat(indent);
  console.log(`${padding}${brand.muted(key + ":")} ${chalk.white(value)}`);
}

/**
 * Print an error, and for tool failures the captured context
 */
export function printError(err: unknown): void {
  error(errorMessage(err));
  if (!(err instanceof RoachyardError) || !err.context) return;

  for (const [key, value] of Object.entries(err.context)) {
    if (value === undefined || value === "") continue;
    const text = typeof value === "string" ? value : JSON.stringify(value);
    console.log(`  ${brand.muted(key + ":")} ${text}`);
  }
}

/**
 * Confirm action with user
 */
export async function confirm(message: string, defaultValue: boolean = false): Promise<boolean> {
  const { default: inquirer } = await import("inquirer");
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: "confirm",
      name: "confirmed",
      message,
      default: defaultValue,
    },
  ]);
  return confirmed;
}

/**
 * Select from a list
 */
export async function select<T extends string>(
  message: string,
  choices: Array<{ name: string; value: T }>
): Promise<T> {
  const { default: inquirer } = await import("inquirer");
  const { selected } = await inquirer.prompt<{ selected: T }>([
    {
      type: "list",
      name: "selected",
      message,
      choices,
    },
  ]);
  return selected;
}

/**
 * Ask for free text, with an optional default and validator
 */
export async function input(
  message: string,
  defaultValue?: string,
  validate?: (value: string) => true | string
): Promise<string> {
  const { default: inquirer } = await import("inquirer");
  const { answer } = await inquirer.prompt<{ answer: string }>([
    {
      type: "input",
      name: "answer",
      message,
      default: defaultValue,
      validate,
    },
  ]);
  return answer.trim();
}

export { brand, chalk };
