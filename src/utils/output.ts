import { colorize, type TerminalColor } from "./colors.js";

/** Command bodies are framed by a blank line above and below. */
export function formatCliOutput(value: string): string {
  return `\n${value.trimEnd()}\n\n`;
}

function formatLabeled(label: string, color: TerminalColor, message: string): string {
  return `${colorize(`${label}:`, color)} ${message}`;
}

export function formatWarningMessage(message: string): string {
  return formatLabeled("Warning", "yellow", message);
}

export function formatErrorMessage(message: string): string {
  return formatLabeled("Error", "red", message);
}
