import {
  formatCliOutput,
  formatErrorMessage,
  formatWarningMessage,
} from "../utils/output.js";

export type AlertSeverity = "info" | "warn" | "error";

export interface Alert {
  readonly severity: AlertSeverity;
  readonly message: string;
}

export interface CommandOutputPayload {
  readonly body?: string | readonly string[];
  readonly alerts?: readonly Alert[];
  readonly exitCode?: number;
}

export function toWarningAlerts(messages: readonly string[]): Alert[] {
  return messages.map((message) => ({ severity: "warn", message }));
}

/**
 * Alerts first (info to stdout, the rest to stderr), then the body framed
 * by blank lines. Sets the process exit code when one is given.
 */
export function writeCommandOutput(payload: CommandOutputPayload): void {
  const alerts = payload.alerts ?? [];
  if (alerts.length > 0) {
    process.stdout.write("\n");
  }

  for (const alert of alerts) {
    const formattedAlert = formatAlert(alert);
    if (alert.severity === "info") {
      process.stdout.write(formattedAlert);
    } else {
      process.stderr.write(formattedAlert);
    }
  }

  const body = payload.body;
  if (body !== undefined) {
    const normalizedBody = typeof body === "string" ? body : body.join("\n");
    if (normalizedBody.trim().length > 0) {
      process.stdout.write(formatCliOutput(normalizedBody));
    }
  }

  if (typeof payload.exitCode === "number") {
    process.exitCode = payload.exitCode;
  }
}

function formatAlert(alert: Alert): string {
  switch (alert.severity) {
    case "error":
      return `${formatErrorMessage(alert.message)}\n`;
    case "warn":
      return `${formatWarningMessage(alert.message)}\n`;
    case "info":
      return `${alert.message}\n`;
  }
}
