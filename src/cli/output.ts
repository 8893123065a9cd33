import type { Logger } from "../core/logger.ts";

/**
 * Formats one loop log line. Progress lines stay plain so per-item lines can
 * carry their own indentation.
 */
export function formatLine(level: keyof Logger, message: string): string {
  switch (level) {
    case "info":
      return message;
    case "success":
      return `✓ ${message}`;
    case "warn":
      return `⚠ ${message}`;
    case "error":
      return `✗ ${message}`;
  }
}

// All loop output goes to stdout, errors included
export const consoleLogger: Logger = {
  info: (message) => console.log(formatLine("info", message)),
  success: (message) => console.log(formatLine("success", message)),
  warn: (message) => console.log(formatLine("warn", message)),
  error: (message) => console.log(formatLine("error", message)),
};
