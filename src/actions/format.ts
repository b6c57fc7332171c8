import { join } from "node:path";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Local wall-clock time as `YYYY-MM-DD HH:mm:ss`.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatMessage(prefix: string, date: Date, message: string): string {
  return `[${prefix}] (${formatTimestamp(date)}): ${message}`;
}

/**
 * `<hint>_<timestamp>.png` with path-unsafe characters replaced:
 * "/" -> "-", " " -> "_", ":" -> "-".
 */
export function screenshotFileName(hint: string, date: Date): string {
  const raw = `${hint}_${formatTimestamp(date)}.png`;
  return raw.replace(/\//g, "-").replace(/ /g, "_").replace(/:/g, "-");
}

export function screenshotPath(dir: string, hint: string, date: Date): string {
  return join(dir, screenshotFileName(hint, date));
}
