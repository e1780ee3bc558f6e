/**
 * Logging surface shared by the monitor, sinks and sources.
 * Defaults to the console; tests pass a quiet stand-in.
 */

export type Logger = Pick<Console, "log" | "warn" | "error">;

/**
 * Mask a credential for logs, keeping a short prefix
 */
export function maskSecret(value: string, visible: number = 3): string {
  if (value.length <= visible) return "***";
  return `${value.slice(0, visible)}***`;
}
