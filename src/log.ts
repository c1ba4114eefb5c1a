import { getEnv } from "./env";

const PREFIX = "[zipcast]";

export function isDebug(): boolean {
  const v = getEnv("ZIPCAST_DEBUG");
  if (!v) return false;
  return v === "1" || v.toLowerCase() === "true" || v.toLowerCase() === "yes";
}

// Everything goes to stderr so stdout stays clean for the forecast itself.
export function logInfo(message: string): void {
  console.error(`${PREFIX} ${message}`);
}

export function logWarn(message: string): void {
  console.error(`${PREFIX} warning: ${message}`);
}

export function logDebug(message: string): void {
  if (isDebug()) console.error(`${PREFIX} ${message}`);
}
