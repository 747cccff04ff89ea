import pino, { Logger, LevelWithSilent } from "pino";
import { SERVER_NAME } from "../global";

export type { Logger };

export function createLogger(
  options: { level?: LevelWithSilent; name?: string } = {}
): Logger {
  return pino({
    name: options.name ?? SERVER_NAME,
    level: options.level ?? "info",
  });
}
