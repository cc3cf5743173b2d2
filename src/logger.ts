import { Logger, type ILogObj } from "tslog";
import { levelToMinLevel, resolveLoggerSettings, type LoggerSettings } from "./config";

let cachedLogger: Logger<ILogObj> | null = null;

export function createLogger(settings: LoggerSettings = resolveLoggerSettings()): Logger<ILogObj> {
  return new Logger<ILogObj>({
    name: "logcat",
    minLevel: levelToMinLevel(settings.level),
  });
}

export function getLogger(): Logger<ILogObj> {
  if (!cachedLogger) {
    cachedLogger = createLogger();
  }
  return cachedLogger;
}

export function getChildLogger(name: string): Logger<ILogObj> {
  return getLogger().getSubLogger({ name });
}
