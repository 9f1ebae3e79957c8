import { Effect, Layer, Logger, LogLevel } from "effect";

const parseLogLevel = (envLevel: string | undefined): LogLevel.LogLevel => {
  if (!envLevel) return LogLevel.Info;

  // accepts both "warn" and "warning"
  const normalized = envLevel.trim().toLowerCase();
  const level = LogLevel.allLevels.find(l =>
    l._tag.toLowerCase() === normalized || l.label.toLowerCase() === normalized
  );

  return level ?? LogLevel.Info;
};

export const LogLevelConfigFromEnv: Layer.Layer<never> =
  Layer.unwrapEffect(
    Effect.sync(() => {
      const level = parseLogLevel(process.env.LOG_LEVEL);
      return Logger.minimumLogLevel(level);
    })
  );

export { parseLogLevel };
