import { resolve } from "node:path";
import { DEFAULT_LOG_LEVEL, STDERR_FD, TEST_LOG_LEVEL } from "./logger.consts";
import type { LoggerResolvedConfig } from "./logger.types";

export function resolveLoggerConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): LoggerResolvedConfig {
  const level = env.LOG_LEVEL?.trim() || (env.NODE_ENV === "test" ? TEST_LOG_LEVEL : DEFAULT_LOG_LEVEL);
  const silent = level === "silent";
  const usePretty = !silent && env.JIT_PRETTY_LOGS !== "0";
  const rawLogFile = env.JIT_LOG_FILE?.trim();
  const logFilePath = rawLogFile ? resolve(cwd, rawLogFile) : undefined;
  const fileLoggingEnabled = !silent && logFilePath !== undefined;

  const targets: LoggerResolvedConfig["targets"] = [];
  if (usePretty) {
    targets.push({
      target: "pino-pretty",
      level,
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
        destination: STDERR_FD,
      },
    });
  }

  if (fileLoggingEnabled) {
    targets.push({
      target: "pino/file",
      level,
      options: {
        destination: logFilePath,
        mkdir: true,
      },
    });
  }

  return {
    level,
    ...(logFilePath ? { logFilePath } : {}),
    usePretty,
    fileLoggingEnabled,
    targets,
  };
}
