import pino from "pino";
import { STDERR_FD } from "./logger.consts";
import { resolveLoggerConfig } from "./logger.utils";

const resolved = resolveLoggerConfig();

// Call sites log failures under `error`, which pino only serializes for `err`.
const serializers = { error: pino.stdSerializers.err };

export const logger = resolved.targets.length > 0
  ? pino({
      level: resolved.level,
      serializers,
      transport: {
        targets: resolved.targets,
      },
    })
  : pino({ level: resolved.level, serializers }, pino.destination(STDERR_FD));

export type Logger = typeof logger;
