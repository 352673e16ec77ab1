import type { DurationDecision } from "@core/domain/access.types";
import { DEFAULT_MAX_DURATION } from "@core/domain/duration/duration.consts";
import { parseDuration } from "@core/domain/duration/duration.utils";
import { FormatError } from "@core/domain/errors";
import { logger } from "@infra/logger";

function parseCeiling(ceiling: string): { encoded: string; seconds: number } {
  try {
    return { encoded: ceiling, seconds: parseDuration(ceiling) };
  } catch (error) {
    if (!(error instanceof FormatError)) {
      throw error;
    }
    logger.warn({ ceiling, fallback: DEFAULT_MAX_DURATION }, "[jit] Invalid maximum duration, using the default ceiling.");
    return { encoded: DEFAULT_MAX_DURATION, seconds: parseDuration(DEFAULT_MAX_DURATION) };
  }
}

/**
 * Clamps a requested duration to its ceiling. Overflow and malformed input both
 * fall back to the ceiling; neither is an error.
 */
export function validateDuration(requested: string, ceiling: string): DurationDecision {
  const max = parseCeiling(ceiling);

  let requestedSeconds: number;
  try {
    requestedSeconds = parseDuration(requested);
  } catch (error) {
    if (!(error instanceof FormatError)) {
      throw error;
    }
    return { ...max, adjustment: "malformed" };
  }

  if (requestedSeconds > max.seconds) {
    return { ...max, adjustment: "exceeds-ceiling" };
  }

  return { encoded: requested.trim(), seconds: requestedSeconds };
}

export function describeAdjustment(decision: DurationDecision): string | undefined {
  if (decision.adjustment === "exceeds-ceiling") {
    return `Requested duration exceeds maximum allowed duration of ${decision.encoded}. Using maximum duration.`;
  }
  if (decision.adjustment === "malformed") {
    return `Invalid duration format. Using default duration of ${decision.encoded}.`;
  }
  return undefined;
}
