import type { Notifier } from "@core/ports/notifier.types";
import { logger } from "@infra/logger";

/** Used when Slack is disabled; the notification text only reaches the log. */
export function createLogNotifier(): Notifier {
  return {
    async notify(notification) {
      logger.info({ kind: notification.kind, requester: notification.requester }, `[jit] ${notification.document.text}`);
    },
  };
}
