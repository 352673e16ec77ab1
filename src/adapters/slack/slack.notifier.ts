import { WebClient } from "@slack/web-api";
import { TransportError } from "@core/domain/errors";
import type { AccessNotification, Notifier } from "@core/ports/notifier.types";
import { logger } from "@infra/logger";

export type SlackNotifierOptions = {
  channel: string;
  /** Also DMs the requester when their email maps to a Slack user. */
  notifyRequester: boolean;
};

const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+$/;

// Notifications are sent once: no retries, no waiting out rate limits.
export function createSlackClient(token: string): WebClient {
  return new WebClient(token, {
    retryConfig: { retries: 0 },
    rejectRateLimitedCalls: true,
  });
}

export function createSlackNotifier(client: WebClient, options: SlackNotifierOptions): Notifier {
  const lookupRequester = async (requester: string): Promise<string | undefined> => {
    if (!options.notifyRequester || !EMAIL_PATTERN.test(requester)) {
      return undefined;
    }
    try {
      const response = await client.users.lookupByEmail({ email: requester });
      return response.user?.id;
    } catch (error) {
      logger.warn({ error, requester }, "[jit] Slack user lookup failed, skipping direct message.");
      return undefined;
    }
  };

  const post = async (channel: string, notification: AccessNotification) => {
    await client.chat.postMessage({
      channel,
      text: notification.document.text,
      blocks: notification.document.blocks,
    });
  };

  return {
    async notify(notification) {
      const targets = [options.channel, await lookupRequester(notification.requester)].filter(
        (target): target is string => Boolean(target),
      );
      if (targets.length === 0) {
        logger.warn({ kind: notification.kind }, "[jit] No Slack destination for notification.");
        return;
      }

      const results = await Promise.allSettled(targets.map((target) => post(target, notification)));
      const failures = results.flatMap((result, index) =>
        result.status === "rejected" ? [{ target: targets[index], reason: result.reason }] : [],
      );
      for (const failure of failures) {
        logger.warn({ error: failure.reason, target: failure.target, kind: notification.kind }, "[jit] Slack post failed.");
      }
      const [first] = failures;
      if (first && failures.length === targets.length) {
        throw new TransportError("Slack chat.postMessage", first.reason);
      }
      logger.info({ kind: notification.kind, delivered: targets.length - failures.length }, "[jit] Slack notification sent.");
    },
  };
}
