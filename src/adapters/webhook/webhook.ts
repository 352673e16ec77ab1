import { TransportError } from "@core/domain/errors";
import type { RevocationWebhook } from "@core/ports/revocation-webhook.types";
import { logger } from "@infra/logger";
import { revocationWebhookPayloadSchema } from "./webhook.schema";

export type HttpRevocationWebhookOptions = {
  url: string;
  timeoutMs: number;
  fetch?: typeof fetch;
};

function describeIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `${issue.path.join(".") || "payload"}: ${issue.message}`).join("; ");
}

export function createHttpRevocationWebhook(options: HttpRevocationWebhookOptions): RevocationWebhook {
  const send = options.fetch ?? fetch;

  return {
    async send(payload) {
      const parsed = revocationWebhookPayloadSchema.safeParse(payload);
      if (!parsed.success) {
        throw new TransportError("Revocation webhook", new Error(describeIssues(parsed.error.issues)));
      }

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), options.timeoutMs);
      const startedAt = Date.now();
      try {
        const response = await send(options.url, {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: JSON.stringify(parsed.data),
          signal: controller.signal,
        });
        if (!response.ok) {
          throw new Error(`HTTP ${response.status}`);
        }
        logger.info({ status: response.status, latencyMs: Date.now() - startedAt }, "[jit] Revocation webhook delivered.");
      } catch (error) {
        if (controller.signal.aborted) {
          throw new TransportError("Revocation webhook", new Error(`timed out after ${options.timeoutMs}ms`));
        }
        throw new TransportError("Revocation webhook", error);
      } finally {
        clearTimeout(timer);
      }
    },
  };
}
