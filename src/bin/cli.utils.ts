import { log } from "@clack/prompts";
import { z } from "zod";
import type { GrantOutcome, RevokeOutcome } from "@core/application/access-coordinator/access-coordinator";
import { describeFailure } from "@core/domain/errors";
import type { ProgressReporter } from "@core/ports/progress.types";
import type { AccessConfig } from "@infra/config";

// cac hands numeric-looking values over as numbers.
const textOption = z.preprocess((value) => (typeof value === "number" ? String(value) : value), z.string().trim().min(1));

export const grantOptionsSchema = z.object({
  user: textOption,
  permissionSet: textOption,
  duration: textOption.default("PT1H"),
  maxDuration: textOption.optional(),
  wait: z.boolean().default(false),
});

export const revokeOptionsSchema = z.object({
  user: textOption,
  permissionSet: textOption,
});

export const grantBucketOptionsSchema = z.object({
  user: textOption,
  bucket: textOption,
  template: textOption.default("read-only"),
  duration: textOption.default("PT1H"),
  maxDuration: textOption.optional(),
  wait: z.boolean().default(false),
});

export const revokeBucketOptionsSchema = z.object({
  user: textOption,
  bucket: textOption,
});

export const UNEXPECTED_FAILURE = "Unexpected failure, check the logs for details";

export function renderCliFailure(error: unknown): string {
  if (error instanceof z.ZodError) {
    const details = error.issues.map((issue) => `--${issue.path.join(".")}: ${issue.message}`).join(", ");
    return `[format] Invalid options: ${details}`;
  }
  const failure = describeFailure(error, UNEXPECTED_FAILURE);
  return `[${failure.kind}] ${failure.message}`;
}

export function createClackProgress(): ProgressReporter {
  return {
    step: (message) => log.step(message),
    success: (message) => log.success(message),
    warn: (message) => log.warn(message),
  };
}

export function formatGrantSummary(outcome: GrantOutcome): string[] {
  const target = outcome.policy.type === "sso" ? `permission set ${outcome.policy.name}` : `bucket ${outcome.policy.name} (${outcome.policy.template})`;
  const lines = [
    `User: ${outcome.identity.displayName} [${outcome.identity.source}]`,
    `Access: ${target} in ${outcome.accountAlias ? `${outcome.accountAlias} (${outcome.accountId})` : outcome.accountId}`,
    `Duration: ${outcome.duration.display} (${outcome.duration.encoded})`,
    `Notification: ${outcome.notification}`,
  ];
  lines.push(
    outcome.revocation
      ? `Revocation webhook: ${new Date(outcome.revocation.runAtUnixSeconds * 1000).toISOString()}`
      : "Revocation webhook: not configured",
  );
  return lines;
}

export function formatRevokeSummary(outcome: RevokeOutcome): string[] {
  return [
    `User: ${outcome.identity.displayName} [${outcome.identity.source}]`,
    `${outcome.accessType === "sso" ? "Permission set" : "Bucket"}: ${outcome.target}`,
    `Removed: ${outcome.removed ? "yes" : "no"}`,
    `Notification: ${outcome.notification}`,
  ];
}

function mask(secret: string): string {
  return secret ? `${secret.slice(0, 4)}…` : "(unset)";
}

export function configDiagnostics(config: AccessConfig): string[] {
  return [
    `Account: ${config.accountId}`,
    `AWS profile: ${config.aws.profile ?? "(default chain)"}`,
    `AWS region: ${config.aws.region ?? "(default chain)"}`,
    `Identity Center instance: ${config.aws.instanceArn ?? "(auto-discover)"}`,
    `Identity backends: ${config.identityBackends.join(", ")}`,
    `Default max duration: ${config.durations.defaultMaxDuration}`,
    `Revocation webhook: ${config.revocation.webhookUrl ?? "(disabled)"} [timeout ${config.revocation.timeoutMs}ms]`,
    `Slack: ${config.slack.enabled ? `enabled, channel ${config.slack.channel || "(none)"}, token ${mask(config.slack.token)}` : "disabled"}`,
    `Requester DMs: ${config.slack.notifyRequester ? "on" : "off"}`,
  ];
}
