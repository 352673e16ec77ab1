/**
 * Composition root: turns a resolved config into a ready access coordinator.
 */

import type { WebClient } from "@slack/web-api";
import {
  createAccessCoordinator,
  type AccessCoordinator,
  type AccessTransitionHook,
} from "@core/application/access-coordinator/access-coordinator";
import type { IdentitySource } from "@core/domain/access.types";
import type { Clock } from "@core/ports/clock.types";
import type { IdentityBackend } from "@core/ports/identity-backend.types";
import type { Notifier } from "@core/ports/notifier.types";
import type { ProgressReporter } from "@core/ports/progress.types";
import {
  createAwsClients,
  createIamAccountDirectory,
  createIamBackend,
  createIdentityCenterBackend,
  createS3BucketStore,
  createSsoAdminPlatform,
  createSsoPolicyCatalog,
  type AwsClients,
} from "@adapters/aws";
import { createLogNotifier, createSlackClient, createSlackNotifier } from "@adapters/slack";
import { createHttpRevocationWebhook } from "@adapters/webhook";
import type { AccessConfig } from "@infra/config";
import { logger } from "@infra/logger";
import { createSystemClock } from "@infra/time";

export type AccessRuntimeOptions = {
  progress?: ProgressReporter;
  /** Holds the process open until scheduled revocations have fired. */
  keepProcessAlive?: boolean;
  onTransition?: AccessTransitionHook;
  clock?: Clock;
  awsClients?: AwsClients;
  slackClient?: WebClient;
  fetch?: typeof fetch;
};

export type AccessRuntime = {
  config: AccessConfig;
  coordinator: AccessCoordinator;
};

function identityBackendsFor(sources: IdentitySource[], clients: AwsClients): IdentityBackend[] {
  return sources.map((source, priority) =>
    source === "identity-center"
      ? createIdentityCenterBackend(clients.identityStore, priority)
      : createIamBackend(clients.iam, priority),
  );
}

function notifierFor(config: AccessConfig, slackClient: WebClient | undefined): Notifier {
  if (!config.slack.enabled) {
    logger.info("[jit] Slack disabled, notifications go to the log only.");
    return createLogNotifier();
  }
  return createSlackNotifier(slackClient ?? createSlackClient(config.slack.token), {
    channel: config.slack.channel,
    notifyRequester: config.slack.notifyRequester,
  });
}

export async function createAccessRuntime(config: AccessConfig, options: AccessRuntimeOptions = {}): Promise<AccessRuntime> {
  const clients = options.awsClients ?? createAwsClients(config.aws);
  const webhookUrl = config.revocation.webhookUrl;

  const coordinator = await createAccessCoordinator({
    settings: {
      accountId: config.accountId,
      instanceArn: config.aws.instanceArn,
      defaultMaxDuration: config.durations.defaultMaxDuration,
    },
    platform: createSsoAdminPlatform(clients.ssoAdmin),
    policyCatalog: createSsoPolicyCatalog(clients.ssoAdmin),
    identityBackends: identityBackendsFor(config.identityBackends, clients),
    accountDirectory: createIamAccountDirectory(clients.iam),
    bucketStore: createS3BucketStore(clients.s3),
    notifier: notifierFor(config, options.slackClient),
    revocationWebhook: webhookUrl
      ? createHttpRevocationWebhook({ url: webhookUrl, timeoutMs: config.revocation.timeoutMs, fetch: options.fetch })
      : undefined,
    clock: options.clock ?? createSystemClock({ keepProcessAlive: options.keepProcessAlive }),
    progress: options.progress,
    onTransition: options.onTransition,
  });

  return { config, coordinator };
}
