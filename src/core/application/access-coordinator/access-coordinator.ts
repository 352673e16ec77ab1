import { randomUUID } from "node:crypto";
import type {
  DurationDecision,
  PlatformInstance,
  PolicyDetails,
  ResolvedIdentity,
  RevocationSchedule,
} from "@core/domain/access.types";
import {
  addPrincipalToBucketPolicy,
  emptyBucketPolicy,
  parseBucketPolicyTemplate,
  removePrincipalFromBucketPolicy,
} from "@core/domain/bucket-policy/bucket-policy.utils";
import { describeDuration } from "@core/domain/duration/duration.utils";
import { ConfigError, NotFoundError, TransportError, toTransportError } from "@core/domain/errors";
import type { AccessNotification } from "@core/ports/notifier.types";
import { silentProgress } from "@core/ports/progress.types";
import { logger } from "@infra/logger";
import { describeAdjustment, validateDuration } from "../duration-policy/duration-policy";
import { createIdentityResolver } from "../identity-resolver/identity-resolver";
import {
  createAccessExpiredMessage,
  createAccessGrantedMessage,
  createAccessRevokedMessage,
  createBucketAccessGrantedMessage,
  createBucketAccessRevokedMessage,
} from "../messages/messages.utils";
import { createPolicyResolver } from "../policy-resolver/policy-resolver";
import { inMemorySchedulerFactory } from "../scheduler/scheduler";
import type {
  AccessCoordinator,
  AccessCoordinatorDeps,
  AccessState,
  GrantOutcome,
  NotificationStatus,
} from "./access-coordinator.types";

const COORDINATOR_ID = "coordinator";

export function selectInstance(instances: PlatformInstance[], instanceArn: string | undefined): PlatformInstance {
  if (instanceArn) {
    const selected = instances.find((instance) => instance.instanceArn === instanceArn);
    if (!selected) {
      throw new ConfigError(`Identity Center instance not found: ${instanceArn}`, "aws.instanceArn");
    }
    return selected;
  }

  const [first, ...rest] = instances;
  if (!first) {
    throw new ConfigError("No Identity Center instance found");
  }
  if (rest.length > 0) {
    throw new ConfigError(`Found ${instances.length} Identity Center instances, set one explicitly`, "aws.instanceArn");
  }
  return first;
}

async function platformCall<T>(operation: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    throw toTransportError(operation, error);
  }
}

export async function createAccessCoordinator(deps: AccessCoordinatorDeps): Promise<AccessCoordinator> {
  const { settings, clock } = deps;
  const progress = deps.progress ?? silentProgress;
  const states = new Map<string, AccessState>();

  const move = (requestId: string, to: AccessState) => {
    const from = states.get(requestId) ?? "ready";
    logger.debug({ requestId, from, to }, "[jit] Access state changed.");
    deps.onTransition?.(requestId, from, to);
    if (to === "completed" || to === "failed") {
      states.delete(requestId);
      return;
    }
    states.set(requestId, to);
  };

  const initialize = async (): Promise<PlatformInstance> => {
    states.set(COORDINATOR_ID, "initializing");
    try {
      const instances = await platformCall("ListInstances", () => deps.platform.listInstances());
      const selected = selectInstance(instances, settings.instanceArn);
      move(COORDINATOR_ID, "ready");
      states.delete(COORDINATOR_ID);
      return selected;
    } catch (error) {
      move(COORDINATOR_ID, "failed");
      throw error;
    }
  };

  const instance = await initialize();
  logger.info({ instanceArn: instance.instanceArn, identityStoreId: instance.identityStoreId }, "[jit] Identity Center instance selected.");

  const identities = createIdentityResolver(deps.identityBackends);
  const policies = createPolicyResolver(deps.policyCatalog);

  const deliver = async (requestId: string, notification: AccessNotification): Promise<NotificationStatus> => {
    try {
      await deps.notifier.notify(notification);
      return "sent";
    } catch (error) {
      logger.warn({ error, requestId, kind: notification.kind }, "[jit] Notification failed.");
      progress.warn(`Failed to send ${notification.kind} notification`);
      return "failed";
    }
  };

  const onExpiry = async (schedule: RevocationSchedule) => {
    const webhook = deps.revocationWebhook;
    if (webhook) {
      try {
        await webhook.send({
          event: "access.expired",
          identity: schedule.identity,
          accessType: schedule.accessType,
          policyDetails: schedule.policyDetails,
          durationSeconds: schedule.durationSeconds,
          accountId: schedule.accountId,
          permissionSet: schedule.policyName,
          buckets: schedule.buckets,
          grantedAt: schedule.grantedAtIso,
          expiresAt: clock.nowIso(),
        });
        logger.info({ requestId: schedule.requestId, identity: schedule.identity }, "[jit] Revocation webhook sent.");
      } catch (error) {
        logger.error({ error, requestId: schedule.requestId }, "[jit] Revocation webhook failed.");
      }
    }

    const details = schedule.policyDetails;
    await deliver(schedule.requestId, {
      kind: "access-expired",
      requester: schedule.identity,
      document: createAccessExpiredMessage({
        accountId: schedule.accountId,
        accountAlias: schedule.accountAlias,
        requester: schedule.identity,
        duration: schedule.durationSeconds,
        grant:
          details.type === "sso"
            ? { type: "sso", permissionSet: details.name }
            : { type: "s3", bucketName: details.name, policyTemplate: details.template },
      }),
    });
    move(schedule.requestId, "completed");
  };

  const schedulerFactory = deps.schedulerFactory ?? inMemorySchedulerFactory;
  const scheduler = schedulerFactory<RevocationSchedule>({ clock, handler: onExpiry });

  const scheduleRevocation = (schedule: RevocationSchedule): GrantOutcome["revocation"] => {
    if (!deps.revocationWebhook) {
      logger.info({ requestId: schedule.requestId }, "[jit] No revocation webhook configured, skipping revocation schedule.");
      move(schedule.requestId, "completed");
      return undefined;
    }
    const runAtUnixSeconds = clock.nowUnixSeconds() + schedule.durationSeconds;
    scheduler.schedule(runAtUnixSeconds, schedule);
    move(schedule.requestId, "scheduled");
    progress.step(`Revocation webhook scheduled in ${describeDuration(schedule.durationSeconds)}`);
    return { runAtUnixSeconds };
  };

  const run = async <T>(requestId: string, task: () => Promise<T>): Promise<T> => {
    try {
      return await task();
    } catch (error) {
      move(requestId, "failed");
      logger.error({ error, requestId }, "[jit] Access request failed.");
      throw error;
    }
  };

  const decideDuration = (requested: string, ceiling: string | undefined): DurationDecision => {
    const decision = validateDuration(requested, ceiling || settings.defaultMaxDuration);
    const warning = describeAdjustment(decision);
    if (warning) {
      logger.warn({ requested, effective: decision.encoded, adjustment: decision.adjustment }, "[jit] Duration adjusted.");
      progress.warn(warning);
    }
    return decision;
  };

  const requireIdentity = async (identity: string): Promise<ResolvedIdentity> => {
    progress.step(`Looking up user ${identity}`);
    const resolved = await identities.resolve(identity, instance);
    if (!resolved) {
      throw new NotFoundError("identity", identity);
    }
    progress.success(`Found user ${resolved.displayName} (${resolved.source})`);
    return resolved;
  };

  const requirePrincipalArn = (identity: ResolvedIdentity, requested: string): string => {
    if (!identity.arn) {
      throw new NotFoundError("principal-arn", requested);
    }
    return identity.arn;
  };

  const requirePolicy = async (name: string) => {
    progress.step(`Looking up permission set ${name}`);
    const policy = await policies.resolve(name, instance);
    if (!policy) {
      throw new NotFoundError("policy", name);
    }
    return policy;
  };

  const requireBucket = async (bucketName: string) => {
    progress.step(`Checking bucket ${bucketName}`);
    const exists = await platformCall("HeadBucket", () => deps.bucketStore.bucketExists(bucketName));
    if (!exists) {
      throw new NotFoundError("bucket", bucketName);
    }
  };

  const lookupAlias = async (): Promise<string | undefined> => {
    try {
      return await deps.accountDirectory.getAccountAlias(settings.accountId);
    } catch (error) {
      logger.warn({ error, accountId: settings.accountId }, "[jit] Account alias lookup failed, using account id.");
      return undefined;
    }
  };

  const durationSummary = (decision: DurationDecision): GrantOutcome["duration"] => ({
    seconds: decision.seconds,
    encoded: decision.encoded,
    display: describeDuration(decision.seconds),
    adjustment: decision.adjustment,
  });

  return {
    grantAccess(request) {
      const requestId = randomUUID();
      return run(requestId, async () => {
        move(requestId, "granting");
        const duration = decideDuration(request.duration, request.maxDuration);
        const identity = await requireIdentity(request.identity);
        const policy = await requirePolicy(request.policyName);
        const accountAlias = await lookupAlias();

        progress.step(`Assigning ${policy.name} to ${identity.displayName}`);
        const status = await platformCall("CreateAccountAssignment", () =>
          deps.platform.createAssignment({
            instance,
            accountId: settings.accountId,
            policyArn: policy.arn,
            principalId: identity.principalId,
          }),
        );
        if (status.status === "FAILED") {
          throw new TransportError("CreateAccountAssignment", new Error(status.failureReason ?? "assignment rejected"));
        }
        move(requestId, "granted");
        progress.success(`Granted ${policy.name} to ${identity.displayName} for ${describeDuration(duration.seconds)}`);
        logger.info({ requestId, identity: request.identity, policy: policy.name, seconds: duration.seconds }, "[jit] Access granted.");

        const notification = await deliver(requestId, {
          kind: "access-granted",
          requester: request.identity,
          document: createAccessGrantedMessage({
            accountId: settings.accountId,
            accountAlias,
            permissionSet: policy.name,
            permissionSetDescription: policy.description,
            requester: request.identity,
            duration: duration.seconds,
          }),
        });

        const details: PolicyDetails = { type: "sso", name: policy.name, arn: policy.arn, description: policy.description };
        const revocation = scheduleRevocation({
          requestId,
          identity: request.identity,
          accessType: "sso",
          durationSeconds: duration.seconds,
          accountId: settings.accountId,
          accountAlias,
          policyName: policy.name,
          policyDetails: details,
          grantedAtIso: clock.nowIso(),
        });

        return {
          requestId,
          identity,
          accountId: settings.accountId,
          accountAlias,
          policy: details,
          duration: durationSummary(duration),
          notification,
          revocation,
        };
      });
    },

    grantBucketAccess(request) {
      const requestId = randomUUID();
      return run(requestId, async () => {
        move(requestId, "granting");
        const template = parseBucketPolicyTemplate(request.policyTemplate);
        const duration = decideDuration(request.duration, request.maxDuration);
        const identity = await requireIdentity(request.identity);
        const principalArn = requirePrincipalArn(identity, request.identity);
        await requireBucket(request.bucketName);

        const current =
          (await platformCall("GetBucketPolicy", () => deps.bucketStore.getPolicy(request.bucketName))) ?? emptyBucketPolicy();
        const next = addPrincipalToBucketPolicy(current, { bucketName: request.bucketName, principalArn, template });
        if (next === current) {
          logger.info({ requestId, bucket: request.bucketName, principalArn }, "[jit] Principal already present in bucket policy.");
        } else {
          progress.step(`Updating policy of bucket ${request.bucketName}`);
          await platformCall("PutBucketPolicy", () => deps.bucketStore.putPolicy(request.bucketName, next));
        }
        move(requestId, "granted");
        progress.success(`Granted ${template} on ${request.bucketName} to ${identity.displayName}`);
        logger.info({ requestId, identity: request.identity, bucket: request.bucketName, template }, "[jit] Bucket access granted.");

        const notification = await deliver(requestId, {
          kind: "bucket-access-granted",
          requester: request.identity,
          document: createBucketAccessGrantedMessage({
            accountId: settings.accountId,
            bucketName: request.bucketName,
            policyTemplate: template,
            requester: request.identity,
            duration: duration.seconds,
          }),
        });

        const details: PolicyDetails = { type: "s3", name: request.bucketName, template };
        const revocation = scheduleRevocation({
          requestId,
          identity: request.identity,
          accessType: "s3",
          durationSeconds: duration.seconds,
          accountId: settings.accountId,
          buckets: [request.bucketName],
          policyDetails: details,
          grantedAtIso: clock.nowIso(),
        });

        return {
          requestId,
          identity,
          accountId: settings.accountId,
          policy: details,
          duration: durationSummary(duration),
          notification,
          revocation,
        };
      });
    },

    revokeAccess(request) {
      const requestId = randomUUID();
      return run(requestId, async () => {
        move(requestId, "revoking");
        const identity = await requireIdentity(request.identity);
        const policy = await requirePolicy(request.policyName);
        const accountAlias = await lookupAlias();

        progress.step(`Removing ${policy.name} from ${identity.displayName}`);
        const status = await platformCall("DeleteAccountAssignment", () =>
          deps.platform.deleteAssignment({
            instance,
            accountId: settings.accountId,
            policyArn: policy.arn,
            principalId: identity.principalId,
          }),
        );
        if (status.status === "FAILED") {
          throw new TransportError("DeleteAccountAssignment", new Error(status.failureReason ?? "deletion rejected"));
        }
        progress.success(`Revoked ${policy.name} from ${identity.displayName}`);
        logger.info({ requestId, identity: request.identity, policy: policy.name }, "[jit] Access revoked.");

        const notification = await deliver(requestId, {
          kind: "access-revoked",
          requester: request.identity,
          document: createAccessRevokedMessage({
            accountId: settings.accountId,
            accountAlias,
            permissionSet: policy.name,
            requester: request.identity,
          }),
        });
        move(requestId, "completed");

        return {
          requestId,
          identity,
          accountId: settings.accountId,
          accessType: "sso",
          target: policy.name,
          removed: true,
          notification,
        };
      });
    },

    revokeBucketAccess(request) {
      const requestId = randomUUID();
      return run(requestId, async () => {
        move(requestId, "revoking");
        const identity = await requireIdentity(request.identity);
        const principalArn = requirePrincipalArn(identity, request.identity);
        await requireBucket(request.bucketName);

        const current = await platformCall("GetBucketPolicy", () => deps.bucketStore.getPolicy(request.bucketName));
        const { document, removed } = current
          ? removePrincipalFromBucketPolicy(current, principalArn)
          : { document: emptyBucketPolicy(), removed: false };

        let notification: NotificationStatus = "skipped";
        if (removed) {
          if (document.Statement.length === 0) {
            progress.step(`Deleting now empty policy of bucket ${request.bucketName}`);
            await platformCall("DeleteBucketPolicy", () => deps.bucketStore.deletePolicy(request.bucketName));
          } else {
            progress.step(`Updating policy of bucket ${request.bucketName}`);
            await platformCall("PutBucketPolicy", () => deps.bucketStore.putPolicy(request.bucketName, document));
          }
          progress.success(`Revoked access to ${request.bucketName} from ${identity.displayName}`);
          logger.info({ requestId, identity: request.identity, bucket: request.bucketName }, "[jit] Bucket access revoked.");
          notification = await deliver(requestId, {
            kind: "bucket-access-revoked",
            requester: request.identity,
            document: createBucketAccessRevokedMessage({
              accountId: settings.accountId,
              bucketName: request.bucketName,
              requester: request.identity,
            }),
          });
        } else {
          progress.warn(`${identity.displayName} has no JIT access on ${request.bucketName}`);
        }
        move(requestId, "completed");

        return {
          requestId,
          identity,
          accountId: settings.accountId,
          accessType: "s3",
          target: request.bucketName,
          removed,
          notification,
        };
      });
    },

    pendingRevocations() {
      return scheduler.pendingCount();
    },

    idle() {
      return scheduler.idle();
    },
  };
}

export type {
  AccessCoordinator,
  AccessCoordinatorDeps,
  AccessCoordinatorSettings,
  AccessState,
  AccessTransitionHook,
  GrantOutcome,
  NotificationStatus,
  RevokeOutcome,
} from "./access-coordinator.types";
