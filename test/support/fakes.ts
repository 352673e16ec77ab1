import { vi } from "vitest";
import type { Grant, PlatformInstance, ResolvedIdentity, ResolvedPolicy } from "@core/domain/access.types";
import type { BucketPolicyDocument } from "@core/domain/bucket-policy/bucket-policy.types";
import type { AccessPlatform, AssignmentStatus, PolicyCatalog } from "@core/ports/access-platform.types";
import type { AccountDirectory } from "@core/ports/account-directory.types";
import type { BucketStore } from "@core/ports/bucket-store.types";
import type { Clock } from "@core/ports/clock.types";
import type { IdentityBackend } from "@core/ports/identity-backend.types";
import type { AccessNotification, Notifier } from "@core/ports/notifier.types";
import type { ProgressReporter } from "@core/ports/progress.types";
import type { RevocationWebhook, RevocationWebhookPayload } from "@core/ports/revocation-webhook.types";

export const testInstance: PlatformInstance = {
  instanceArn: "arn:aws:sso:::instance/ssoins-test",
  identityStoreId: "d-test",
};

export type ManualClock = Clock & {
  advanceBy: (seconds: number) => void;
  sleepCalls: () => number;
};

export function createManualClock(startUnixSeconds = 1_725_000_000): ManualClock {
  let now = startUnixSeconds;
  let calls = 0;
  const waiters: Array<{ at: number; wake: () => void }> = [];

  const flush = () => {
    for (const waiter of [...waiters]) {
      if (waiter.at <= now) {
        waiters.splice(waiters.indexOf(waiter), 1);
        waiter.wake();
      }
    }
  };

  return {
    nowUnixSeconds: () => now,
    nowIso: () => new Date(now * 1000).toISOString(),
    sleepUntil(unixSeconds) {
      calls += 1;
      return new Promise<void>((wake) => {
        waiters.push({ at: unixSeconds, wake });
        flush();
      });
    },
    advanceBy(seconds) {
      now += seconds;
      flush();
    },
    sleepCalls: () => calls,
  };
}

export function createFakePlatform(instances: PlatformInstance[] = [testInstance]) {
  const succeeded = async (_grant: Grant): Promise<AssignmentStatus> => ({ status: "IN_PROGRESS", requestId: "req-1" });
  const platform = {
    listInstances: vi.fn(async () => instances),
    createAssignment: vi.fn(succeeded),
    deleteAssignment: vi.fn(succeeded),
  } satisfies AccessPlatform;
  return platform;
}

export function createFakeCatalog(policies: ResolvedPolicy[]) {
  return {
    listPage: vi.fn(async () => ({ policies })),
  } satisfies PolicyCatalog;
}

export function createFakeBackend(
  id: IdentityBackend["id"],
  priority: number,
  users: Record<string, ResolvedIdentity>,
) {
  return {
    id,
    priority,
    findUser: vi.fn(async (identity: string) => users[identity]),
  } satisfies IdentityBackend;
}

export function createFakeDirectory(alias?: string) {
  return {
    getAccountAlias: vi.fn(async () => alias),
  } satisfies AccountDirectory;
}

export function createFakeBucketStore(buckets: Record<string, BucketPolicyDocument | undefined>) {
  const policies = new Map(Object.entries(buckets));
  return {
    policies,
    bucketExists: vi.fn(async (bucketName: string) => policies.has(bucketName)),
    getPolicy: vi.fn(async (bucketName: string) => policies.get(bucketName)),
    putPolicy: vi.fn(async (bucketName: string, document: BucketPolicyDocument) => {
      policies.set(bucketName, document);
    }),
    deletePolicy: vi.fn(async (bucketName: string) => {
      policies.set(bucketName, undefined);
    }),
  } satisfies BucketStore & { policies: Map<string, BucketPolicyDocument | undefined> };
}

export function createRecordingNotifier() {
  const sent: AccessNotification[] = [];
  const notifier = {
    sent,
    notify: vi.fn(async (notification: AccessNotification) => {
      sent.push(notification);
    }),
  } satisfies Notifier & { sent: AccessNotification[] };
  return notifier;
}

export function createRecordingWebhook() {
  const sent: RevocationWebhookPayload[] = [];
  return {
    sent,
    send: vi.fn(async (payload: RevocationWebhookPayload) => {
      sent.push(payload);
    }),
  } satisfies RevocationWebhook & { sent: RevocationWebhookPayload[] };
}

export function createRecordingProgress() {
  const lines: string[] = [];
  const progress: ProgressReporter = {
    step: (message) => lines.push(`step: ${message}`),
    success: (message) => lines.push(`success: ${message}`),
    warn: (message) => lines.push(`warn: ${message}`),
  };
  return { progress, lines };
}
