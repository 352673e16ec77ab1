import type {
  AccessRequest,
  AccessType,
  BucketAccessRequest,
  BucketRevokeRequest,
  DurationAdjustment,
  PolicyDetails,
  ResolvedIdentity,
  RevokeRequest,
} from "@core/domain/access.types";
import type { AccessPlatform, PolicyCatalog } from "@core/ports/access-platform.types";
import type { AccountDirectory } from "@core/ports/account-directory.types";
import type { BucketStore } from "@core/ports/bucket-store.types";
import type { Clock } from "@core/ports/clock.types";
import type { IdentityBackend } from "@core/ports/identity-backend.types";
import type { Notifier } from "@core/ports/notifier.types";
import type { ProgressReporter } from "@core/ports/progress.types";
import type { RevocationWebhook } from "@core/ports/revocation-webhook.types";
import type { SchedulerFactory } from "../scheduler/scheduler.types";

export type AccessState =
  | "initializing"
  | "ready"
  | "granting"
  | "granted"
  | "scheduled"
  | "revoking"
  | "completed"
  | "failed";

export type AccessTransitionHook = (requestId: string, from: AccessState, to: AccessState) => void;

export type AccessCoordinatorSettings = {
  accountId: string;
  /** Selects one instance when the organization has several. */
  instanceArn?: string;
  defaultMaxDuration: string;
};

export type AccessCoordinatorDeps = {
  settings: AccessCoordinatorSettings;
  platform: AccessPlatform;
  policyCatalog: PolicyCatalog;
  identityBackends: IdentityBackend[];
  accountDirectory: AccountDirectory;
  bucketStore: BucketStore;
  notifier: Notifier;
  /** Revocations are scheduled only when a webhook is wired in. */
  revocationWebhook?: RevocationWebhook;
  clock: Clock;
  progress?: ProgressReporter;
  schedulerFactory?: SchedulerFactory;
  onTransition?: AccessTransitionHook;
};

export type NotificationStatus = "sent" | "failed" | "skipped";

export type GrantOutcome = {
  requestId: string;
  identity: ResolvedIdentity;
  accountId: string;
  accountAlias?: string;
  policy: PolicyDetails;
  duration: {
    seconds: number;
    encoded: string;
    display: string;
    adjustment?: DurationAdjustment;
  };
  notification: NotificationStatus;
  revocation?: {
    runAtUnixSeconds: number;
  };
};

export type RevokeOutcome = {
  requestId: string;
  identity: ResolvedIdentity;
  accountId: string;
  accessType: AccessType;
  /** Permission set or bucket name. */
  target: string;
  /** False when the principal had no access to remove. */
  removed: boolean;
  notification: NotificationStatus;
};

export type AccessCoordinator = {
  grantAccess: (request: AccessRequest) => Promise<GrantOutcome>;
  grantBucketAccess: (request: BucketAccessRequest) => Promise<GrantOutcome>;
  revokeAccess: (request: RevokeRequest) => Promise<RevokeOutcome>;
  revokeBucketAccess: (request: BucketRevokeRequest) => Promise<RevokeOutcome>;
  pendingRevocations: () => number;
  idle: () => Promise<void>;
};
