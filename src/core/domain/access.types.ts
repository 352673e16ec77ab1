export type IdentitySource = "identity-center" | "iam";

export type AccessType = "sso" | "s3";

export type AccessRequest = {
  identity: string;
  policyName: string;
  duration: string;
  maxDuration: string;
};

export type BucketAccessRequest = {
  identity: string;
  bucketName: string;
  policyTemplate: string;
  duration: string;
  maxDuration?: string;
};

export type RevokeRequest = {
  identity: string;
  policyName: string;
};

export type BucketRevokeRequest = {
  identity: string;
  bucketName: string;
};

export type PlatformInstance = {
  instanceArn: string;
  identityStoreId: string;
};

export type ResolvedIdentity = {
  principalId: string;
  displayName: string;
  source: IdentitySource;
  arn?: string;
  email?: string;
};

export type ResolvedPolicy = {
  arn: string;
  name: string;
  description?: string;
};

/** A principal bound to a permission set on an account; the platform owns it once created. */
export type Grant = {
  instance: PlatformInstance;
  accountId: string;
  principalId: string;
  policyArn: string;
};

export type DurationAdjustment = "exceeds-ceiling" | "malformed";

export type DurationDecision = {
  encoded: string;
  seconds: number;
  adjustment?: DurationAdjustment;
};

export type PolicyDetails =
  | { type: "sso"; name: string; arn: string; description?: string }
  | { type: "s3"; name: string; template: string };

export type RevocationSchedule = {
  requestId: string;
  identity: string;
  accessType: AccessType;
  durationSeconds: number;
  accountId: string;
  accountAlias?: string;
  policyName?: string;
  buckets?: string[];
  policyDetails: PolicyDetails;
  grantedAtIso: string;
};
