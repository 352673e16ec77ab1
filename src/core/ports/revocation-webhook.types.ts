import type { AccessType, PolicyDetails } from "../domain/access.types";

export type RevocationWebhookPayload = {
  event: "access.expired";
  identity: string;
  accessType: AccessType;
  policyDetails: PolicyDetails;
  durationSeconds: number;
  accountId: string;
  permissionSet?: string;
  buckets?: string[];
  grantedAt: string;
  expiresAt: string;
};

export type RevocationWebhook = {
  send: (payload: RevocationWebhookPayload) => Promise<void>;
};
