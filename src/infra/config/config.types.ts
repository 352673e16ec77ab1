import type { IdentitySource } from "@core/domain/access.types";

export type AccessConfig = {
  accountId: string;
  aws: {
    profile?: string;
    region?: string;
    instanceArn?: string;
  };
  identityBackends: IdentitySource[];
  durations: {
    defaultMaxDuration: string;
  };
  revocation: {
    /** Revocation scheduling is enabled only when set. */
    webhookUrl?: string;
    timeoutMs: number;
  };
  slack: {
    enabled: boolean;
    token: string;
    channel: string;
    notifyRequester: boolean;
  };
};
