import { IdentitystoreClient } from "@aws-sdk/client-identitystore";
import { IAMClient } from "@aws-sdk/client-iam";
import { S3Client } from "@aws-sdk/client-s3";
import { SSOAdminClient } from "@aws-sdk/client-sso-admin";
import type { AccessConfig } from "@infra/config";

export type AwsClients = {
  ssoAdmin: SSOAdminClient;
  identityStore: IdentitystoreClient;
  iam: IAMClient;
  s3: S3Client;
};

export type AwsClientConfig = AccessConfig["aws"];

function clientOptions(config: AwsClientConfig): { profile?: string; region?: string } {
  return {
    ...(config.profile ? { profile: config.profile } : {}),
    ...(config.region ? { region: config.region } : {}),
  };
}

/** Unset profile and region fall through to the SDK's default provider chain. */
export function createAwsClients(config: AwsClientConfig): AwsClients {
  const options = clientOptions(config);
  return {
    ssoAdmin: new SSOAdminClient(options),
    identityStore: new IdentitystoreClient(options),
    iam: new IAMClient(options),
    s3: new S3Client(options),
  };
}
