export { createAwsClients } from "./aws.clients";
export type { AwsClientConfig, AwsClients } from "./aws.clients";
export { createIamAccountDirectory } from "./iam.account-directory";
export { createIamBackend } from "./iam.backend";
export { createIdentityCenterBackend } from "./identity-center.backend";
export { createS3BucketStore } from "./s3.bucket-store";
export { createSsoAdminPlatform, createSsoPolicyCatalog } from "./sso-admin.platform";
