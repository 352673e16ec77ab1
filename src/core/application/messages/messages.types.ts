export type DurationInput = number | string;

export type AccessMessageInput = {
  accountId: string;
  accountAlias?: string;
  permissionSet: string;
  permissionSetDescription?: string;
  requester: string;
  duration: DurationInput;
};

export type AccessRevokedMessageInput = Omit<AccessMessageInput, "duration" | "permissionSetDescription">;

export type BucketMessageInput = {
  accountId: string;
  bucketName: string;
  policyTemplate: string;
  requester: string;
  duration: DurationInput;
};

export type BucketRevokedMessageInput = Omit<BucketMessageInput, "duration" | "policyTemplate">;

export type AccessExpiredMessageInput = {
  accountId: string;
  accountAlias?: string;
  requester: string;
  duration: DurationInput;
  grant: { type: "sso"; permissionSet: string } | { type: "s3"; bucketName: string; policyTemplate: string };
};
