import type { BucketPolicyTemplate } from "./bucket-policy.types";

export const BUCKET_POLICY_VERSION = "2012-10-17";

export const JIT_STATEMENT_SID_PREFIX = "JitAccess";

export const BUCKET_POLICY_TEMPLATES: Record<BucketPolicyTemplate, { sid: string; actions: string[] }> = {
  "read-only": {
    sid: "JitAccessReadOnly",
    actions: ["s3:GetObject", "s3:ListBucket"],
  },
  "read-write": {
    sid: "JitAccessReadWrite",
    actions: ["s3:GetObject", "s3:ListBucket", "s3:PutObject", "s3:DeleteObject"],
  },
  "full-access": {
    sid: "JitAccessFullAccess",
    actions: ["s3:*"],
  },
};
