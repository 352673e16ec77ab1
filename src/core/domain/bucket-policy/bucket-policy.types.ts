export type BucketPolicyPrincipal = "*" | { AWS?: string | string[]; [key: string]: unknown };

export type BucketPolicyStatement = {
  Sid?: string;
  Effect: "Allow" | "Deny";
  Principal?: BucketPolicyPrincipal;
  Action?: string | string[];
  Resource?: string | string[];
  [key: string]: unknown;
};

export type BucketPolicyDocument = {
  Version: string;
  Id?: string;
  Statement: BucketPolicyStatement[];
};

export type BucketPolicyTemplate = "read-only" | "read-write" | "full-access";
