import type { BucketPolicyDocument } from "../domain/bucket-policy/bucket-policy.types";

export interface BucketStore {
  bucketExists(bucketName: string): Promise<boolean>;
  getPolicy(bucketName: string): Promise<BucketPolicyDocument | undefined>;
  putPolicy(bucketName: string, document: BucketPolicyDocument): Promise<void>;
  deletePolicy(bucketName: string): Promise<void>;
}
