import {
  DeleteBucketPolicyCommand,
  GetBucketPolicyCommand,
  HeadBucketCommand,
  PutBucketPolicyCommand,
  type S3Client,
} from "@aws-sdk/client-s3";
import { bucketPolicyDocumentSchema } from "@core/domain/bucket-policy/bucket-policy.schema";
import type { BucketPolicyDocument } from "@core/domain/bucket-policy/bucket-policy.types";
import { FormatError, TransportError } from "@core/domain/errors";
import type { BucketStore } from "@core/ports/bucket-store.types";
import { awsCall, isAwsErrorNamed } from "./aws.errors";

export function parseBucketPolicy(raw: string): BucketPolicyDocument {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new FormatError("Bucket policy is not valid JSON", raw);
  }
  const parsed = bucketPolicyDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new FormatError("Bucket policy has an unexpected shape", raw);
  }
  return parsed.data;
}

export function createS3BucketStore(client: S3Client): BucketStore {
  return {
    async bucketExists(bucketName) {
      try {
        await client.send(new HeadBucketCommand({ Bucket: bucketName }));
        return true;
      } catch (error) {
        if (isAwsErrorNamed(error, "NotFound", "NoSuchBucket")) {
          return false;
        }
        throw new TransportError("HeadBucket", error);
      }
    },

    async getPolicy(bucketName) {
      try {
        const response = await client.send(new GetBucketPolicyCommand({ Bucket: bucketName }));
        return response.Policy ? parseBucketPolicy(response.Policy) : undefined;
      } catch (error) {
        if (isAwsErrorNamed(error, "NoSuchBucketPolicy")) {
          return undefined;
        }
        if (error instanceof FormatError) {
          throw error;
        }
        throw new TransportError("GetBucketPolicy", error);
      }
    },

    async putPolicy(bucketName, document) {
      await awsCall("PutBucketPolicy", () =>
        client.send(new PutBucketPolicyCommand({ Bucket: bucketName, Policy: JSON.stringify(document) })),
      );
    },

    async deletePolicy(bucketName) {
      await awsCall("DeleteBucketPolicy", () => client.send(new DeleteBucketPolicyCommand({ Bucket: bucketName })));
    },
  };
}
