import { mockClient } from "aws-sdk-client-mock";
import { beforeEach, describe, expect, it } from "vitest";
import {
  DeleteBucketPolicyCommand,
  GetBucketPolicyCommand,
  HeadBucketCommand,
  NotFound,
  PutBucketPolicyCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { FormatError, TransportError } from "@core/domain/errors";
import { createS3BucketStore } from "./s3.bucket-store";

const s3Mock = mockClient(S3Client);
const store = createS3BucketStore(new S3Client({ region: "us-east-1" }));

const policy = {
  Version: "2012-10-17",
  Statement: [
    {
      Sid: "JitAccessReadOnly",
      Effect: "Allow",
      Principal: { AWS: ["arn:aws:iam::123456789012:user/bob"] },
      Action: ["s3:GetObject", "s3:ListBucket"],
      Resource: ["arn:aws:s3:::reports", "arn:aws:s3:::reports/*"],
    },
  ],
} as const;

beforeEach(() => {
  s3Mock.reset();
});

describe("createS3BucketStore", () => {
  it("reports existing and missing buckets", async () => {
    s3Mock
      .on(HeadBucketCommand, { Bucket: "reports" })
      .resolves({})
      .on(HeadBucketCommand, { Bucket: "missing" })
      .rejects(new NotFound({ message: "Not Found", $metadata: {} }));

    await expect(store.bucketExists("reports")).resolves.toBe(true);
    await expect(store.bucketExists("missing")).resolves.toBe(false);
  });

  it("treats other head failures as transport errors", async () => {
    s3Mock.on(HeadBucketCommand).rejects(new Error("Forbidden"));

    await expect(store.bucketExists("reports")).rejects.toBeInstanceOf(TransportError);
  });

  it("parses the stored policy", async () => {
    s3Mock.on(GetBucketPolicyCommand).resolves({ Policy: JSON.stringify(policy) });

    await expect(store.getPolicy("reports")).resolves.toEqual(policy);
  });

  it("returns undefined for buckets without a policy", async () => {
    s3Mock.on(GetBucketPolicyCommand).rejects(
      new S3ServiceException({
        name: "NoSuchBucketPolicy",
        $fault: "client",
        $metadata: {},
        message: "The bucket policy does not exist",
      }),
    );

    await expect(store.getPolicy("reports")).resolves.toBeUndefined();
  });

  it("rejects policies that are not JSON", async () => {
    s3Mock.on(GetBucketPolicyCommand).resolves({ Policy: "{not json" });

    await expect(store.getPolicy("reports")).rejects.toBeInstanceOf(FormatError);
  });

  it("writes and deletes policies", async () => {
    s3Mock.on(PutBucketPolicyCommand).resolves({}).on(DeleteBucketPolicyCommand).resolves({});

    await store.putPolicy("reports", { Version: "2012-10-17", Statement: [] });
    await store.deletePolicy("reports");

    expect(s3Mock.commandCalls(PutBucketPolicyCommand)[0]?.args[0].input).toEqual({
      Bucket: "reports",
      Policy: '{"Version":"2012-10-17","Statement":[]}',
    });
    expect(s3Mock.commandCalls(DeleteBucketPolicyCommand)[0]?.args[0].input).toEqual({ Bucket: "reports" });
  });
});
