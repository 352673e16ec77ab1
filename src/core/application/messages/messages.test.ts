import { describe, expect, it } from "vitest";
import type { MessageBlock, MessageDocument } from "@core/domain/message.types";
import {
  createAccessExpiredMessage,
  createAccessGrantedMessage,
  createAccessRevokedMessage,
  createBucketAccessGrantedMessage,
  createBucketAccessRevokedMessage,
} from "./messages.utils";

function blockText(block: MessageBlock | undefined): string | undefined {
  if (!block || block.type === "divider") {
    return undefined;
  }
  if (block.type === "context") {
    return block.elements[0]?.text;
  }
  return block.text?.text;
}

function fieldTexts(document: MessageDocument): string[] {
  return document.blocks.flatMap((block) => (block.type === "section" ? (block.fields ?? []).map((field) => field.text) : []));
}

const base = {
  accountId: "123456789012",
  permissionSet: "ReadOnly",
  requester: "alice@example.com",
};

describe("access granted message", () => {
  it("renders header, summary, fields and expiry context", () => {
    const message = createAccessGrantedMessage({ ...base, duration: 5400 });

    expect(message.text).toBe("AWS access granted to alice@example.com: ReadOnly on 123456789012 for 1.5 hours");
    expect(blockText(message.blocks[0])).toBe("🎉 AWS Access Granted! 🎉");
    expect(blockText(message.blocks[1])).toBe(
      "You've been granted access to AWS account *123456789012* (123456789012) with permission set *ReadOnly*",
    );
    expect(fieldTexts(message)).toEqual(["*Duration:*\n1.5 hours", "*User:*\nalice@example.com"]);
    expect(blockText(message.blocks.at(-1))).toBe("⏰ Access will expire in 1.5 hours");
  });

  it("links the console step to the switch-role page of the account", () => {
    const message = createAccessGrantedMessage({ ...base, accountAlias: "sandbox", duration: 3600 });

    expect(blockText(message.blocks[6])).toBe(
      [
        "*🌐 Web Console Access*",
        "1. Visit: <https://signin.aws.amazon.com/switchrole?account=123456789012|AWS Console>",
        "2. Sign in with your SSO credentials",
        "3. Select account *sandbox* (123456789012)",
        "4. Choose the *ReadOnly* role",
      ].join("\n"),
    );
  });

  it("defaults a missing description", () => {
    const message = createAccessGrantedMessage({ ...base, duration: 60 });
    expect(blockText(message.blocks[3])).toBe("*Permission Set Details:*\nNo description available");
  });

  it("uses the alias and description when present", () => {
    const message = createAccessGrantedMessage({
      ...base,
      accountAlias: "prod",
      permissionSetDescription: "Read-only access to production",
      duration: "PT2H",
    });

    expect(blockText(message.blocks[1])).toContain("*prod* (123456789012)");
    expect(blockText(message.blocks[3])).toBe("*Permission Set Details:*\nRead-only access to production");
    expect(blockText(message.blocks.at(-1))).toBe("⏰ Access will expire in 2.0 hours");
  });

  it("normalizes seconds and encoded durations alike", () => {
    expect(fieldTexts(createAccessGrantedMessage({ ...base, duration: 90 }))[0]).toBe("*Duration:*\n1 minutes");
    expect(fieldTexts(createAccessGrantedMessage({ ...base, duration: "PT90S" }))[0]).toBe("*Duration:*\n1 minutes");
    expect(fieldTexts(createAccessGrantedMessage({ ...base, duration: 45 }))[0]).toBe("*Duration:*\n45 seconds");
  });

  it("is deterministic", () => {
    expect(createAccessGrantedMessage({ ...base, duration: 300 })).toEqual(
      createAccessGrantedMessage({ ...base, duration: 300 }),
    );
  });

  it("contains a divider", () => {
    const message = createAccessGrantedMessage({ ...base, duration: 300 });
    expect(message.blocks.filter((block) => block.type === "divider")).toHaveLength(1);
  });
});

describe("access expired and revoked messages", () => {
  it("describes an expired permission set", () => {
    const message = createAccessExpiredMessage({
      accountId: "123456789012",
      requester: "alice@example.com",
      duration: 3600,
      grant: { type: "sso", permissionSet: "ReadOnly" },
    });

    expect(blockText(message.blocks[0])).toBe("⌛ AWS Access Expired");
    expect(blockText(message.blocks[1])).toBe(
      "Your permission set *ReadOnly* in AWS account *123456789012* (123456789012) has reached the end of its 1.0 hours window.",
    );
  });

  it("describes an expired bucket grant", () => {
    const message = createAccessExpiredMessage({
      accountId: "123456789012",
      accountAlias: "data",
      requester: "alice@example.com",
      duration: "PT30M",
      grant: { type: "s3", bucketName: "reports", policyTemplate: "read-only" },
    });

    expect(message.text).toBe("AWS access expired for alice@example.com: reports on data");
    expect(fieldTexts(message)).toEqual(["*User:*\nalice@example.com", "*Duration:*\n30 minutes"]);
  });

  it("describes a revoked permission set", () => {
    const message = createAccessRevokedMessage(base);
    expect(message.text).toBe("AWS access revoked for alice@example.com: ReadOnly on 123456789012");
    expect(fieldTexts(message)).toEqual(["*User:*\nalice@example.com", "*Permission Set:*\nReadOnly"]);
  });
});

describe("bucket messages", () => {
  it("describes a bucket grant", () => {
    const message = createBucketAccessGrantedMessage({
      accountId: "123456789012",
      bucketName: "reports",
      policyTemplate: "read-write",
      requester: "alice@example.com",
      duration: 1800,
    });

    expect(message.text).toBe("S3 access granted to alice@example.com: reports (read-write) for 30 minutes");
    expect(fieldTexts(message)).toEqual([
      "*Duration:*\n30 minutes",
      "*User:*\nalice@example.com",
      "*Bucket:*\nreports",
      "*Policy Template:*\nread-write",
    ]);
    expect(blockText(message.blocks.at(-1))).toBe("⏰ Access will expire in 30 minutes");
  });

  it("describes a bucket revocation", () => {
    const message = createBucketAccessRevokedMessage({
      accountId: "123456789012",
      bucketName: "reports",
      requester: "alice@example.com",
    });

    expect(blockText(message.blocks[1])).toBe("Access to bucket *reports* in account 123456789012 has been revoked.");
  });
});
