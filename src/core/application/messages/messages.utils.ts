import { describeDuration } from "@core/domain/duration/duration.utils";
import type {
  ContextBlock,
  DividerBlock,
  HeaderBlock,
  MessageDocument,
  MrkdwnTextObject,
  SectionBlock,
} from "@core/domain/message.types";
import { CONSOLE_SWITCH_ROLE_URL, MISSING_DESCRIPTION, SDK_SNIPPET } from "./messages.consts";
import type {
  AccessExpiredMessageInput,
  AccessMessageInput,
  AccessRevokedMessageInput,
  BucketMessageInput,
  BucketRevokedMessageInput,
} from "./messages.types";

function mrkdwn(text: string): MrkdwnTextObject {
  return { type: "mrkdwn", text };
}

function header(text: string): HeaderBlock {
  return { type: "header", text: { type: "plain_text", text, emoji: true } };
}

function section(text: string): SectionBlock {
  return { type: "section", text: mrkdwn(text) };
}

function fields(pairs: Array<[label: string, value: string]>): SectionBlock {
  return {
    type: "section",
    fields: pairs.map(([label, value]) => mrkdwn(`*${label}:*\n${value}`)),
  };
}

function context(text: string): ContextBlock {
  return { type: "context", elements: [mrkdwn(text)] };
}

const divider: DividerBlock = { type: "divider" };

function switchRoleUrl(accountId: string): string {
  return `${CONSOLE_SWITCH_ROLE_URL}?account=${encodeURIComponent(accountId)}`;
}

function accountLabel(accountId: string, accountAlias: string | undefined): string {
  return `*${accountAlias || accountId}* (${accountId})`;
}

export function createAccessGrantedMessage(input: AccessMessageInput): MessageDocument {
  const duration = describeDuration(input.duration);
  const account = accountLabel(input.accountId, input.accountAlias);

  return {
    text: `AWS access granted to ${input.requester}: ${input.permissionSet} on ${input.accountAlias || input.accountId} for ${duration}`,
    blocks: [
      header("🎉 AWS Access Granted! 🎉"),
      section(`You've been granted access to AWS account ${account} with permission set *${input.permissionSet}*`),
      fields([
        ["Duration", duration],
        ["User", input.requester],
      ]),
      section(`*Permission Set Details:*\n${input.permissionSetDescription || MISSING_DESCRIPTION}`),
      divider,
      section("*How to Access AWS:*"),
      section(
        [
          "*🌐 Web Console Access*",
          `1. Visit: <${switchRoleUrl(input.accountId)}|AWS Console>`,
          "2. Sign in with your SSO credentials",
          `3. Select account ${account}`,
          `4. Choose the *${input.permissionSet}* role`,
        ].join("\n"),
      ),
      section(
        [
          "*💻 AWS CLI Access*",
          "1. Configure AWS CLI SSO:",
          `\`\`\`aws configure sso\nAccount ID: ${input.accountId}\nRole name: ${input.permissionSet}\nCLI profile name: [choose-a-name]\`\`\``,
          "2. Login and get credentials:",
          "```aws sso login```",
          "3. Test your access:",
          "```aws sts get-caller-identity```",
        ].join("\n"),
      ),
      section(SDK_SNIPPET),
      context(`⏰ Access will expire in ${duration}`),
    ],
  };
}

export function createAccessExpiredMessage(input: AccessExpiredMessageInput): MessageDocument {
  const duration = describeDuration(input.duration);
  const target = input.grant.type === "sso"
    ? { label: `permission set *${input.grant.permissionSet}*`, name: input.grant.permissionSet }
    : { label: `*${input.grant.policyTemplate}* access to bucket *${input.grant.bucketName}*`, name: input.grant.bucketName };

  return {
    text: `AWS access expired for ${input.requester}: ${target.name} on ${input.accountAlias || input.accountId}`,
    blocks: [
      header("⌛ AWS Access Expired"),
      section(
        `Your ${target.label} in AWS account ${accountLabel(input.accountId, input.accountAlias)} has reached the end of its ${duration} window.`,
      ),
      fields([
        ["User", input.requester],
        ["Duration", duration],
      ]),
      divider,
      context("🔁 Request access again if you still need it."),
    ],
  };
}

export function createAccessRevokedMessage(input: AccessRevokedMessageInput): MessageDocument {
  return {
    text: `AWS access revoked for ${input.requester}: ${input.permissionSet} on ${input.accountAlias || input.accountId}`,
    blocks: [
      header("🔒 AWS Access Revoked"),
      section(
        `Access to AWS account ${accountLabel(input.accountId, input.accountAlias)} with permission set *${input.permissionSet}* has been revoked.`,
      ),
      fields([
        ["User", input.requester],
        ["Permission Set", input.permissionSet],
      ]),
      divider,
      context("🔁 Request access again if you still need it."),
    ],
  };
}

export function createBucketAccessGrantedMessage(input: BucketMessageInput): MessageDocument {
  const duration = describeDuration(input.duration);

  return {
    text: `S3 access granted to ${input.requester}: ${input.bucketName} (${input.policyTemplate}) for ${duration}`,
    blocks: [
      header("🪣 S3 Bucket Access Granted!"),
      section(`You've been granted *${input.policyTemplate}* access to bucket *${input.bucketName}* in account ${input.accountId}`),
      fields([
        ["Duration", duration],
        ["User", input.requester],
        ["Bucket", input.bucketName],
        ["Policy Template", input.policyTemplate],
      ]),
      divider,
      section(
        [
          "*💻 AWS CLI Access*",
          `\`\`\`aws s3 ls s3://${input.bucketName}/\`\`\``,
        ].join("\n"),
      ),
      context(`⏰ Access will expire in ${duration}`),
    ],
  };
}

export function createBucketAccessRevokedMessage(input: BucketRevokedMessageInput): MessageDocument {
  return {
    text: `S3 access revoked for ${input.requester}: ${input.bucketName}`,
    blocks: [
      header("🔒 S3 Bucket Access Revoked"),
      section(`Access to bucket *${input.bucketName}* in account ${input.accountId} has been revoked.`),
      fields([
        ["User", input.requester],
        ["Bucket", input.bucketName],
      ]),
      divider,
      context("🔁 Request access again if you still need it."),
    ],
  };
}
