export const MISSING_DESCRIPTION = "No description available";

export const SDK_SNIPPET = [
  "*🔧 AWS SDK Configuration (Node.js)*",
  "```import { S3Client } from \"@aws-sdk/client-s3\";",
  "const s3 = new S3Client({ profile: \"[your-sso-profile]\" });",
  "// The client resolves your SSO credentials from the profile```",
].join("\n");

export const CONSOLE_SWITCH_ROLE_URL = "https://signin.aws.amazon.com/switchrole";
