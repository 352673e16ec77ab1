import { FormatError } from "../errors";
import { BUCKET_POLICY_TEMPLATES, BUCKET_POLICY_VERSION, JIT_STATEMENT_SID_PREFIX } from "./bucket-policy.consts";
import { bucketPolicyTemplateSchema } from "./bucket-policy.schema";
import type { BucketPolicyDocument, BucketPolicyStatement, BucketPolicyTemplate } from "./bucket-policy.types";

export function parseBucketPolicyTemplate(value: string): BucketPolicyTemplate {
  const parsed = bucketPolicyTemplateSchema.safeParse(value.trim().toLowerCase());
  if (!parsed.success) {
    throw new FormatError(`Unknown bucket policy template (use ${bucketPolicyTemplateSchema.options.join(", ")})`, value);
  }
  return parsed.data;
}

export function emptyBucketPolicy(): BucketPolicyDocument {
  return { Version: BUCKET_POLICY_VERSION, Statement: [] };
}

export function bucketResources(bucketName: string): string[] {
  return [`arn:aws:s3:::${bucketName}`, `arn:aws:s3:::${bucketName}/*`];
}

function awsPrincipals(statement: BucketPolicyStatement): string[] {
  const principal = statement.Principal;
  if (!principal || principal === "*") {
    return [];
  }
  const aws = principal.AWS;
  if (aws === undefined) {
    return [];
  }
  return Array.isArray(aws) ? aws : [aws];
}

function isJitStatement(statement: BucketPolicyStatement): boolean {
  return statement.Sid?.startsWith(JIT_STATEMENT_SID_PREFIX) ?? false;
}

export function addPrincipalToBucketPolicy(
  document: BucketPolicyDocument,
  input: { bucketName: string; principalArn: string; template: BucketPolicyTemplate },
): BucketPolicyDocument {
  const template = BUCKET_POLICY_TEMPLATES[input.template];
  const existing = document.Statement.find((statement) => statement.Sid === template.sid);

  if (!existing) {
    return {
      ...document,
      Statement: [
        ...document.Statement,
        {
          Sid: template.sid,
          Effect: "Allow",
          Principal: { AWS: [input.principalArn] },
          Action: [...template.actions],
          Resource: bucketResources(input.bucketName),
        },
      ],
    };
  }

  const principals = awsPrincipals(existing);
  if (principals.includes(input.principalArn)) {
    return document;
  }

  return {
    ...document,
    Statement: document.Statement.map((statement) =>
      statement === existing
        ? { ...statement, Principal: { AWS: [...principals, input.principalArn] } }
        : statement,
    ),
  };
}

export function removePrincipalFromBucketPolicy(
  document: BucketPolicyDocument,
  principalArn: string,
): { document: BucketPolicyDocument; removed: boolean } {
  let removed = false;
  const statements: BucketPolicyStatement[] = [];

  for (const statement of document.Statement) {
    if (!isJitStatement(statement)) {
      statements.push(statement);
      continue;
    }
    const principals = awsPrincipals(statement);
    const remaining = principals.filter((arn) => arn !== principalArn);
    if (remaining.length === principals.length) {
      statements.push(statement);
      continue;
    }
    removed = true;
    if (remaining.length > 0) {
      statements.push({ ...statement, Principal: { AWS: remaining } });
    }
  }

  return { document: { ...document, Statement: statements }, removed };
}
