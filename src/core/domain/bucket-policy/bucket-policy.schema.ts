import { z } from "zod";

export const bucketPolicyTemplateSchema = z.enum(["read-only", "read-write", "full-access"]);

const stringOrListSchema = z.union([z.string(), z.array(z.string())]);

export const bucketPolicyStatementSchema = z
  .object({
    Sid: z.string().optional(),
    Effect: z.enum(["Allow", "Deny"]),
    Principal: z.union([z.literal("*"), z.object({ AWS: stringOrListSchema.optional() }).passthrough()]).optional(),
    Action: stringOrListSchema.optional(),
    Resource: stringOrListSchema.optional(),
  })
  .passthrough();

export const bucketPolicyDocumentSchema = z.object({
  Version: z.string(),
  Id: z.string().optional(),
  Statement: z.array(bucketPolicyStatementSchema),
});
