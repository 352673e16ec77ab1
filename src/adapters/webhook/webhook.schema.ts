import { z } from "zod";

const policyDetailsSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("sso"), name: z.string(), arn: z.string(), description: z.string().optional() }),
  z.object({ type: z.literal("s3"), name: z.string(), template: z.string() }),
]);

export const revocationWebhookPayloadSchema = z.object({
  event: z.literal("access.expired"),
  identity: z.string().min(1),
  accessType: z.enum(["sso", "s3"]),
  policyDetails: policyDetailsSchema,
  durationSeconds: z.number().int().nonnegative(),
  accountId: z.string().regex(/^\d{12}$/),
  permissionSet: z.string().optional(),
  buckets: z.array(z.string()).optional(),
  grantedAt: z.string(),
  expiresAt: z.string(),
});
