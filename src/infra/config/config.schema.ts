import { z } from "zod";
import { isValidDuration } from "@core/domain/duration/duration.utils";

export const identityBackendSchema = z.enum(["identity-center", "iam"]);

const durationSchema = z.string().refine(isValidDuration, {
  message: "Expected an ISO 8601 duration such as PT1H or PT30M",
});

export const userConfigSchema = z
  .object({
    accountId: z.union([z.string(), z.number()]).optional(),
    aws: z
      .object({
        profile: z.string().optional(),
        region: z.string().optional(),
        instanceArn: z.string().optional(),
      })
      .optional(),
    identityBackends: z.union([z.array(z.string()), z.string()]).optional(),
    durations: z.object({ defaultMaxDuration: z.string().optional() }).optional(),
    revocation: z
      .object({
        webhookUrl: z.string().optional(),
        timeoutMs: z.number().int().positive().optional(),
      })
      .optional(),
    slack: z
      .object({
        enabled: z.boolean().optional(),
        token: z.string().optional(),
        channel: z.string().optional(),
        notifyRequester: z.boolean().optional(),
      })
      .optional(),
  })
  .passthrough();

export const mergedConfigSchema = z.object({
  accountId: z.string().regex(/^\d{12}$/, "Expected a 12-digit AWS account id (set AWS_ACCOUNT_ID)"),
  aws: z.object({
    profile: z.string().optional(),
    region: z.string().optional(),
    instanceArn: z.string().optional(),
  }),
  identityBackends: z.array(identityBackendSchema).min(1),
  durations: z.object({
    defaultMaxDuration: durationSchema,
  }),
  revocation: z.object({
    webhookUrl: z.union([z.literal(""), z.string().url()]),
    timeoutMs: z.number().int().positive(),
  }),
  slack: z.object({
    enabled: z.boolean().optional(),
    token: z.string(),
    channel: z.string(),
    notifyRequester: z.boolean(),
  }),
});

export type MergedConfigInput = z.infer<typeof mergedConfigSchema>;
