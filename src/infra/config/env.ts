import { resolve } from "node:path";
import { config as loadDotenv } from "dotenv";
import { parseFlag, parseList, parseNumber } from "./validation";
import { homeDir } from "./paths";

type LooseInput = Record<string, unknown>;

export function loadEnvFiles(options?: { override?: boolean; cwd?: string }): void {
  const override = options?.override ?? false;
  const cwd = options?.cwd ?? process.cwd();

  const candidates = [
    process.env.JIT_ENV_PATH,
    resolve(homeDir(), ".config", "jit-access", ".env"),
    resolve(cwd, ".env"),
  ].filter((value): value is string => Boolean(value));

  for (const path of candidates) {
    loadDotenv({ path, override });
  }
}

export function fromEnv(env: NodeJS.ProcessEnv = process.env): LooseInput {
  return {
    accountId: env.AWS_ACCOUNT_ID?.trim() || undefined,
    aws: {
      profile: env.AWS_PROFILE?.trim() || undefined,
      region: env.AWS_REGION?.trim() || env.AWS_DEFAULT_REGION?.trim() || undefined,
      instanceArn: env.JIT_SSO_INSTANCE_ARN?.trim() || undefined,
    },
    identityBackends: parseList(env.JIT_IDENTITY_BACKENDS),
    durations: {
      defaultMaxDuration: env.JIT_DEFAULT_MAX_DURATION?.trim() || undefined,
    },
    revocation: {
      webhookUrl: env.REVOCATION_WEBHOOK_URL?.trim() || env.REVOKATION_WEBHOOK_URL?.trim() || undefined,
      timeoutMs: parseNumber(env.JIT_WEBHOOK_TIMEOUT_MS),
    },
    slack: {
      token: env.SLACK_BOT_TOKEN?.trim() || undefined,
      channel: env.SLACK_CHANNEL?.trim() || undefined,
      notifyRequester: parseFlag(env.JIT_NOTIFY_REQUESTER),
    },
  };
}
