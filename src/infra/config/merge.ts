import { z } from "zod";
import { createDefu } from "defu";
import { loadConfig } from "c12";
import { ConfigError } from "@core/domain/errors";
import { DEFAULT_MAX_DURATION } from "@core/domain/duration/duration.consts";
import { mergedConfigSchema, type MergedConfigInput, userConfigSchema } from "./config.schema";
import type { AccessConfig } from "./config.types";
import { fromEnv, loadEnvFiles } from "./env";
import { globalConfigDir } from "./paths";
import { parseList, toFriendlyZodError } from "./validation";

type LooseInput = Record<string, unknown>;

let cachedConfig: AccessConfig | undefined;

// Lists replace lower layers instead of concatenating with them.
const mergeLayers = createDefu((object, key, value) => {
  if (Array.isArray(object[key]) && Array.isArray(value)) {
    object[key] = value;
    return true;
  }
});

function defaultsInput(): MergedConfigInput {
  return {
    accountId: "",
    aws: {},
    identityBackends: ["identity-center", "iam"],
    durations: {
      defaultMaxDuration: DEFAULT_MAX_DURATION,
    },
    revocation: {
      webhookUrl: "",
      timeoutMs: 10_000,
    },
    slack: {
      token: "",
      channel: "",
      notifyRequester: true,
    },
  };
}

function fromUserConfig(raw: unknown): LooseInput {
  const parsed = userConfigSchema.parse(raw ?? {});
  return {
    accountId: parsed.accountId === undefined ? undefined : String(parsed.accountId).trim() || undefined,
    aws: {
      profile: parsed.aws?.profile?.trim() || undefined,
      region: parsed.aws?.region?.trim() || undefined,
      instanceArn: parsed.aws?.instanceArn?.trim() || undefined,
    },
    identityBackends: parseList(parsed.identityBackends),
    durations: {
      defaultMaxDuration: parsed.durations?.defaultMaxDuration?.trim() || undefined,
    },
    revocation: {
      webhookUrl: parsed.revocation?.webhookUrl?.trim() || undefined,
      timeoutMs: parsed.revocation?.timeoutMs,
    },
    slack: {
      enabled: parsed.slack?.enabled,
      token: parsed.slack?.token?.trim() || undefined,
      channel: parsed.slack?.channel?.trim() || undefined,
      notifyRequester: parsed.slack?.notifyRequester,
    },
  };
}

export function buildAccessConfig(input: LooseInput): AccessConfig {
  let merged: MergedConfigInput;
  try {
    merged = mergedConfigSchema.parse(mergeLayers(input, defaultsInput()));
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new ConfigError(toFriendlyZodError(error));
    }
    throw error;
  }

  const slackEnabled = merged.slack.enabled ?? merged.slack.token.length > 0;
  if (slackEnabled && !merged.slack.token) {
    throw new ConfigError("Slack notifications are enabled but the token is missing. Set slack.token or SLACK_BOT_TOKEN.", "slack.token");
  }

  return {
    accountId: merged.accountId,
    aws: {
      ...(merged.aws.profile ? { profile: merged.aws.profile } : {}),
      ...(merged.aws.region ? { region: merged.aws.region } : {}),
      ...(merged.aws.instanceArn ? { instanceArn: merged.aws.instanceArn } : {}),
    },
    identityBackends: [...new Set(merged.identityBackends)],
    durations: merged.durations,
    revocation: {
      ...(merged.revocation.webhookUrl ? { webhookUrl: merged.revocation.webhookUrl } : {}),
      timeoutMs: merged.revocation.timeoutMs,
    },
    slack: {
      enabled: slackEnabled,
      token: merged.slack.token,
      channel: merged.slack.channel,
      notifyRequester: merged.slack.notifyRequester,
    },
  };
}

export function resetAccessConfigCache(): void {
  cachedConfig = undefined;
}

export async function readAccessConfig(options?: {
  fresh?: boolean;
  loadEnvFiles?: boolean;
  cwd?: string;
  overrides?: LooseInput;
}): Promise<AccessConfig> {
  if (!options?.fresh && !options?.overrides && cachedConfig) {
    return cachedConfig;
  }

  const cwd = options?.cwd ?? process.cwd();
  if (options?.loadEnvFiles !== false) {
    loadEnvFiles({ cwd });
  }

  try {
    const loadLocal = await loadConfig({ name: "jit-access", dotenv: false, defaults: {}, cwd });
    const loadGlobal = await loadConfig({ name: "jit-access", dotenv: false, defaults: {}, cwd: globalConfigDir() });

    const merged = mergeLayers(
      options?.overrides ?? {},
      fromEnv(),
      fromUserConfig(loadLocal.config),
      fromUserConfig(loadGlobal.config),
    );

    const config = buildAccessConfig(merged);
    cachedConfig = config;
    return config;
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    if (error instanceof z.ZodError) {
      throw new ConfigError(toFriendlyZodError(error));
    }
    if (error instanceof Error) {
      throw new ConfigError(`Failed to load jit-access config: ${error.message}`);
    }
    throw error;
  }
}
