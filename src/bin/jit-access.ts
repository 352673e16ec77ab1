#!/usr/bin/env tsx

import { cac } from "cac";
import { intro, log, outro } from "@clack/prompts";
import { readAccessConfig } from "@infra/config";
import { logger } from "@infra/logger";
import { createAccessRuntime } from "../main";
import {
  configDiagnostics,
  createClackProgress,
  formatGrantSummary,
  formatRevokeSummary,
  grantBucketOptionsSchema,
  grantOptionsSchema,
  renderCliFailure,
  revokeBucketOptionsSchema,
  revokeOptionsSchema,
} from "./cli.utils";

const cli = cac("jit-access");

async function withCliErrors(task: () => Promise<void>): Promise<void> {
  try {
    await task();
  } catch (error) {
    logger.error({ error }, "[jit] Command failed.");
    log.error(renderCliFailure(error));
    process.exit(1);
  }
}

async function runtimeFor(options: { keepProcessAlive?: boolean } = {}) {
  const config = await readAccessConfig({ fresh: true });
  return createAccessRuntime(config, { progress: createClackProgress(), keepProcessAlive: options.keepProcessAlive });
}

cli
  .command("grant", "Grant a permission set to a user for a limited time")
  .option("--user <identity>", "User name or email")
  .option("--permission-set <name>", "Permission set name")
  .option("--duration <duration>", "Requested duration (PT<h>H<m>M<s>S)", { default: "PT1H" })
  .option("--max-duration <duration>", "Maximum allowed duration")
  .option("--wait", "Stay alive until the revocation webhook has fired")
  .action(async (options) => {
    await withCliErrors(async () => {
      const parsed = grantOptionsSchema.parse(options);
      intro("jit-access grant");
      const { config, coordinator } = await runtimeFor({ keepProcessAlive: parsed.wait });
      const outcome = await coordinator.grantAccess({
        identity: parsed.user,
        policyName: parsed.permissionSet,
        duration: parsed.duration,
        maxDuration: parsed.maxDuration ?? config.durations.defaultMaxDuration,
      });
      log.message(formatGrantSummary(outcome).join("\n"));
      if (parsed.wait && outcome.revocation) {
        log.step("Waiting for the revocation webhook");
        await coordinator.idle();
      }
      outro("Access granted");
    });
  });

cli
  .command("revoke", "Remove a permission set assignment")
  .option("--user <identity>", "User name or email")
  .option("--permission-set <name>", "Permission set name")
  .action(async (options) => {
    await withCliErrors(async () => {
      const parsed = revokeOptionsSchema.parse(options);
      intro("jit-access revoke");
      const { coordinator } = await runtimeFor();
      const outcome = await coordinator.revokeAccess({ identity: parsed.user, policyName: parsed.permissionSet });
      log.message(formatRevokeSummary(outcome).join("\n"));
      outro("Access revoked");
    });
  });

cli
  .command("grant-s3", "Grant bucket access to an IAM user for a limited time")
  .option("--user <identity>", "IAM user name or email tag")
  .option("--bucket <name>", "Bucket name")
  .option("--template <template>", "read-only, read-write or full-access", { default: "read-only" })
  .option("--duration <duration>", "Requested duration (PT<h>H<m>M<s>S)", { default: "PT1H" })
  .option("--max-duration <duration>", "Maximum allowed duration")
  .option("--wait", "Stay alive until the revocation webhook has fired")
  .action(async (options) => {
    await withCliErrors(async () => {
      const parsed = grantBucketOptionsSchema.parse(options);
      intro("jit-access grant-s3");
      const { coordinator } = await runtimeFor({ keepProcessAlive: parsed.wait });
      const outcome = await coordinator.grantBucketAccess({
        identity: parsed.user,
        bucketName: parsed.bucket,
        policyTemplate: parsed.template,
        duration: parsed.duration,
        maxDuration: parsed.maxDuration,
      });
      log.message(formatGrantSummary(outcome).join("\n"));
      if (parsed.wait && outcome.revocation) {
        log.step("Waiting for the revocation webhook");
        await coordinator.idle();
      }
      outro("Bucket access granted");
    });
  });

cli
  .command("revoke-s3", "Remove an IAM user from the JIT statements of a bucket policy")
  .option("--user <identity>", "IAM user name or email tag")
  .option("--bucket <name>", "Bucket name")
  .action(async (options) => {
    await withCliErrors(async () => {
      const parsed = revokeBucketOptionsSchema.parse(options);
      intro("jit-access revoke-s3");
      const { coordinator } = await runtimeFor();
      const outcome = await coordinator.revokeBucketAccess({ identity: parsed.user, bucketName: parsed.bucket });
      log.message(formatRevokeSummary(outcome).join("\n"));
      outro(outcome.removed ? "Bucket access revoked" : "Nothing to revoke");
    });
  });

cli.command("doctor", "Print the resolved configuration").action(async () => {
  await withCliErrors(async () => {
    const config = await readAccessConfig({ fresh: true });
    intro("jit-access doctor");
    log.message(configDiagnostics(config).join("\n"));
    outro("Configuration is valid");
  });
});

cli.help();
cli.version("0.1.0");
cli.parse();
