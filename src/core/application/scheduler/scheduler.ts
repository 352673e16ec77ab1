import { randomUUID } from "node:crypto";
import type { Clock } from "@core/ports/clock.types";
import { logger } from "@infra/logger";
import type { DelayedTaskHandler, DelayedTaskScheduler, SchedulerFactory, ScheduledTask } from "./scheduler.types";

/**
 * Process-local scheduler. Tasks live only as long as the process does and
 * cannot be cancelled once scheduled.
 */
export function createInMemoryScheduler<TPayload>(input: {
  clock: Clock;
  handler: DelayedTaskHandler<TPayload>;
}): DelayedTaskScheduler<TPayload> {
  const { clock, handler } = input;
  const pending = new Map<string, Promise<void>>();

  const run = async (id: string, runAtUnixSeconds: number, payload: TPayload) => {
    await clock.sleepUntil(runAtUnixSeconds);
    logger.debug({ taskId: id, runAtUnixSeconds }, "[jit] Running scheduled task.");
    await handler(payload, { id, runAtUnixSeconds });
  };

  return {
    schedule(runAtUnixSeconds, payload) {
      const id = randomUUID();
      const done = run(id, runAtUnixSeconds, payload)
        .catch((error: unknown) => {
          logger.error({ error, taskId: id }, "[jit] Scheduled task failed.");
        })
        .finally(() => {
          pending.delete(id);
        });
      pending.set(id, done);
      logger.info({ taskId: id, runAtUnixSeconds }, "[jit] Task scheduled.");
      const task: ScheduledTask<TPayload> = { id, runAtUnixSeconds, payload, done };
      return task;
    },
    pendingCount() {
      return pending.size;
    },
    async idle() {
      while (pending.size > 0) {
        await Promise.all([...pending.values()]);
      }
    },
  };
}

export const inMemorySchedulerFactory: SchedulerFactory = createInMemoryScheduler;

export type { DelayedTaskHandler, DelayedTaskScheduler, SchedulerFactory, ScheduledTask } from "./scheduler.types";
