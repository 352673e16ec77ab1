import type { Clock } from "@core/ports/clock.types";

export type ScheduledTask<TPayload> = {
  id: string;
  runAtUnixSeconds: number;
  payload: TPayload;
  /** Settles after the handler ran; never rejects. */
  done: Promise<void>;
};

export type DelayedTaskScheduler<TPayload> = {
  schedule: (runAtUnixSeconds: number, payload: TPayload) => ScheduledTask<TPayload>;
  pendingCount: () => number;
  idle: () => Promise<void>;
};

export type DelayedTaskHandler<TPayload> = (payload: TPayload, task: { id: string; runAtUnixSeconds: number }) => Promise<void>;

export type SchedulerFactory = <TPayload>(input: {
  clock: Clock;
  handler: DelayedTaskHandler<TPayload>;
}) => DelayedTaskScheduler<TPayload>;
