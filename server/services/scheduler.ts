import dayjs from "dayjs";
import { ConfigurationError, errorMessage } from "../domain/errors.js";

export type ScheduledTask = () => Promise<void>;

export interface ScheduledJob {
  cancel(): void;
}

export interface Scheduler {
  schedule(dailyAt: string, task: ScheduledTask): ScheduledJob;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function parseDailyAt(dailyAt: string): { hour: number; minute: number } {
  const match = /^(\d{2}):(\d{2})$/.exec(dailyAt);
  const hour = Number(match?.[1]);
  const minute = Number(match?.[2]);
  if (!match || hour > 23 || minute > 59) {
    throw new ConfigurationError(`Invalid daily schedule "${dailyAt}", expected HH:mm`);
  }
  return { hour, minute };
}

export function nextDailyRun(dailyAt: string, from: Date): Date {
  const { hour, minute } = parseDailyAt(dailyAt);
  const today = dayjs(from).hour(hour).minute(minute).second(0).millisecond(0);
  return (today.isAfter(from) ? today : today.add(1, "day")).toDate();
}

async function runTask(task: ScheduledTask): Promise<void> {
  try {
    await task();
  } catch (error) {
    console.error(`[scheduler] Scheduled run failed, retrying at the next slot: ${errorMessage(error)}`);
  }
}

/** Fires once a day at a local wall-clock time, re-arming after every run. */
export class DailyScheduler implements Scheduler {
  constructor(private readonly now: () => Date = () => new Date()) {}

  schedule(dailyAt: string, task: ScheduledTask): ScheduledJob {
    parseDailyAt(dailyAt);
    let timer: NodeJS.Timeout | undefined;
    let cancelled = false;

    const arm = () => {
      if (cancelled) return;
      const current = this.now();
      const delay = nextDailyRun(dailyAt, current).getTime() - current.getTime();
      console.info(`[scheduler] Next crawl at ${dayjs(current).add(delay, "ms").format("YYYY-MM-DD HH:mm")}`);
      timer = setTimeout(() => {
        void runTask(task).then(arm);
      }, delay);
      timer.unref();
    };

    arm();
    return {
      cancel: () => {
        cancelled = true;
        if (timer) clearTimeout(timer);
      }
    };
  }
}

/** Fires every `intervalMs` regardless of wall-clock time. */
export class IntervalScheduler implements Scheduler {
  constructor(private readonly intervalMs: number = DAY_MS) {}

  schedule(_dailyAt: string, task: ScheduledTask): ScheduledJob {
    let running = false;
    const timer = setInterval(() => {
      if (running) return;
      running = true;
      void runTask(task).then(() => {
        running = false;
      });
    }, this.intervalMs);
    timer.unref();
    return { cancel: () => clearInterval(timer) };
  }
}

export function createScheduler(kind: "daily" | "interval"): Scheduler {
  return kind === "daily" ? new DailyScheduler() : new IntervalScheduler();
}
