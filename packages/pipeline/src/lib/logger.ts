import pino from "pino";
import type { Job } from "bullmq";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  // Log drains add their own timestamp and host. Keep records minimal.
  base: undefined,
});

export type Logger = pino.Logger;

export function createLogger(component: string): Logger {
  return logger.child({ component });
}

export function createJobLogger(job: Job): Logger {
  return logger.child({ jobId: job.id, jobName: job.name, queue: job.queueName });
}
