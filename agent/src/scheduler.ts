import { errorMessage } from "./errors.js";
import type { Logger } from "./types.js";

/** Calls `callback` every `ms` until the returned function is called. */
export type Every = (ms: number, callback: () => void) => () => void;

export const systemEvery: Every = (ms, callback) => {
  const handle = setInterval(callback, ms);
  return () => clearInterval(handle);
};

export interface SchedulerOptions {
  weatherCheckIntervalMs: number;
  notificationIntervalMs: number;
  runWeatherCheck: () => Promise<unknown>;
  runNotifications: () => Promise<unknown>;
  every?: Every;
  logger?: Logger;
}

export interface SchedulerHandle {
  /** Settles after the startup weather check and notification tick. */
  ready: Promise<void>;
  stop(): void;
}

// Wraps a tick so it never rejects and never overlaps itself.
function singleFlight(name: string, task: () => Promise<unknown>, isStopped: () => boolean, logger: Logger) {
  let running = false;
  return async (): Promise<void> => {
    if (isStopped()) return;
    if (running) {
      logger.warn(`[Agent] Previous ${name} still running — skipping this tick`);
      return;
    }
    running = true;
    try {
      await task();
    } catch (err) {
      logger.error(`[Agent] ${name} failed: ${errorMessage(err)}`);
    } finally {
      running = false;
    }
  };
}

/**
 * Runs the weather check immediately, then the notification tick, and
 * repeats each on its own interval. Nothing is persisted: a restart fires
 * the weather check again straight away.
 */
export function startScheduler(options: SchedulerOptions): SchedulerHandle {
  const every = options.every ?? systemEvery;
  const logger = options.logger ?? console;
  let stopped = false;
  const isStopped = () => stopped;

  const weatherTick = singleFlight("weather check", options.runWeatherCheck, isStopped, logger);
  const notificationTick = singleFlight("notification tick", options.runNotifications, isStopped, logger);

  const ready = weatherTick().then(notificationTick);

  const cancelWeather = every(options.weatherCheckIntervalMs, () => {
    void weatherTick();
  });
  const cancelNotifications = every(options.notificationIntervalMs, () => {
    void notificationTick();
  });

  return {
    ready,
    stop() {
      stopped = true;
      cancelWeather();
      cancelNotifications();
    },
  };
}
