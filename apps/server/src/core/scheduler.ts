import { errorMessage, type Logger } from './logger';

export type ScheduledTask = {
  name: string;
  start: () => void;
  stop: () => void;
  runOnce: () => Promise<boolean>;
  isRunning: () => boolean;
};

type ScheduledTaskOptions = {
  name: string;
  intervalMs: number;
  run: () => Promise<void> | void;
  logger: Logger;
};

/**
 * A periodic job owned by the process lifecycle. Ticks never overlap: a tick
 * that fires while the previous one is still running is skipped.
 */
export const createScheduledTask = (options: ScheduledTaskOptions): ScheduledTask => {
  const { name, logger } = options;
  let timer: ReturnType<typeof setInterval> | undefined;
  let inFlight = false;

  const runOnce = async (): Promise<boolean> => {
    if (inFlight) return false;
    inFlight = true;
    try {
      await options.run();
      return true;
    } catch (error) {
      logger.error(
        { event: 'scheduled_task_failed', task: name, errorMessage: errorMessage(error) },
        'Scheduled task failed'
      );
      return false;
    } finally {
      inFlight = false;
    }
  };

  return {
    name,
    start: () => {
      if (timer) return;
      timer = setInterval(() => {
        void runOnce();
      }, options.intervalMs);
      timer.unref();
    },
    stop: () => {
      if (!timer) return;
      clearInterval(timer);
      timer = undefined;
    },
    runOnce,
    isRunning: () => timer !== undefined,
  };
};
