import { logger } from "./logger";

export type TaskOutcome<T> =
  | { status: "completed"; value: T }
  | { status: "failed"; error: unknown }
  | { status: "discarded"; value: T | undefined };

export type TaskScope = {
  readonly disposed: boolean;
  run: <T>(task: (signal: AbortSignal) => Promise<T>) => Promise<TaskOutcome<T>>;
  dispose: () => void;
};

/**
 * Ties async work to the lifetime of a screen. After `dispose` the signal is
 * aborted and every pending or later `run` resolves as `discarded`, so callers
 * only touch screen state on `completed` or `failed`. A discarded outcome still
 * carries the value when the task finished, for compensating work such as refunds.
 */
export const createTaskScope = (): TaskScope => {
  const controller = new AbortController();

  return {
    get disposed() {
      return controller.signal.aborted;
    },
    run: async <T>(task: (signal: AbortSignal) => Promise<T>): Promise<TaskOutcome<T>> => {
      if (controller.signal.aborted) {
        return { status: "discarded", value: undefined };
      }

      try {
        const value = await task(controller.signal);
        if (controller.signal.aborted) {
          return { status: "discarded", value };
        }
        return { status: "completed", value };
      } catch (error) {
        if (controller.signal.aborted) {
          logger.debug("task_failed_after_dispose", { error });
          return { status: "discarded", value: undefined };
        }
        return { status: "failed", error };
      }
    },
    dispose: () => {
      controller.abort();
    }
  };
};
