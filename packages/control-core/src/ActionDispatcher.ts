import type { ActionExecutor, ControlCommand, ControlError } from "./types";

export type ActionDispatcherOptions = {
  onError?: (err: ControlError) => void;
};

/**
 * Hands commands to the executor. Executor failures are reported and never
 * thrown back into the tick.
 */
export class ActionDispatcher {
  constructor(
    private readonly executor: ActionExecutor,
    private readonly options: ActionDispatcherOptions = {}
  ) {}

  dispatch(command: ControlCommand): void {
    try {
      const result = this.send(command);
      if (isThenable(result)) {
        Promise.resolve(result).catch((error: unknown) => this.report({ type: "action-failed", command, error }));
      }
    } catch (error) {
      this.report({ type: "action-failed", command, error });
    }
  }

  private send(command: ControlCommand): void | PromiseLike<void> {
    switch (command.type) {
      case "SET_VOLUME":
        return this.executor.setVolume(command.level);
      case "SCROLL":
        return this.executor.scroll(command.delta);
    }
  }

  private report(err: ControlError): void {
    this.options.onError?.(err);
    console.error("action executor failed", err);
  }
}

function isThenable(value: unknown): value is PromiseLike<void> {
  return typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";
}
