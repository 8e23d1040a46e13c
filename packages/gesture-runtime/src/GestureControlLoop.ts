import { ActionDispatcher } from "@palmctl/control-core";
import type { ActionExecutor, ControlCommand, ControlError } from "@palmctl/control-core";
import { GestureEngine } from "@palmctl/gesture-core";
import type { GestureDebugState, GestureEngineOptions, HandFrame } from "@palmctl/gesture-core";
import { LatestFrameSlot } from "./LatestFrameSlot";

export type GestureDebugFrame = {
  timestamp: number;
  handCount: number;
  debugState: GestureDebugState;
  commands: ControlCommand[];
  timings: { updateMs: number };
  dropped: number;
};

export type GestureControlLoopOptions = {
  executor: ActionExecutor;
  fps?: number;
  gestureOptions?: GestureEngineOptions;
  onError?: (err: ControlError) => void;
  onDebugFrame?: (frame: GestureDebugFrame) => void;
};

const DEFAULT_FPS = 60;

export class GestureControlLoop {
  private readonly engine: GestureEngine;
  private readonly dispatcher: ActionDispatcher;
  private readonly slot = new LatestFrameSlot<HandFrame>();
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly options: GestureControlLoopOptions) {
    this.engine = new GestureEngine(options.gestureOptions);
    this.dispatcher = new ActionDispatcher(options.executor, { onError: options.onError });
  }

  /** Called by the capture side; the most recent frame wins. */
  push(frame: HandFrame): void {
    this.slot.offer(frame);
  }

  /**
   * Processes the latest pending frame, if any. Returns whether a frame was
   * processed.
   */
  tick(): boolean {
    const frame = this.slot.take();
    if (!frame) return false;

    try {
      const updateStart = performance.now();
      const commands = this.engine.update(frame);
      const updateMs = performance.now() - updateStart;

      for (const command of commands) {
        this.dispatcher.dispatch(command);
      }

      this.options.onDebugFrame?.({
        timestamp: frame.timestamp,
        handCount: frame.hands.length,
        debugState: this.engine.getDebugState(),
        commands,
        timings: { updateMs },
        dropped: this.slot.dropped,
      });
    } catch (error) {
      this.handleError({ type: "tick-failed", error });
    }
    return true;
  }

  start(): void {
    if (this.timer !== null) return;
    const fps = this.options.fps ?? DEFAULT_FPS;
    this.timer = setInterval(() => this.tick(), 1000 / fps);
  }

  stop(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getDebugState(): GestureDebugState {
    return this.engine.getDebugState();
  }

  private handleError(err: ControlError): void {
    this.options.onError?.(err);
    console.error(err);
  }
}
