import { setTimeout as sleep } from "node:timers/promises";
import { EventEmitter } from "eventemitter3";
import { isPendingStatus, type InferenceGateway, type ResponseSnapshot } from "../llm/types.js";

export const DEFAULT_POLL_INTERVAL_MS = 1_000;

/**
 * Emitted after each wait, just before the response is fetched again.
 */
export interface PollTick {
  /** 1-based count of polls for this response */
  polls: number;
  responseId: string;
  /** Status seen before this poll */
  status: string;
}

export interface BackgroundResponsePollerOptions {
  intervalMs?: number;
}

/**
 * Waits for a background response to leave the queued/in_progress states by
 * re-fetching it at a fixed interval. The remote job is never modified.
 */
export class BackgroundResponsePoller {
  private readonly gateway: Pick<InferenceGateway, "retrieveResponse">;
  private readonly emitter = new EventEmitter();
  private readonly intervalMs: number;

  constructor(
    gateway: Pick<InferenceGateway, "retrieveResponse">,
    options: BackgroundResponsePollerOptions = {},
  ) {
    this.gateway = gateway;
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  /**
   * Poll until the response reaches a terminal status and return that snapshot.
   * Rejects with an AbortError when the signal fires during a wait.
   */
  async waitForCompletion(initial: ResponseSnapshot, signal?: AbortSignal): Promise<ResponseSnapshot> {
    let current = initial;
    let polls = 0;

    while (isPendingStatus(current.status)) {
      await sleep(this.intervalMs, undefined, { signal });
      polls += 1;
      this.emitter.emit("poll", { polls, responseId: initial.id, status: current.status });
      current = await this.gateway.retrieveResponse(initial.id, signal);
    }

    this.emitter.emit("settled", current);
    return current;
  }

  /**
   * Subscribe to poller events. Returns an unsubscribe function.
   */
  on(event: "poll", listener: (tick: PollTick) => void): () => void;
  on(event: "settled", listener: (response: ResponseSnapshot) => void): () => void;
  on(
    event: "poll" | "settled",
    listener: ((tick: PollTick) => void) | ((response: ResponseSnapshot) => void),
  ): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }
}
