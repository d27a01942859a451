import { EventEmitter } from "events";

import { printLog } from "../log";

/**
 * EventEmitter keyed by an event map, one payload object per event
 *
 * Events are emitted after the state change they describe is committed, so a
 * listener cannot undo or fail it: each listener runs on its own and a
 * throwing one is logged under `scope` while the others still run.
 */
export class TypedEvents<Events extends Record<string, unknown>> {
  private readonly emitter = new EventEmitter();

  /**
   * @param scope - Log scope for listener failures (eg. the nebula name)
   */
  constructor(private readonly scope: string) {}

  on<E extends keyof Events & string>(
    event: E,
    listener: (payload: Events[E]) => void,
  ): void {
    this.emitter.on(event, listener);
  }

  off<E extends keyof Events & string>(
    event: E,
    listener: (payload: Events[E]) => void,
  ): void {
    this.emitter.off(event, listener);
  }

  emit<E extends keyof Events & string>(event: E, payload: Events[E]): void {
    for (const listener of this.emitter.listeners(event)) {
      try {
        listener(payload);
      } catch (error) {
        printLog(
          this.scope,
          `${event} listener failed: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
  }
}
