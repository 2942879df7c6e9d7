/**
 * @module primitives/base-emitter
 * @description Typed emitter for key-lifecycle events.
 *
 * Events are announced after the keystore has already changed, so a
 * listener failure must not turn a completed operation into a rejected
 * one. Each listener runs in isolation; a throw is handed to
 * handleListenerError() and the remaining listeners still run.
 */

import type {
  ICporEmitter,
  EventListener,
} from "../interfaces/event-emitter.js";
import type {
  CporEvent,
  CporEventMap,
  CporEventType,
} from "../types/events.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cpor:events");

export class CporEmitter implements ICporEmitter {
  private readonly listeners = new Map<
    CporEventType,
    Set<EventListener<CporEventType>>
  >();

  on<T extends CporEventType>(eventType: T, listener: EventListener<T>): void {
    let set = this.listeners.get(eventType);
    if (!set) {
      set = new Set();
      this.listeners.set(eventType, set);
    }
    set.add(listener as EventListener<CporEventType>);
  }

  once<T extends CporEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    const wrapper: EventListener<T> = (event) => {
      this.off(eventType, wrapper);
      listener(event);
    };
    this.on(eventType, wrapper);
  }

  off<T extends CporEventType>(eventType: T, listener: EventListener<T>): void {
    const set = this.listeners.get(eventType);
    if (!set) {
      return;
    }
    set.delete(listener as EventListener<CporEventType>);
    if (set.size === 0) {
      this.listeners.delete(eventType);
    }
  }

  listenerCount(eventType: CporEventType): number {
    return this.listeners.get(eventType)?.size ?? 0;
  }

  emit<T extends CporEventType>(event: CporEventMap[T]): void {
    const set = this.listeners.get(event.type);
    if (!set) {
      return;
    }
    // Snapshot: once() listeners remove themselves mid-iteration.
    for (const listener of [...set]) {
      try {
        listener(event);
      } catch (error) {
        this.handleListenerError(error, event);
      }
    }
  }

  /** Called with whatever a listener threw. Default: log and carry on. */
  protected handleListenerError(error: unknown, event: CporEvent): void {
    const reason = error instanceof Error ? error.message : String(error);
    logger.error(`${event.type} listener failed: ${reason}`);
  }
}
