/**
 * @module interfaces/event-emitter
 * @description Subscription surface for CPOR key-lifecycle events.
 */

import type { CporEventMap, CporEventType } from "../types/events.js";

export type EventListener<T extends CporEventType> = (
  event: CporEventMap[T]
) => void;

/**
 * @interface ICporEmitter
 * @description Listeners are called synchronously in registration order.
 * A listener that throws does not affect the emitter or other listeners.
 */
export interface ICporEmitter {
  on<T extends CporEventType>(eventType: T, listener: EventListener<T>): void;

  /** Like on(), removed after the first delivery. */
  once<T extends CporEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void;

  off<T extends CporEventType>(eventType: T, listener: EventListener<T>): void;

  /** @query */
  listenerCount(eventType: CporEventType): number;

  emit<T extends CporEventType>(event: CporEventMap[T]): void;
}
