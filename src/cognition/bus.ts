import { EventEmitter } from "node:events";
import type { CognitionEvent } from "./types.js";

type EventType = CognitionEvent["type"];
type EventOfType<T extends EventType> = Extract<CognitionEvent, { type: T }>;
type Handler<T extends EventType> = (event: EventOfType<T>) => void;

/**
 * Typed, synchronous event bus for engine notifications. Listeners run
 * inside the engine's critical section and must not call back into it.
 */
export class CognitionBus {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  emit<T extends EventType>(event: EventOfType<T>): void {
    this.emitter.emit(event.type, event);
  }

  on<T extends EventType>(type: T, handler: Handler<T>): void {
    this.emitter.on(type, handler);
  }

  off<T extends EventType>(type: T, handler: Handler<T>): void {
    this.emitter.off(type, handler);
  }

  dispose(): void {
    this.emitter.removeAllListeners();
  }
}
