import { EventEmitter } from "node:events";

/** Event name -> listener argument tuple. Declare maps with `type`, not `interface`. */
export type EventMap = { [event: string]: unknown[] };

export type Listener<Args extends unknown[]> = (...args: Args) => void;

export class TypedEventEmitter<T extends EventMap> {
  private readonly emitter = new EventEmitter();

  on<K extends keyof T & string>(event: K, listener: Listener<T[K]>): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends keyof T & string>(event: K, listener: Listener<T[K]>): this {
    this.emitter.off(event, listener);
    return this;
  }

  emit<K extends keyof T & string>(event: K, ...args: T[K]): boolean {
    return this.emitter.emit(event, ...args);
  }
}
