/**
 * Central event bus for library-level notifications (configuration and catalog loading).
 */
import { EventEmitter } from 'events';
import type { EventName } from '../Domain/index.js';

/**
 * MainEventBus is the shared notification channel between the loaders and the caller.
 * Sessions carry their own emitter; this bus is for process-wide events only.
 */
export class MainEventBus extends EventEmitter {
    /** Typed emit helper enforcing known event names. */
    public Emit<T extends EventName>(eventName: T, ...args: unknown[]): boolean {
        return super.emit(eventName, ...args);
    }
    /** Typed on helper enforcing known event names. */
    public On<T extends EventName>(eventName: T, listener: (...args: unknown[]) => void): this {
        super.on(eventName, listener);
        return this;
    }
}

/**
 * Global event bus instance.
 * @example
 * import { MAIN_EVENT_BUS } from './Events/MainEventBus.js';
 * MAIN_EVENT_BUS.On(EVENT_NAMES.catalogLoaded, count => ...);
 */
export const MAIN_EVENT_BUS = new MainEventBus();
