/**
 * Central event bus for dispatching registry events between components and the host application.
 */
import { EventEmitter } from 'events';
import type { EventName } from '../Domain/index.js';
import { metricsService } from '../Services/MetricsService.js';

/**
 * MainEventBus is the central event system for internal communication.
 * Hosts subscribe to renumbering, audit and hierarchy events to refresh their views.
 */
export class MainEventBus extends EventEmitter {
    /** Typed emit helper enforcing known event names. */
    public Emit<T extends EventName>(eventName: T, ...args: unknown[]): boolean {
        metricsService.IncEvent(eventName);
        return super.emit(eventName, ...args);
    }
    /** Typed on helper enforcing known event names. */
    public On<T extends EventName>(eventName: T, listener: (...args: unknown[]) => void): this {
        super.on(eventName, listener);
        return this;
    }
}

/**
 * Global event bus instance for the application.
 * @example
 * import { MAIN_EVENT_BUS } from './Events/MainEventBus.js';
 * MAIN_EVENT_BUS.On('renumber.committed', summary => { ... });
 */
export const MAIN_EVENT_BUS = new MainEventBus();
