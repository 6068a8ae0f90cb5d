/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * A simple, synchronous, in-memory event bus. Handlers run inside the
 * decode call that emits.
 *
 * @module @unravel/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { createConsoleLogger, errorMessage } from "../contracts/Logger.js";

/**
 * Options for the in-memory bus.
 */
export interface InMemoryEventBusOptions {
    /** Receives handler errors (default: console logger tagged "EventBus") */
    readonly logger?: EngineLogger;
}

/**
 * In-memory EventBus implementation.
 *
 * Features:
 * - Synchronous event dispatch
 * - Wildcard subscription ("*" for all events)
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("decode:finished", (event) => {
 *     console.log("Finished:", event.data);
 * });
 *
 * bus.emit(createEvent("decode:finished", { status: "COMPLETE" }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private handlers: Map<string, Set<EventHandler>> = new Map();
    private readonly logger: EngineLogger;

    constructor(options: InMemoryEventBusOptions = {}) {
        this.logger = options.logger ?? createConsoleLogger("EventBus");
    }

    /**
     * Emit an event to all subscribers.
     *
     * Specific handlers run first, then "*" handlers. A throwing handler is
     * logged and the remaining handlers still run.
     *
     * @param event - The event payload to emit
     */
    emit(event: EventPayload): void {
        this.dispatch(this.handlers.get(event.type), event, event.type);
        this.dispatch(this.handlers.get("*"), event, "*");
    }

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }

        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    private dispatch(handlers: Set<EventHandler> | undefined, event: EventPayload, subscribedTo: string): void {
        if (!handlers) {
            return;
        }

        // Copy so a handler can unsubscribe mid-dispatch
        for (const handler of [...handlers]) {
            try {
                handler(event);
            }
            catch (error) {
                this.logger.error("EventBus handler error", {
                    eventType: event.type,
                    subscribedTo,
                    traceId  : event.traceId,
                    error    : errorMessage(error),
                });
            }
        }
    }
}
