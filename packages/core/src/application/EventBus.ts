import type { Logger } from 'pino';
import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';
import { errorMessage } from './errors.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

/** Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  /** Per event type: the subscribed handler mapped to its type-narrowing dispatcher. */
  private readonly handlers = new Map<EventType, Map<unknown, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  constructor(private readonly logger?: Logger) {}

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const dispatch: WildcardHandler = (event) => {
      if (isEventOf(type, event)) handler(event);
    };
    const existing = this.handlers.get(type) ?? new Map<unknown, WildcardHandler>();
    existing.set(handler, dispatch);
    this.handlers.set(type, existing);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /** Emit a domain event to all registered handlers. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent): void {
    const handlers = this.handlers.get(event.type);
    if (handlers) {
      for (const dispatch of handlers.values()) {
        this.invoke(dispatch, event);
      }
    }

    for (const handler of this.wildcardHandlers) {
      this.invoke(handler, event);
    }
  }

  private invoke(handler: WildcardHandler, event: DomainEvent): void {
    try {
      handler(event);
    } catch (error) {
      this.logger?.warn({ eventType: event.type, error: errorMessage(error) }, 'Event handler threw');
    }
  }
}

function isEventOf<T extends EventType>(type: T, event: DomainEvent): event is EventPayload<T> {
  return event.type === type;
}
