import { EventEmitter } from 'events'
import { EmittableEvent, SurfaceEvent, SurfaceEventType } from '../types/events'

type EventOfType<K extends SurfaceEventType> = Extract<SurfaceEvent, { type: K }>

/**
 * Type-safe event emitter for analysis events.
 * Extends Node.js EventEmitter with typed event methods.
 */
export class SurfaceEventEmitter extends EventEmitter {
  /**
   * Emits an event with automatic timestamp injection.
   */
  public emitEvent(event: EmittableEvent): void {
    const fullEvent = {
      ...event,
      timestamp: new Date()
    }

    // Emit on both the specific event type and a general 'event' channel
    this.emit(event.type, fullEvent)
    this.emit('event', fullEvent)
  }

  public onEvent<K extends SurfaceEventType>(
    eventType: K,
    listener: (event: EventOfType<K>) => void
  ): this {
    return this.on(eventType, listener)
  }

  /**
   * Listen to all events.
   */
  public onAnyEvent(listener: (event: SurfaceEvent) => void): this {
    return this.on('event', listener)
  }

  public offAnyEvent(listener: (event: SurfaceEvent) => void): this {
    return this.off('event', listener)
  }
}

// Singleton instance for global access
export const surfaceEvents = new SurfaceEventEmitter()
