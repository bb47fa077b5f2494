import { EventEmitter } from 'events'
import type { ProgressEvent } from '../../types/index.js'

export type ProgressListener = (event: ProgressEvent) => void

const EVENT = 'progress'

/**
 * Typed channel carrying identity, total, increment and complete events
 * from workers to whoever renders progress
 */
export class ProgressChannel {
  private readonly emitter = new EventEmitter()

  emit(event: ProgressEvent): void {
    this.emitter.emit(EVENT, event)
  }

  /**
   * Subscribe to every event; returns an unsubscribe function
   */
  subscribe(listener: ProgressListener): () => void {
    this.emitter.on(EVENT, listener)
    return () => {
      this.emitter.off(EVENT, listener)
    }
  }

  get listenerCount(): number {
    return this.emitter.listenerCount(EVENT)
  }
}
