/**
 * Event bus
 * Typed publish/subscribe between the queue and whoever watches it.
 */

import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import type { EvaluationOutcome, RejectReason } from './queue.js'

const logger = createLogger('events')

export type EventHandler<T> = (payload: T) => void | Promise<void>

export type EvaluationEvents = {
  'evaluation:queued': { id: string; key: string }
  'evaluation:started': { id: string; key: string }
  'evaluation:completed': EvaluationOutcome
  'evaluation:rejected': { key: string; reason: RejectReason }
}

export interface EventBus<E extends Record<string, unknown>> {
  on<K extends keyof E>(event: K, handler: EventHandler<E[K]>): () => void
  off<K extends keyof E>(event: K, handler: EventHandler<E[K]>): void
  once<K extends keyof E>(event: K, handler: EventHandler<E[K]>): () => void
  /** Resolves once every handler has run; handler errors are logged, never thrown */
  emit<K extends keyof E>(event: K, payload: E[K]): Promise<void>
  clear(event?: keyof E): void
}

export function createEventBus<E extends Record<string, unknown>>(): EventBus<E> {
  const handlers: { [K in keyof E]?: Set<EventHandler<E[K]>> } = {}

  function off<K extends keyof E>(event: K, handler: EventHandler<E[K]>): void {
    handlers[event]?.delete(handler)
  }

  function on<K extends keyof E>(event: K, handler: EventHandler<E[K]>): () => void {
    const set = handlers[event] ?? new Set<EventHandler<E[K]>>()
    set.add(handler)
    handlers[event] = set
    return () => off(event, handler)
  }

  return {
    on,
    off,

    once(event, handler) {
      const wrapper: EventHandler<E[typeof event]> = async payload => {
        off(event, wrapper)
        await handler(payload)
      }
      return on(event, wrapper)
    },

    async emit(event, payload) {
      const set = handlers[event]
      if (!set) return

      await Promise.all(
        [...set].map(async handler => {
          try {
            await handler(payload)
          } catch (e) {
            logger.error(`Event handler error for ${String(event)}: ${getErrorMessage(e)}`)
          }
        })
      )
    },

    clear(event) {
      if (event === undefined) {
        for (const key of Object.keys(handlers)) {
          Reflect.deleteProperty(handlers, key)
        }
      } else {
        Reflect.deleteProperty(handlers, event)
      }
    },
  }
}

// process-wide bus
export const eventBus = createEventBus<EvaluationEvents>()

