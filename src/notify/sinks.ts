/**
 * Notification sinks
 */

import chalk from 'chalk'
import { AppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'
import { createLogger } from '../shared/logger.js'
import { renderPayloadText } from './renderPayload.js'
import type { NotificationPayload, NotificationSink } from './types.js'

const logger = createLogger('sink')

function toHexColor(color: number): string {
  return `#${color.toString(16).padStart(6, '0')}`
}

/** Prints the rendered payload, title in the network colour */
export function createConsoleSink(write: (text: string) => void = text => console.log(text)): NotificationSink {
  return {
    async send(payload: NotificationPayload, channel: string, signal?: AbortSignal): Promise<void> {
      signal?.throwIfAborted()
      const [first = '', ...rest] = renderPayloadText(payload).split('\n')
      write([chalk.bold.hex(toHexColor(payload.color))(first), chalk.dim(`#${channel}`), ...rest].join('\n'))
    },
  }
}

/** POSTs `{ channel, payload }` as JSON; any non-2xx status is a failure */
export function createWebhookSink(url: string): NotificationSink {
  return {
    async send(payload: NotificationPayload, channel: string, signal?: AbortSignal): Promise<void> {
      let response: Response
      try {
        response = await fetch(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ channel, payload }),
          signal,
        })
      } catch (e) {
        throw AppError.notifyFailed(getErrorMessage(e), e)
      }

      if (!response.ok) {
        throw AppError.notifyFailed(`webhook responded with status ${response.status}`)
      }
      logger.debug(`Delivered ${payload.checkId} to ${channel}`)
    },
  }
}
