import { describe, it, expect, vi, type Mock } from 'vitest'
import { createLogger, logError, type Logger } from '../logger.js'

type FakeLogger = { [K in 'debug' | 'info' | 'warn' | 'error']: Mock<Logger[K]> } & Pick<Logger, 'child'>

function fakeLogger(): FakeLogger {
  const logger: FakeLogger = {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
    child: () => logger,
  }
  return logger
}

describe('logError', () => {
  it('should log the message with context and the top of the stack', () => {
    const logger = fakeLogger()
    const error = new Error('status code 500')

    logError(logger, 'Notification delivery failed', error, { network: 'devnet-7', client: undefined })

    expect(logger.error).toHaveBeenCalledTimes(1)
    const [message, data] = logger.error.mock.calls[0] ?? []
    expect(message).toBe('Notification delivery failed: status code 500')
    expect(data).toMatchObject({ network: 'devnet-7' })
    expect(data).not.toHaveProperty('client')
    expect(data).toHaveProperty('stack')
  })

  it('should log non-Error values without extra data', () => {
    const logger = fakeLogger()

    logError(logger, 'Emit failed', 'plain')

    expect(logger.error).toHaveBeenCalledWith('Emit failed: plain')
  })
})

describe('createLogger', () => {
  it('should stay quiet under test', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined)

    createLogger('queue').child('worker').info('started')

    expect(log).not.toHaveBeenCalled()
    log.mockRestore()
  })
})
