/**
 * TCP reachability probe
 *
 * Connects to the admin port, waits for the service banner and checks its
 * leading bytes. Never throws: every failure is reported as a ProbeResult.
 */

import { Socket } from 'net'

export type ProbeFailure =
  | 'connect-timeout'
  | 'connect-error'
  | 'read-timeout'
  | 'read-error'
  | 'closed'
  | 'banner-mismatch'
  | 'aborted'

export type ProbeResult =
  | { reachable: true; banner: string }
  | { reachable: false; reason: ProbeFailure; detail?: string }

export type ReachabilityProbe = (host: string, port: number, signal?: AbortSignal) => Promise<ProbeResult>

export interface BannerProbeOptions {
  connectTimeoutMs?: number
  readTimeoutMs?: number
  /** Expected start of the banner */
  bannerPrefix?: string
  /** Upper bound on bytes inspected */
  readBytes?: number
}

export function probeSshBanner(
  host: string,
  port: number,
  options: BannerProbeOptions & { signal?: AbortSignal } = {}
): Promise<ProbeResult> {
  const {
    connectTimeoutMs = 2000,
    readTimeoutMs = 3000,
    bannerPrefix = 'SSH-',
    readBytes = 8,
    signal,
  } = options
  const needed = Math.min(bannerPrefix.length, readBytes)

  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve({ reachable: false, reason: 'aborted' })
      return
    }

    const socket = new Socket()
    const chunks: Buffer[] = []
    let received = 0
    let connected = false
    let settled = false
    let timer: NodeJS.Timeout | undefined

    const finish = (result: ProbeResult) => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
      socket.destroy()
      resolve(result)
    }

    const onAbort = () => finish({ reachable: false, reason: 'aborted' })
    signal?.addEventListener('abort', onAbort, { once: true })

    timer = setTimeout(() => finish({ reachable: false, reason: 'connect-timeout' }), connectTimeoutMs)

    socket.once('connect', () => {
      connected = true
      clearTimeout(timer)
      timer = setTimeout(() => finish({ reachable: false, reason: 'read-timeout' }), readTimeoutMs)
    })

    socket.on('data', (chunk: Buffer) => {
      chunks.push(chunk)
      received += chunk.length
      if (received < needed) return

      const banner = Buffer.concat(chunks).subarray(0, readBytes).toString('latin1')
      finish(
        banner.startsWith(bannerPrefix)
          ? { reachable: true, banner }
          : { reachable: false, reason: 'banner-mismatch', detail: banner }
      )
    })

    socket.once('end', () => {
      finish({ reachable: false, reason: received > 0 ? 'banner-mismatch' : 'closed' })
    })

    socket.once('error', (error: Error) => {
      finish({ reachable: false, reason: connected ? 'read-error' : 'connect-error', detail: error.message })
    })

    socket.connect(port, host)
  })
}

/** Bind banner options into a ReachabilityProbe */
export function createBannerProbe(options: BannerProbeOptions = {}): ReachabilityProbe {
  return (host, port, signal) => probeSshBanner(host, port, { ...options, signal })
}
