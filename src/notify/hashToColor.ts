import { createHash } from 'crypto'

const SATURATION = 0.75
const LIGHTNESS = 0.6

function hueToRgb(p: number, q: number, t: number): number {
  if (t < 0) t += 1
  if (t > 1) t -= 1
  if (t < 1 / 6) return p + (q - p) * 6 * t
  if (t < 1 / 2) return q
  if (t < 2 / 3) return p + (q - p) * (2 / 3 - t) * 6
  return p
}

export function hslToRgb(h: number, s: number, l: number): [number, number, number] {
  if (s === 0) {
    const v = Math.round(l * 255)
    return [v, v, v]
  }
  const q = l < 0.5 ? l * (1 + s) : l + s - l * s
  const p = 2 * l - q
  return [
    Math.round(hueToRgb(p, q, h + 1 / 3) * 255),
    Math.round(hueToRgb(p, q, h) * 255),
    Math.round(hueToRgb(p, q, h - 1 / 3) * 255),
  ]
}

/**
 * Stable 0xRRGGBB colour for a network name.
 * Only the leading identifier and the trailing number count, so
 * `peerdas-devnet-5` and `peerdas-foo-5` share a colour.
 */
export function hashToColor(network: string): number {
  const parts = network.split('-')
  const identifier = parts[0] ?? ''
  const number = parts.length > 2 ? parts[parts.length - 1] ?? '0' : '0'

  const hash = createHash('sha256').update(identifier + number).digest()
  const first = hash[0] ?? 0
  const second = hash[1] ?? 0

  // six base hues plus a small shift inside each
  const hue = (first % 6) / 6 + second / 255 / 12
  const [r, g, b] = hslToRgb(hue, SATURATION, LIGHTNESS)
  return (r << 16) | (g << 8) | b
}
