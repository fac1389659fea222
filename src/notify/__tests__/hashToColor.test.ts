import { describe, it, expect } from 'vitest'
import { hashToColor, hslToRgb } from '../hashToColor.js'

describe('hashToColor', () => {
  it('should be stable for a network', () => {
    expect(hashToColor('devnet-7')).toBe(0xe6644c)
  })

  it('should only look at the identifier and the trailing number', () => {
    expect(hashToColor('peerdas-devnet-5')).toBe(hashToColor('peerdas-foo-5'))
  })
})

describe('hslToRgb', () => {
  it('should return grey without saturation', () => {
    expect(hslToRgb(0.3, 0, 0.5)).toEqual([128, 128, 128])
  })

  it('should convert pure red', () => {
    expect(hslToRgb(0, 1, 0.5)).toEqual([255, 0, 0])
  })
})
