import { describe, it, expect } from 'vitest'
import { formatProgressBar, getBarWidth } from '../src/utils/progress.js'

describe('formatProgressBar', () => {
  it('fills the bar in proportion', () => {
    expect(formatProgressBar(5, 10, 10)).toBe('[#####.....] 50.00%')
    expect(formatProgressBar(1, 3, 6)).toBe('[##....] 33.33%')
  })

  it('caps at 100%', () => {
    expect(formatProgressBar(15, 10, 4)).toBe('[####] 100.00%')
  })

  it('treats an empty run as complete', () => {
    expect(formatProgressBar(0, 0, 4)).toBe('[####] 100.00%')
  })
})

describe('getBarWidth', () => {
  it('uses half the terminal less the percentage', () => {
    expect(getBarWidth(120)).toBe(53)
  })

  it('never goes below ten', () => {
    expect(getBarWidth(20)).toBe(10)
  })

  it('falls back when the width is unknown', () => {
    expect(getBarWidth(undefined)).toBe(80)
    expect(getBarWidth(0)).toBe(80)
  })
})
