import { describe, it, expect } from 'vitest'
import { canDrawEntityRadar, compareMetrics, defaultAxes, defaultMetric, keyMetrics, radarMetrics } from './defaults'
import type { ColumnClassification } from '../types'

function withMetrics(metricColumns: string[]): ColumnClassification {
  return { identifierColumn: '股票代码', metricColumns }
}

describe('defaults', () => {
  it('prefers the headline index, else the first metric', () => {
    expect(defaultMetric(withMetrics(['a', '数字化转型总指数']))).toBe('数字化转型总指数')
    expect(defaultMetric(withMetrics(['a', 'b']))).toBe('a')
    expect(defaultMetric(withMetrics([]))).toBeUndefined()
  })

  it('picks scatter axes only with two or more metrics', () => {
    expect(defaultAxes(withMetrics(['a']))).toBeUndefined()
    expect(defaultAxes(withMetrics(['a', 'b', 'c']))).toEqual({ x: 'a', y: 'b' })
    expect(defaultAxes(withMetrics(['技术应用', '数字化转型总指数']))).toEqual({ x: '数字化转型总指数', y: '技术应用' })
  })

  it('uses the known key metrics in their preferred order', () => {
    expect(keyMetrics(withMetrics(['流程优化', 'x', '战略转型']))).toEqual(['战略转型', '流程优化'])
  })

  it('falls back to leading metrics when no key metric is present', () => {
    const c = withMetrics(['a', 'b', 'c', 'd', 'e', 'f', 'g'])
    expect(keyMetrics(c)).toEqual(['a', 'b', 'c'])
    expect(radarMetrics(c)).toEqual(['a', 'b', 'c', 'd', 'e', 'f'])
    expect(compareMetrics(c)).toEqual(['a', 'b', 'c'])
  })

  it('limits the entity radar to ten companies', () => {
    expect(canDrawEntityRadar(0)).toBe(false)
    expect(canDrawEntityRadar(10)).toBe(true)
    expect(canDrawEntityRadar(11)).toBe(false)
  })
})
