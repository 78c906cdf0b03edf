import { describe, it, expect } from 'vitest'
import {
  aggregateByGroup,
  aggregatedRows,
  countByGroup,
  longFormValues,
  suggestRange,
  toLongForm,
  toWideForm,
} from './aggregation'
import { classify } from './schemaClassifier'
import { ConfigurationError } from './errors'
import { makeBareDataset, makeDataset } from '../test/fixtures'

const METRICS = ['数字化转型总指数', '战略转型', '技术应用']

describe('aggregateByGroup', () => {
  const dataset = makeDataset()
  const classification = classify(dataset)

  it('averages each metric per industry, ignoring missing values', () => {
    const view = aggregateByGroup(dataset, classification, METRICS)
    expect(view.groupingColumn).toBe('行业')
    expect(view.groups.map((g) => g.key)).toEqual(['软件', '硬件', '通信', '金融'])
    expect(view.groups[0].means).toEqual({ 数字化转型总指数: 45, 战略转型: 15, 技术应用: 25 })
    expect(view.groups[1].means).toEqual({ 数字化转型总指数: 60, 战略转型: 35, 技术应用: 50 })
    expect(view.groups[2].means).toEqual({ 数字化转型总指数: 20, 战略转型: 15, 技术应用: 10 })
    expect(view.groups[1].count).toBe(2)
  })

  it('leaves a cell undefined when the group has no values for the metric', () => {
    const view = aggregateByGroup(dataset, classification, METRICS)
    const finance = view.groups[3]
    expect(finance.key).toBe('金融')
    expect(finance.means['数字化转型总指数']).toBeUndefined()
    expect(finance.means['战略转型']).toBe(12)
  })

  it('keeps first-appearance order rather than sorted order', () => {
    const keys = aggregateByGroup(dataset, classification, ['战略转型']).groups.map((g) => g.key)
    expect(keys).toEqual(['软件', '硬件', '通信', '金融'])
    expect(keys).not.toEqual([...keys].sort())
  })

  it('skips rows with no industry', () => {
    const view = aggregateByGroup(dataset, classification, ['数字化转型总指数'])
    const total = view.groups.reduce((n, g) => n + g.count, 0)
    expect(total).toBe(7)
  })

  it('rejects empty and unknown metric lists', () => {
    expect(() => aggregateByGroup(dataset, classification, [])).toThrow(ConfigurationError)
    expect(() => aggregateByGroup(dataset, classification, ['备注'])).toThrow(ConfigurationError)
    expect(() => aggregateByGroup(dataset, classification, ['股票代码'])).toThrow(ConfigurationError)
  })

  it('throws ConfigurationError for any metric list when there is no industry column', () => {
    const bare = makeBareDataset()
    const c = classify(bare)
    expect(c.groupingColumn).toBeUndefined()
    expect(() => aggregateByGroup(bare, c, METRICS)).toThrow(ConfigurationError)
    expect(() => aggregateByGroup(bare, c, ['战略转型'])).toThrow(ConfigurationError)
    expect(() => aggregateByGroup(bare, c, [])).toThrow(ConfigurationError)
  })
})

describe('toLongForm', () => {
  it('emits one record per row and value column, row order first', () => {
    const rows = [
      { name: 'A', x: 1, y: 2 },
      { name: 'B', x: 3, y: null },
    ]
    expect(toLongForm(rows, 'name', ['x', 'y'])).toEqual([
      { key: 'A', metric: 'x', value: 1 },
      { key: 'A', metric: 'y', value: 2 },
      { key: 'B', metric: 'x', value: 3 },
      { key: 'B', metric: 'y', value: null },
    ])
  })

  it('round-trips aggregated means through the wide pivot', () => {
    const dataset = makeDataset()
    const classification = classify(dataset)
    const rows = aggregatedRows(aggregateByGroup(dataset, classification, METRICS))
    const long = toLongForm(rows, '行业', METRICS)
    expect(long).toHaveLength(4 * METRICS.length)
    expect(toWideForm(long, '行业')).toEqual(rows)
  })
})

describe('longFormValues', () => {
  it('drops missing and text values', () => {
    expect(
      longFormValues([
        { key: 'A', metric: 'x', value: 1.5 },
        { key: 'A', metric: 'y', value: null },
        { key: 'B', metric: 'x', value: 'n/a' },
      ])
    ).toEqual([1.5])
  })
})

describe('suggestRange', () => {
  it('pads positive bounds', () => {
    const [lo, hi] = suggestRange([10, 20, 30])
    expect(lo).toBeCloseTo(9)
    expect(hi).toBeCloseTo(33)
  })

  it('leaves a negative minimum unpadded', () => {
    const [lo, hi] = suggestRange([-5, 10])
    expect(lo).toBe(-5)
    expect(hi).toBeCloseTo(11)
  })

  it('leaves a non-positive maximum unpadded', () => {
    expect(suggestRange([-8, -2])).toEqual([-8, -2])
    expect(suggestRange([0, 0])).toEqual([0, 0])
  })

  it('rejects an empty list', () => {
    expect(() => suggestRange([])).toThrow(ConfigurationError)
  })
})

describe('countByGroup', () => {
  it('counts companies per industry, largest first with ties in appearance order', () => {
    const dataset = makeDataset()
    expect(countByGroup(dataset, classify(dataset))).toEqual([
      { key: '软件', count: 2 },
      { key: '硬件', count: 2 },
      { key: '通信', count: 2 },
      { key: '金融', count: 1 },
    ])
  })
})
