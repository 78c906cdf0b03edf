import { describe, it, expect } from 'vitest'
import { classify } from './schemaClassifier'
import { SchemaError } from './errors'
import { makeBareDataset, makeDataset } from '../test/fixtures'

describe('classify', () => {
  it('detects identifier, industry, name and metric columns', () => {
    const c = classify(makeDataset())
    expect(c.identifierColumn).toBe('股票代码')
    expect(c.groupingColumn).toBe('行业')
    expect(c.nameColumn).toBe('企业名称')
    expect(c.metricColumns).toEqual(['数字化转型总指数', '战略转型', '技术应用'])
  })

  it('never lists the identifier as a metric even though it is numeric', () => {
    const c = classify(makeDataset())
    expect(c.metricColumns).not.toContain('股票代码')
  })

  it('leaves grouping and name absent when no candidate column exists', () => {
    const c = classify(makeBareDataset())
    expect(c.groupingColumn).toBeUndefined()
    expect(c.nameColumn).toBeUndefined()
    expect(c.metricColumns).toEqual(['数字化转型总指数', '战略转型', '技术应用'])
  })

  it('takes the first grouping candidate in priority order', () => {
    const dataset = {
      columns: ['股票代码', 'industry', '所属行业', 'score'],
      rows: [{ 股票代码: 1, industry: 'A', 所属行业: 'B', score: 1 }],
    }
    expect(classify(dataset).groupingColumn).toBe('所属行业')
  })

  it('treats the unnamed index column as the identifier', () => {
    const dataset = {
      columns: ['Unnamed: 0', 'score'],
      rows: [{ 'Unnamed: 0': 300884, score: 2.5 }],
    }
    const c = classify(dataset)
    expect(c.identifierColumn).toBe('Unnamed: 0')
    expect(c.metricColumns).toEqual(['score'])
  })

  it('throws SchemaError when there is no identifier column', () => {
    const dataset = { columns: ['企业名称', 'score'], rows: [{ 企业名称: 'x', score: 1 }] }
    expect(() => classify(dataset)).toThrow(SchemaError)
  })

  it('excludes mixed text/number and all-missing columns from metrics', () => {
    const dataset = {
      columns: ['股票代码', 'mixed', 'empty', 'decimal'],
      rows: [
        { 股票代码: 1, mixed: 3, empty: null, decimal: 0.5 },
        { 股票代码: 2, mixed: 'n/a', empty: null, decimal: null },
      ],
    }
    expect(classify(dataset).metricColumns).toEqual(['decimal'])
  })

  it('is deterministic and returns a frozen result', () => {
    const dataset = makeDataset()
    const a = classify(dataset)
    const b = classify(dataset)
    expect(a).toEqual(b)
    expect(Object.isFrozen(a)).toBe(true)
    expect(Object.isFrozen(a.metricColumns)).toBe(true)
  })
})
