import { describe, it, expect } from 'vitest'
import { parseDatasetCSV } from './csvParse'
import { classify } from './schemaClassifier'
import { resolve } from './lookup'

describe('parseDatasetCSV', () => {
  it('renames a blank first header to the stock code column', () => {
    const result = parseDatasetCSV(',企业名称,数字化转型总指数\n300884,狄耐克,41.5\n2230,科大讯飞,\n')
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.renamedIndex).toBe(true)
    expect(result.dataset.columns).toEqual(['股票代码', '企业名称', '数字化转型总指数'])
    expect(result.dataset.rows).toEqual([
      { 股票代码: 300884, 企业名称: '狄耐克', 数字化转型总指数: 41.5 },
      { 股票代码: 2230, 企业名称: '科大讯飞', 数字化转型总指数: null },
    ])
  })

  it('renames an explicit "Unnamed: 0" header', () => {
    const result = parseDatasetCSV('Unnamed: 0,score\n1,2\n')
    expect(result.ok && result.dataset.columns).toEqual(['股票代码', 'score'])
  })

  it('drops the unnamed index when a stock code column already exists', () => {
    const result = parseDatasetCSV('Unnamed: 0,股票代码\n0,600000\n')
    expect(result.ok && result.renamedIndex).toBe(false)
    expect(result.ok && result.dataset.columns).toEqual(['股票代码'])
    expect(result.ok && result.dataset.rows).toEqual([{ 股票代码: 600000 }])
  })

  it('reads float-formatted exports as numbers', () => {
    const result = parseDatasetCSV('股票代码,行业,数字化转型总指数,战略转型\n300884.0,软件,45.0,1e3\n2230,硬件,50.5,-.5\n1,软件,40.10,0.25\n')
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.dataset.rows).toEqual([
      { 股票代码: 300884, 行业: '软件', 数字化转型总指数: 45, 战略转型: 1000 },
      { 股票代码: 2230, 行业: '硬件', 数字化转型总指数: 50.5, 战略转型: -0.5 },
      { 股票代码: 1, 行业: '软件', 数字化转型总指数: 40.1, 战略转型: 0.25 },
    ])
  })

  it('strips a byte order mark and keeps zero-padded codes as text', () => {
    const result = parseDatasetCSV('\uFEFF股票代码,行业\n000001,银行\n')
    expect(result.ok && result.dataset.rows).toEqual([{ 股票代码: '000001', 行业: '银行' }])
  })

  it('reports a missing stock code column', () => {
    expect(parseDatasetCSV('企业名称,score\nA,1\n')).toEqual({ ok: false, error: 'Missing required column: 股票代码' })
  })

  it('reports a file without data rows', () => {
    const result = parseDatasetCSV('股票代码\n')
    expect(result.ok).toBe(false)
  })
})

describe('parseDatasetCSV then classify', () => {
  it('keeps float-formatted metric columns as metrics', () => {
    const result = parseDatasetCSV('股票代码,行业,数字化转型总指数\n300884,软件,45.0\n2230,硬件,50.5\n1,软件,40.10\n')
    expect(result.ok).toBe(true)
    if (!result.ok) return
    const c = classify(result.dataset)
    expect(c.identifierColumn).toBe('股票代码')
    expect(c.groupingColumn).toBe('行业')
    expect(c.metricColumns).toEqual(['数字化转型总指数'])
  })

  it('uses the named stock code column when the export also carries a row index', () => {
    const result = parseDatasetCSV(',股票代码,企业名称,指数\n0,300884,狄耐克,41.5\n1,2230,科大讯飞,50.5\n')
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.dataset.columns).toEqual(['股票代码', '企业名称', '指数'])
    const c = classify(result.dataset)
    expect(c.identifierColumn).toBe('股票代码')
    expect(c.metricColumns).toEqual(['指数'])
    const matches = resolve(result.dataset, c, '300884', 'identifier', 'exact')
    expect(matches).toEqual([{ 股票代码: 300884, 企业名称: '狄耐克', 指数: 41.5 }])
  })

  it('treats a blank-headed index as the stock code when no stock code column exists', () => {
    const result = parseDatasetCSV(',企业名称,指数\n300884.0,狄耐克,41.50\n')
    expect(result.ok).toBe(true)
    if (!result.ok) return
    const c = classify(result.dataset)
    expect(c.identifierColumn).toBe('股票代码')
    expect(c.metricColumns).toEqual(['指数'])
  })
})
