import type { DataRow, Dataset } from '../types'

export const COLUMNS = ['股票代码', '企业名称', '行业', '数字化转型总指数', '战略转型', '技术应用', '备注']

/** Eight companies; industries first appear as 软件, 硬件, 通信, 金融 (not sorted order). */
export const ROWS: DataRow[] = [
  { 股票代码: 300884, 企业名称: '狄耐克', 行业: '软件', 数字化转型总指数: 40, 战略转型: 10, 技术应用: 20, 备注: 'a' },
  { 股票代码: 2230, 企业名称: '科大讯飞', 行业: '硬件', 数字化转型总指数: 60, 战略转型: 30, 技术应用: null, 备注: 'b' },
  { 股票代码: 300308, 企业名称: '中际旭创', 行业: '软件', 数字化转型总指数: 50, 战略转型: 20, 技术应用: 30, 备注: null },
  { 股票代码: 30884, 企业名称: '测试一号', 行业: '通信', 数字化转型总指数: 20, 战略转型: null, 技术应用: 10, 备注: 'c' },
  { 股票代码: 688308, 企业名称: '芯原股份', 行业: '硬件', 数字化转型总指数: null, 战略转型: 40, 技术应用: 50, 备注: 'd' },
  { 股票代码: 1, 企业名称: '平安银行', 行业: '通信', 数字化转型总指数: 20, 战略转型: 15, 技术应用: null, 备注: 'e' },
  { 股票代码: 600000, 企业名称: '浦发银行', 行业: '金融', 数字化转型总指数: null, 战略转型: 12, 技术应用: 5, 备注: 'f' },
  { 股票代码: 688001, 企业名称: '华兴源创', 行业: null, 数字化转型总指数: 70, 战略转型: 25, 技术应用: 35, 备注: null },
]

export function makeDataset(overrides: Partial<Dataset> = {}): Dataset {
  return { columns: COLUMNS, rows: ROWS, ...overrides }
}

/** Same companies without the name and industry columns. */
export function makeBareDataset(): Dataset {
  const columns = COLUMNS.filter((c) => c !== '企业名称' && c !== '行业')
  const rows = ROWS.map((r) => Object.fromEntries(columns.map((c) => [c, r[c] ?? null])))
  return { columns, rows }
}

export function codes(rows: readonly DataRow[]): (string | number | null)[] {
  return rows.map((r) => r['股票代码'])
}
