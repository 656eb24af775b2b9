import { isValid, parseISO } from 'date-fns'
import type {
  CsvRecord,
  CsvTable,
  SnapshotRow,
  SnapshotTable,
  SourceName,
  StageRow,
  TickerRow,
} from '../types/snapshot'
import {
  COLUMN_RENAME,
  DAILY_COLUMNS,
  DISPLAY_ORDER,
  GROUP_COLUMN,
  NA_VALUES,
  WEEKLY_COLUMNS,
} from '../features/snapshot/constants'
import { parseCsv } from './csv'
import { DataFormatError } from './errors'

// ===================================
// 값 파싱
// ===================================

function cell(record: CsvRecord, column: string): string | null {
  const raw = record[column]
  if (raw === undefined) return null
  const v = raw.trim()
  return NA_VALUES.has(v) ? null : v
}

function parseDate(record: CsvRecord, source: SourceName, row: number): Date {
  const raw = record.date ?? ''
  const date = parseISO(raw.trim())
  if (!isValid(date)) {
    throw new DataFormatError(`${source} row ${row}: invalid date "${raw}"`, {
      source,
      row,
      column: 'date',
      value: raw,
    })
  }
  return date
}

// 10진수/지수 표기만 허용 (0x1A, 1_0 등은 거부)
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

function parseNumber(record: CsvRecord, column: string, source: SourceName, row: number): number | null {
  const v = cell(record, column)
  if (v === null) return null
  const n = DECIMAL_PATTERN.test(v) ? Number(v) : NaN
  if (!Number.isFinite(n)) {
    throw new DataFormatError(`${source} row ${row}: invalid number "${v}" in ${column}`, {
      source,
      row,
      column,
      value: v,
    })
  }
  return n
}

// 종목 코드가 비어 있는 행은 건너뜀. row 번호는 원본 기준 유지
export function toTickerRows(table: CsvTable): TickerRow[] {
  return table.records.flatMap((r, i): TickerRow[] => {
    const ticker = cell(r, 'ticker')
    if (ticker === null) return []
    const row = i + 1
    return [{
      ticker,
      date: parseDate(r, 'daily', row),
      rs_to_spy: parseNumber(r, 'rs_to_spy', 'daily', row),
      ret_intraday: parseNumber(r, 'ret_intraday', 'daily', row),
      ret_1d: parseNumber(r, 'ret_1d', 'daily', row),
      rs_rank_21d: parseNumber(r, 'rs_rank_21d', 'daily', row),
      rs_rank_252d: parseNumber(r, 'rs_rank_252d', 'daily', row),
      pp_volume: cell(r, 'pp_volume'),
      ratio_pct_dist_to_atr_pct: parseNumber(r, 'ratio_pct_dist_to_atr_pct', 'daily', row),
      above_sma10: cell(r, 'above_sma10'),
      above_sma20: cell(r, 'above_sma20'),
      group: cell(r, GROUP_COLUMN),
    }]
  })
}

export function toStageRows(table: CsvTable): StageRow[] {
  return table.records.flatMap((r, i): StageRow[] => {
    const ticker = cell(r, 'ticker')
    if (ticker === null) return []
    const row = i + 1
    return [{
      ticker,
      date: parseDate(r, 'weekly', row),
      stage_label_core: parseNumber(r, 'stage_label_core', 'weekly', row),
    }]
  })
}

// ===================================
// 종목별 그룹핑
// ===================================

/** 종목별로 묶고 날짜 오름차순 정렬. 같은 날짜는 원본 순서 유지 (stable sort) */
function groupByTicker<T extends { ticker: string; date: Date }>(rows: T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>()
  for (const row of rows) {
    const list = groups.get(row.ticker)
    if (list) list.push(row)
    else groups.set(row.ticker, [row])
  }
  for (const list of groups.values()) {
    list.sort((a, b) => a.date.getTime() - b.date.getTime())
  }
  return groups
}

/** 날짜가 가장 큰 행. 동일 날짜가 여럿이면 원본에서 마지막 행 */
function latest<T>(sorted: T[]): T {
  return sorted[sorted.length - 1]
}

// ===================================
// 스냅샷 생성
// ===================================

export function buildSnapshot(daily: CsvTable, weekly: CsvTable): SnapshotTable {
  const tickerRows = toTickerRows(daily)
  const stageRows = toStageRows(weekly)
  const hasGroup = daily.columns.includes(GROUP_COLUMN)

  const dailyByTicker = groupByTicker(tickerRows)
  const stageByTicker = new Map<string, number | null>()
  for (const [ticker, rows] of groupByTicker(stageRows)) {
    stageByTicker.set(ticker, latest(rows).stage_label_core)
  }

  const rows: SnapshotRow[] = []
  for (const [ticker, history] of dailyByTicker) {
    const last = latest(history)
    rows.push({
      [COLUMN_RENAME.ticker]: ticker,
      'RS Trend': history.map((r) => r.rs_to_spy),
      [COLUMN_RENAME.rs_rank_21d]: last.rs_rank_21d,
      [COLUMN_RENAME.rs_rank_252d]: last.rs_rank_252d,
      [COLUMN_RENAME.pp_volume]: last.pp_volume,
      [COLUMN_RENAME.ret_intraday]: last.ret_intraday,
      [COLUMN_RENAME.ret_1d]: last.ret_1d,
      [COLUMN_RENAME.ratio_pct_dist_to_atr_pct]: last.ratio_pct_dist_to_atr_pct,
      [COLUMN_RENAME.above_sma10]: last.above_sma10,
      [COLUMN_RENAME.above_sma20]: last.above_sma20,
      [COLUMN_RENAME.stage_label_core]: stageByTicker.get(ticker) ?? null,
      group: hasGroup ? last.group : null,
    })
  }

  // 종목 코드순 (코드 유닛 비교)
  rows.sort((a, b) => (a.Ticker < b.Ticker ? -1 : a.Ticker > b.Ticker ? 1 : 0))

  return { columns: [...DISPLAY_ORDER], hasGroup, rows }
}

export function buildSnapshotFromCsv(dailyText: string, weeklyText: string): SnapshotTable {
  const daily = parseCsv(dailyText, DAILY_COLUMNS, 'daily')
  const weekly = parseCsv(weeklyText, WEEKLY_COLUMNS, 'weekly')
  return buildSnapshot(daily, weekly)
}
