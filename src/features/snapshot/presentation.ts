import type {
  DisplayColumn,
  GroupName,
  GroupView,
  NavLink,
  SnapshotCell,
  SnapshotFilters,
  SnapshotRow,
  SnapshotTable,
  SnapshotView,
  StyleCategory,
} from '../../types/snapshot'
import {
  CORE_STAGE,
  EXTENSION_HIGH,
  EXTENSION_LOW,
  GROUP_ORDER,
  RANK_NEUTRAL,
  RANK_STRONG,
} from './constants'

type Value = number | string | null | undefined

function isMissing(v: Value): v is null | undefined {
  return v === null || v === undefined || (typeof v === 'number' && Number.isNaN(v))
}

// ===================================
// 포맷 (값 → 문자열)
// ===================================

export function formatPercent(v: number | null | undefined, decimals = 1): string {
  if (isMissing(v)) return ''
  return `${(v * 100).toFixed(decimals)}%`
}

export function formatExtension(v: number | null | undefined): string {
  if (isMissing(v)) return ''
  return v.toFixed(1)
}

const STAGE_MARKERS: Record<number, string> = { 1: '🟡', 2: '🟢', 3: '🟠', 4: '🔴' }
const UNKNOWN_STAGE = '⚪'

export function formatStage(v: number | null | undefined): string {
  if (isMissing(v)) return UNKNOWN_STAGE
  return STAGE_MARKERS[v] ?? UNKNOWN_STAGE
}

const VOLUME_MARKERS: Record<string, string> = { Pocket: '💎', Normal: '⚪' }
const DEFAULT_VOLUME = '⚪'

export function formatVolume(v: string | null | undefined): string {
  if (isMissing(v)) return DEFAULT_VOLUME
  return VOLUME_MARKERS[v] ?? DEFAULT_VOLUME
}

const TRUE_VALUES = new Set(['true', '1', '1.0', 'yes'])

export function formatCheck(v: Value): string {
  if (isMissing(v)) return ''
  return TRUE_VALUES.has(String(v).toLowerCase()) ? '✅' : '❌'
}

// ===================================
// 스타일 (값 → 카테고리)
// ===================================

export function styleReturn(v: number | null | undefined): StyleCategory | null {
  if (isMissing(v)) return null
  return v > 0 ? 'positive' : 'negative'
}

export function styleRank(v: number | null | undefined): StyleCategory | null {
  if (isMissing(v)) return null
  if (v >= RANK_STRONG) return 'strong'
  if (v >= RANK_NEUTRAL) return 'neutral'
  return 'weak'
}

export function styleExtension(v: number | null | undefined): StyleCategory | null {
  if (isMissing(v)) return null
  if (v < 0) return 'neutral'
  if (v <= EXTENSION_LOW) return 'strong'
  if (v <= EXTENSION_HIGH) return 'caution'
  return 'weak'
}

export const STYLE_COLORS: Record<StyleCategory, string> = {
  positive: '#d4f4dd',
  strong: '#d4f4dd',
  neutral: '#e0e0e0',
  caution: '#fff7cc',
  negative: '#f4d4d4',
  weak: '#f4d4d4',
}

export function formatCell(row: SnapshotRow, column: DisplayColumn): SnapshotCell {
  switch (column) {
    case 'Ticker':
      return { column, text: row.Ticker, style: null }
    case 'RS Trend':
      // 셀은 차트로 그림
      return { column, text: '', style: null }
    case 'RS 1M':
    case 'RS 1Y':
      return { column, text: formatPercent(row[column], 0), style: styleRank(row[column]) }
    case 'Volume':
      return { column, text: formatVolume(row.Volume), style: null }
    case 'Intraday':
    case '1D Return':
      return { column, text: formatPercent(row[column], 1), style: styleReturn(row[column]) }
    case 'Extension':
      return { column, text: formatExtension(row.Extension), style: styleExtension(row.Extension) }
    case '> SMA10':
    case '> SMA20':
      return { column, text: formatCheck(row[column]), style: null }
    case 'Stage':
      return { column, text: formatStage(row.Stage), style: null }
  }
}

// ===================================
// 필터
// ===================================

// 결측값과의 비교는 항상 false → 필터 활성 시 제외
function atLeast(v: number | null, threshold: number): boolean {
  return v !== null && v >= threshold
}

function atMost(v: number | null, threshold: number): boolean {
  return v !== null && v <= threshold
}

export const FILTER_PREDICATES: Record<keyof SnapshotFilters, (row: SnapshotRow) => boolean> = {
  strongRs1m: (row) => atLeast(row['RS 1M'], RANK_STRONG),
  strongRs1y: (row) => atLeast(row['RS 1Y'], RANK_STRONG),
  lowExtension: (row) => atMost(row.Extension, EXTENSION_LOW),
  coreStage2: (row) => row.Stage === CORE_STAGE,
}

const FILTER_KEYS: Array<keyof SnapshotFilters> = ['strongRs1m', 'strongRs1y', 'lowExtension', 'coreStage2']

export function applyFilters(rows: SnapshotRow[], filters: SnapshotFilters): SnapshotRow[] {
  const active = FILTER_KEYS
    .filter((key) => filters[key])
    .map((key) => FILTER_PREDICATES[key])
  if (active.length === 0) return rows
  return rows.filter((row) => active.every((pred) => pred(row)))
}

// ===================================
// 그룹
// ===================================

export function groupAnchor(name: string): string {
  return name.toLowerCase().replace(/ /g, '-')
}

export interface GroupPartition {
  name: GroupName
  anchor: string
  rows: SnapshotRow[]
}

/** 고정된 그룹 순서대로 나눔. 행이 없는 그룹은 생략 */
export function partitionByGroup(rows: SnapshotRow[]): GroupPartition[] {
  return GROUP_ORDER
    .map((name) => ({
      name,
      anchor: groupAnchor(name),
      rows: rows.filter((row) => row.group === name),
    }))
    .filter((section) => section.rows.length > 0)
}

export function buildNavigation(): NavLink[] {
  return GROUP_ORDER.map((name) => ({ label: name, href: `#${groupAnchor(name)}` }))
}

// ===================================
// 뷰 모델
// ===================================

export function buildSnapshotView(table: SnapshotTable, filters: SnapshotFilters): SnapshotView {
  const filtered = applyFilters(table.rows, filters)
  const groups: GroupView[] = partitionByGroup(filtered).map((section) => ({
    name: section.name,
    anchor: section.anchor,
    columns: table.columns,
    rows: section.rows.map((row) => ({
      ticker: row.Ticker,
      trend: row['RS Trend'],
      cells: table.columns.map((column) => formatCell(row, column)),
    })),
  }))

  return Object.freeze({ groups, navigation: buildNavigation() })
}
