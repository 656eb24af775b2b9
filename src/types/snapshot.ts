export type SourceName = 'daily' | 'weekly'

/** CSV 한 행 (컬럼명 → 원본 문자열) */
export type CsvRecord = Record<string, string>

export interface CsvTable {
  columns: string[]
  records: CsvRecord[]
}

export type GroupName = 'Market' | 'Sector' | 'Commodity' | 'Crypto' | 'Country' | 'Theme' | 'Leader'

export type DisplayColumn =
  | 'Ticker'
  | 'RS Trend'
  | 'RS 1M'
  | 'RS 1Y'
  | 'Volume'
  | 'Intraday'
  | '1D Return'
  | 'Extension'
  | '> SMA10'
  | '> SMA20'
  | 'Stage'

// 일봉 한 행 (날짜/숫자 파싱 완료)
export interface TickerRow {
  ticker: string
  date: Date
  rs_to_spy: number | null
  ret_intraday: number | null
  ret_1d: number | null
  rs_rank_21d: number | null
  rs_rank_252d: number | null
  pp_volume: string | null
  ratio_pct_dist_to_atr_pct: number | null
  above_sma10: string | null
  above_sma20: string | null
  group: string | null
}

// 주봉 한 행
export interface StageRow {
  ticker: string
  date: Date
  stage_label_core: number | null
}

/** 종목당 한 행. 키는 화면 표시용 컬럼명 */
export interface SnapshotRow {
  'Ticker': string
  'RS Trend': Array<number | null>
  'RS 1M': number | null
  'RS 1Y': number | null
  'Volume': string | null
  'Intraday': number | null
  '1D Return': number | null
  'Extension': number | null
  '> SMA10': string | null
  '> SMA20': string | null
  'Stage': number | null
  group: string | null
}

export interface SnapshotTable {
  columns: DisplayColumn[]
  hasGroup: boolean
  rows: SnapshotRow[]
}

export interface SnapshotFilters {
  strongRs1m: boolean
  strongRs1y: boolean
  lowExtension: boolean
  coreStage2: boolean
}

export type StyleCategory = 'positive' | 'negative' | 'strong' | 'neutral' | 'weak' | 'caution'

export interface SnapshotCell {
  column: DisplayColumn
  text: string
  style: StyleCategory | null
}

export interface SnapshotViewRow {
  ticker: string
  trend: Array<number | null>
  cells: SnapshotCell[]
}

export interface GroupView {
  name: GroupName
  anchor: string
  columns: DisplayColumn[]
  rows: SnapshotViewRow[]
}

export interface NavLink {
  label: GroupName
  href: string
}

export interface SnapshotView {
  groups: GroupView[]
  navigation: NavLink[]
}
