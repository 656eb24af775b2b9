import type { DisplayColumn, GroupName, SnapshotFilters } from '../../types/snapshot'

export const GROUP_ORDER: readonly GroupName[] = [
  'Market', 'Sector', 'Commodity', 'Crypto', 'Country', 'Theme', 'Leader',
]

export const DISPLAY_ORDER: readonly DisplayColumn[] = [
  'Ticker', 'RS Trend', 'RS 1M', 'RS 1Y', 'Volume',
  'Intraday', '1D Return', 'Extension',
  '> SMA10', '> SMA20', 'Stage',
]

// 원본 컬럼명 → 표시 컬럼명 (RS Trend 는 파생 컬럼이라 없음)
export const COLUMN_RENAME = {
  ticker: 'Ticker',
  ret_intraday: 'Intraday',
  ret_1d: '1D Return',
  rs_rank_21d: 'RS 1M',
  rs_rank_252d: 'RS 1Y',
  pp_volume: 'Volume',
  ratio_pct_dist_to_atr_pct: 'Extension',
  above_sma10: '> SMA10',
  above_sma20: '> SMA20',
  stage_label_core: 'Stage',
} as const satisfies Record<string, DisplayColumn>

export const DAILY_COLUMNS = [
  'ticker', 'date', 'rs_to_spy', 'ret_intraday', 'ret_1d',
  'rs_rank_21d', 'rs_rank_252d', 'pp_volume', 'ratio_pct_dist_to_atr_pct',
  'above_sma10', 'above_sma20',
] as const

export const WEEKLY_COLUMNS = ['ticker', 'date', 'stage_label_core'] as const

export const GROUP_COLUMN = 'group'

// CSV 결측값 표기
export const NA_VALUES: ReadonlySet<string> = new Set([
  '', 'NaN', 'nan', 'NA', 'N/A', 'n/a', 'null', 'NULL', 'None', '<NA>', '#N/A',
])

export const RANK_STRONG = 0.85
export const RANK_NEUTRAL = 0.5
export const EXTENSION_LOW = 4
export const EXTENSION_HIGH = 10
export const CORE_STAGE = 2

export const SNAPSHOT_TTL_MS = 60 * 60 * 1000 // 1시간

// RS Trend 차트 y축 범위
export const TREND_Y_MIN = 0
export const TREND_Y_MAX = 20

export const DEFAULT_FILTERS: SnapshotFilters = {
  strongRs1m: false,
  strongRs1y: false,
  lowExtension: false,
  coreStage2: false,
}

export const FILTER_OPTIONS: ReadonlyArray<{
  key: keyof SnapshotFilters
  param: string
  label: string
  help: string
}> = [
  { key: 'strongRs1m', param: 'rs1m', label: 'Strong RS 1M', help: 'Hide all tickers with RS Rank (1M) below 85%' },
  { key: 'strongRs1y', param: 'rs1y', label: 'Strong RS 1Y', help: 'Hide all tickers with RS Rank (1Y) below 85%' },
  { key: 'lowExtension', param: 'ext', label: 'Low Extension', help: 'Hide all tickers with Extension Multiple above 4' },
  { key: 'coreStage2', param: 'stage2', label: 'Core Model', help: 'Hide all tickers different from Stage 2 in Core Model' },
]
