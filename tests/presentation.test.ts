import { describe, it, expect } from 'vitest'
import {
  applyFilters,
  buildSnapshotView,
  formatCheck,
  formatExtension,
  formatPercent,
  formatStage,
  formatVolume,
  groupAnchor,
  partitionByGroup,
  styleExtension,
  styleRank,
  styleReturn,
} from '../src/features/snapshot/presentation'
import { buildSnapshotFromCsv } from '../src/services/snapshotBuilder'
import { DEFAULT_FILTERS, DISPLAY_ORDER, GROUP_ORDER } from '../src/features/snapshot/constants'
import type { SnapshotFilters, SnapshotRow } from '../src/types/snapshot'
import { DAILY_CSV, DAILY_HEADER, WEEKLY_CSV, WEEKLY_HEADER, csv } from './fixtures'

function makeRow(overrides: Partial<SnapshotRow> = {}): SnapshotRow {
  return {
    'Ticker': 'TEST',
    'RS Trend': [1],
    'RS 1M': 0.9,
    'RS 1Y': 0.9,
    'Volume': 'Normal',
    'Intraday': 0.01,
    '1D Return': 0.01,
    'Extension': 2,
    '> SMA10': 'True',
    '> SMA20': 'True',
    'Stage': 2,
    group: 'Market',
    ...overrides,
  }
}

const ALL_FILTERS: SnapshotFilters = {
  strongRs1m: true,
  strongRs1y: true,
  lowExtension: true,
  coreStage2: true,
}

describe('formatting', () => {
  it('formats percentages with the given decimals', () => {
    expect(formatPercent(0.123, 1)).toBe('12.3%')
    expect(formatPercent(-0.005, 1)).toBe('-0.5%')
    expect(formatPercent(0.456, 0)).toBe('46%')
    expect(formatPercent(null)).toBe('')
  })

  it('formats extension with one decimal', () => {
    expect(formatExtension(3.14159)).toBe('3.1')
    expect(formatExtension(null)).toBe('')
  })

  it('maps stage codes to markers', () => {
    expect(formatStage(1)).toBe('🟡')
    expect(formatStage(2)).toBe('🟢')
    expect(formatStage(3)).toBe('🟠')
    expect(formatStage(4)).toBe('🔴')
    expect(formatStage(5)).toBe('⚪')
    expect(formatStage(null)).toBe('⚪')
  })

  it('maps volume labels to markers', () => {
    expect(formatVolume('Pocket')).toBe('💎')
    expect(formatVolume('Normal')).toBe('⚪')
    expect(formatVolume('Heavy')).toBe('⚪')
    expect(formatVolume(null)).toBe('⚪')
  })

  it('maps boolean-like values to check marks', () => {
    expect(formatCheck('TRUE')).toBe('✅')
    expect(formatCheck('yes')).toBe('✅')
    expect(formatCheck('1.0')).toBe('✅')
    expect(formatCheck('0')).toBe('❌')
    expect(formatCheck('False')).toBe('❌')
    expect(formatCheck(null)).toBe('')
  })
})

describe('styling', () => {
  it('styles returns by sign', () => {
    expect(styleReturn(0.001)).toBe('positive')
    expect(styleReturn(0)).toBe('negative')
    expect(styleReturn(-0.02)).toBe('negative')
    expect(styleReturn(null)).toBeNull()
  })

  it('styles ranks at the thresholds', () => {
    expect(styleRank(0.85)).toBe('strong')
    expect(styleRank(0.849999)).toBe('neutral')
    expect(styleRank(0.5)).toBe('neutral')
    expect(styleRank(0.49)).toBe('weak')
    expect(styleRank(null)).toBeNull()
  })

  it('styles extension with inclusive upper bounds', () => {
    expect(styleExtension(-0.1)).toBe('neutral')
    expect(styleExtension(0)).toBe('strong')
    expect(styleExtension(4)).toBe('strong')
    expect(styleExtension(4.0001)).toBe('caution')
    expect(styleExtension(10)).toBe('caution')
    expect(styleExtension(10.0001)).toBe('weak')
    expect(styleExtension(null)).toBeNull()
  })
})

describe('applyFilters', () => {
  it('returns every row when no filter is active', () => {
    const rows = [makeRow(), makeRow({ 'RS 1M': null })]
    expect(applyFilters(rows, DEFAULT_FILTERS)).toHaveLength(2)
  })

  it('keeps only stage 2 under the core model filter', () => {
    const filters = { ...DEFAULT_FILTERS, coreStage2: true }
    const rows = [
      makeRow({ Ticker: 'A', Stage: 2 }),
      makeRow({ Ticker: 'B', Stage: 3 }),
      makeRow({ Ticker: 'C', Stage: null }),
    ]
    expect(applyFilters(rows, filters).map((r) => r.Ticker)).toEqual(['A'])
  })

  it('excludes missing values under threshold filters', () => {
    const rows = [
      makeRow({ Ticker: 'A' }),
      makeRow({ Ticker: 'B', 'RS 1M': null }),
      makeRow({ Ticker: 'C', 'RS 1Y': null }),
      makeRow({ Ticker: 'D', Extension: null }),
    ]
    expect(applyFilters(rows, { ...DEFAULT_FILTERS, strongRs1m: true }).map((r) => r.Ticker)).toEqual(['A', 'C', 'D'])
    expect(applyFilters(rows, { ...DEFAULT_FILTERS, strongRs1y: true }).map((r) => r.Ticker)).toEqual(['A', 'B', 'D'])
    expect(applyFilters(rows, { ...DEFAULT_FILTERS, lowExtension: true }).map((r) => r.Ticker)).toEqual(['A', 'B', 'C'])
  })

  it('uses inclusive thresholds', () => {
    const rows = [
      makeRow({ Ticker: 'A', 'RS 1M': 0.85, Extension: 4 }),
      makeRow({ Ticker: 'B', 'RS 1M': 0.849999, Extension: 4 }),
      makeRow({ Ticker: 'C', 'RS 1M': 0.85, Extension: 4.0001 }),
    ]
    const filters = { ...DEFAULT_FILTERS, strongRs1m: true, lowExtension: true }
    expect(applyFilters(rows, filters).map((r) => r.Ticker)).toEqual(['A'])
  })

  it('never grows the surviving set when another filter is enabled', () => {
    const rows = buildSnapshotFromCsv(DAILY_CSV, WEEKLY_CSV).rows
    const filters: SnapshotFilters = { ...DEFAULT_FILTERS }
    let previous = applyFilters(rows, filters).length
    for (const key of ['strongRs1m', 'strongRs1y', 'lowExtension', 'coreStage2'] as const) {
      filters[key] = true
      const count = applyFilters(rows, filters).length
      expect(count).toBeLessThanOrEqual(previous)
      previous = count
    }
  })
})

describe('partitionByGroup', () => {
  it('splits rows by group in the fixed order and drops empty groups', () => {
    const rows = [
      makeRow({ Ticker: 'A', group: 'Leader' }),
      makeRow({ Ticker: 'B', group: 'Market' }),
      makeRow({ Ticker: 'C', group: 'Leader' }),
    ]
    const sections = partitionByGroup(rows)
    expect(sections.map((s) => s.name)).toEqual(['Market', 'Leader'])
    expect(sections[1].rows.map((r) => r.Ticker)).toEqual(['A', 'C'])
    expect(sections[1].anchor).toBe('leader')
  })

  it('covers every row with a known group exactly once', () => {
    const rows = GROUP_ORDER.map((group, i) => makeRow({ Ticker: `T${i}`, group }))
    const sections = partitionByGroup(rows)
    const tickers = sections.flatMap((s) => s.rows.map((r) => r.Ticker))
    expect(tickers.sort()).toEqual(rows.map((r) => r.Ticker).sort())
    expect(new Set(tickers).size).toBe(tickers.length)
  })

  it('leaves out rows with an unknown or missing group', () => {
    const rows = [makeRow({ group: 'Bonds' }), makeRow({ group: null })]
    expect(partitionByGroup(rows)).toEqual([])
  })

  it('builds anchors from lower-cased names', () => {
    expect(groupAnchor('Market')).toBe('market')
    expect(groupAnchor('Emerging Theme')).toBe('emerging-theme')
  })
})

describe('buildSnapshotView', () => {
  it('renders the AAPL scenario with the core model filter', () => {
    const daily = csv(
      DAILY_HEADER,
      'AAPL,2024-01-02,1.0,0.01,0.02,0.8,0.9,Normal,2.5,True,False,Market',
      'AAPL,2024-01-03,1.2,0.01,0.02,0.8,0.9,Normal,2.5,True,False,Market',
      'AAPL,2024-01-04,1.5,0.01,0.02,0.8,0.9,Normal,2.5,True,False,Market',
    )
    const filters = { ...DEFAULT_FILTERS, coreStage2: true }

    const stage2 = buildSnapshotFromCsv(daily, csv(WEEKLY_HEADER, 'AAPL,2024-01-05,2'))
    const view = buildSnapshotView(stage2, filters)
    expect(view.groups).toHaveLength(1)
    expect(view.groups[0].name).toBe('Market')
    expect(view.groups[0].rows[0].trend).toEqual([1.0, 1.2, 1.5])

    const stage3 = buildSnapshotFromCsv(daily, csv(WEEKLY_HEADER, 'AAPL,2024-01-05,3'))
    expect(buildSnapshotView(stage3, filters).groups).toEqual([])
  })

  it('formats and styles every cell in display order', () => {
    const table = buildSnapshotFromCsv(DAILY_CSV, WEEKLY_CSV)
    const view = buildSnapshotView(table, DEFAULT_FILTERS)
    const market = view.groups[0]
    expect(market.columns).toEqual([...DISPLAY_ORDER])
    expect(market.rows[0].cells).toEqual([
      { column: 'Ticker', text: 'AAPL', style: null },
      { column: 'RS Trend', text: '', style: null },
      { column: 'RS 1M', text: '90%', style: 'strong' },
      { column: 'RS 1Y', text: '95%', style: 'strong' },
      { column: 'Volume', text: '💎', style: null },
      { column: 'Intraday', text: '1.2%', style: 'positive' },
      { column: '1D Return', text: '-0.5%', style: 'negative' },
      { column: 'Extension', text: '3.1', style: 'strong' },
      { column: '> SMA10', text: '✅', style: null },
      { column: '> SMA20', text: '✅', style: null },
      { column: 'Stage', text: '🟢', style: null },
    ])
  })

  it('orders groups and lists every group in the navigation', () => {
    const view = buildSnapshotView(buildSnapshotFromCsv(DAILY_CSV, WEEKLY_CSV), DEFAULT_FILTERS)
    expect(view.groups.map((g) => g.name)).toEqual(['Market', 'Commodity', 'Leader'])
    expect(view.navigation).toEqual(GROUP_ORDER.map((name) => ({ label: name, href: `#${name.toLowerCase()}` })))
  })

  it('returns a frozen view', () => {
    const view = buildSnapshotView(buildSnapshotFromCsv(DAILY_CSV, WEEKLY_CSV), ALL_FILTERS)
    expect(Object.isFrozen(view)).toBe(true)
  })
})
