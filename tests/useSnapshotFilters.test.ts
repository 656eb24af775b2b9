import { describe, it, expect } from 'vitest'
import { filtersFromParams, filtersToParams } from '../src/hooks/useSnapshotFilters'
import { DEFAULT_FILTERS } from '../src/features/snapshot/constants'

describe('filter URL params', () => {
  it('reads only params set to 1', () => {
    expect(filtersFromParams(new URLSearchParams('rs1m=1&ext=0&stage2=1&foo=1'))).toEqual({
      strongRs1m: true,
      strongRs1y: false,
      lowExtension: false,
      coreStage2: true,
    })
  })

  it('defaults to every filter off', () => {
    expect(filtersFromParams(new URLSearchParams())).toEqual(DEFAULT_FILTERS)
  })

  it('writes only active filters', () => {
    const params = filtersToParams({ ...DEFAULT_FILTERS, strongRs1y: true, lowExtension: true })
    expect(params.toString()).toBe('rs1y=1&ext=1')
    expect(filtersToParams(DEFAULT_FILTERS).toString()).toBe('')
  })
})
