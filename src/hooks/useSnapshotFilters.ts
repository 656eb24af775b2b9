import { useCallback, useMemo } from 'react'
import { useSearchParams } from 'react-router-dom'
import type { SnapshotFilters } from '../types/snapshot'
import { DEFAULT_FILTERS, FILTER_OPTIONS } from '../features/snapshot/constants'

interface UseSnapshotFiltersReturn {
  filters: SnapshotFilters
  setFilter: (key: keyof SnapshotFilters, value: boolean) => void
  resetFilters: () => void
}

export function filtersFromParams(params: URLSearchParams): SnapshotFilters {
  const filters = { ...DEFAULT_FILTERS }
  for (const option of FILTER_OPTIONS) {
    filters[option.key] = params.get(option.param) === '1'
  }
  return filters
}

// 켜진 필터만 URL 에 남김
export function filtersToParams(filters: SnapshotFilters): URLSearchParams {
  const params = new URLSearchParams()
  for (const option of FILTER_OPTIONS) {
    if (filters[option.key]) params.set(option.param, '1')
  }
  return params
}

/**
 * 필터 토글 상태 관리 훅
 * - URL 파라미터 동기화 (공유 가능)
 */
export function useSnapshotFilters(): UseSnapshotFiltersReturn {
  const [searchParams, setSearchParams] = useSearchParams()

  const filters = useMemo(() => filtersFromParams(searchParams), [searchParams])

  const setFilter = useCallback((key: keyof SnapshotFilters, value: boolean) => {
    setSearchParams(
      (prev) => filtersToParams({ ...filtersFromParams(prev), [key]: value }),
      { replace: true },
    )
  }, [setSearchParams])

  const resetFilters = useCallback(() => {
    setSearchParams(new URLSearchParams(), { replace: true })
  }, [setSearchParams])

  return { filters, setFilter, resetFilters }
}
