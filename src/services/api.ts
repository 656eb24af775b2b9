import axios from 'axios'
import type { SnapshotTable } from '../types/snapshot'
import { buildSnapshotFromCsv } from './snapshotBuilder'
import { cachedFetch, SNAPSHOT_CACHE_KEY } from './apiCache'
import { SNAPSHOT_TTL_MS } from '../features/snapshot/constants'

const DATA_BASE_URL = 'https://raw.githubusercontent.com/sanglocn/us_daily/main/data'

export const CSV_URLS = {
  daily: import.meta.env.VITE_DAILY_CSV_URL || `${DATA_BASE_URL}/us_snapshot_ohlcv_daily.csv`,
  weekly: import.meta.env.VITE_WEEKLY_CSV_URL || `${DATA_BASE_URL}/us_snapshot_ohlcv_weekly.csv`,
}

const api = axios.create({
  timeout: 30_000,
  responseType: 'text',
  headers: {
    Accept: 'text/csv',
  },
})

export async function fetchCsv(url: string): Promise<string> {
  const { data } = await api.get<string>(url)
  return data
}

export const snapshotApi = {
  // 일봉/주봉 CSV 동시 로드 → 스냅샷 생성 (1시간 캐시)
  load: () =>
    cachedFetch<SnapshotTable>(
      SNAPSHOT_CACHE_KEY,
      async () => {
        const [daily, weekly] = await Promise.all([
          fetchCsv(CSV_URLS.daily),
          fetchCsv(CSV_URLS.weekly),
        ])
        return buildSnapshotFromCsv(daily, weekly)
      },
      SNAPSHOT_TTL_MS,
    ),
}
