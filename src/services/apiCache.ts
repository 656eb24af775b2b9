/**
 * 간단한 메모리 기반 API 캐시.
 * TTL 동안 같은 키의 결과를 재사용하고, 진행 중인 요청은 공유합니다.
 */

interface CacheEntry<T> {
  data: T
  timestamp: number
}

const cache = new Map<string, CacheEntry<unknown>>()
const inflight = new Map<string, Promise<unknown>>()

const DEFAULT_TTL_MS = 60_000 // 1분

/**
 * 캐시 래퍼. TTL 내 동일 키 요청은 캐시에서 반환.
 * 실패한 요청은 캐시하지 않습니다.
 *
 * @param key - 캐시 키
 * @param fetcher - 실제 로드 함수
 * @param ttlMs - 캐시 유효 시간 (ms, 기본 1분)
 */
export async function cachedFetch<T>(
  key: string,
  fetcher: () => Promise<T>,
  ttlMs: number = DEFAULT_TTL_MS,
): Promise<T> {
  const entry = cache.get(key) as CacheEntry<T> | undefined
  if (entry && Date.now() - entry.timestamp < ttlMs) {
    return entry.data
  }

  const pending = inflight.get(key) as Promise<T> | undefined
  if (pending) return pending

  const request: Promise<T> = fetcher()
    .then((data) => {
      // 무효화 이후 끝난 요청은 캐시에 남기지 않음
      if (inflight.get(key) === request) {
        cache.set(key, { data, timestamp: Date.now() })
      }
      return data
    })
    .finally(() => {
      if (inflight.get(key) === request) inflight.delete(key)
    })
  inflight.set(key, request)
  return request
}

/**
 * 특정 키의 캐시를 무효화합니다.
 */
export function invalidateCache(key: string): void {
  cache.delete(key)
  inflight.delete(key)
}

/**
 * 모든 캐시를 비웁니다.
 */
export function clearCache(): void {
  cache.clear()
  inflight.clear()
}

export const SNAPSHOT_CACHE_KEY = 'snapshot'

export function invalidateSnapshot(): void {
  invalidateCache(SNAPSHOT_CACHE_KEY)
}
