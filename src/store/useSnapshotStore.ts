import { create } from 'zustand'
import type { SnapshotTable } from '../types/snapshot'
import { snapshotApi } from '../services/api'
import { invalidateSnapshot } from '../services/apiCache'
import { errorMessage } from '../services/errors'

interface SnapshotState {
  table: SnapshotTable | null
  loading: boolean
  error: string | null
  loadedAt: number | null

  load: () => Promise<void>
  reload: () => Promise<void>
}

export const useSnapshotStore = create<SnapshotState>((set, get) => ({
  table: null,
  loading: false,
  error: null,
  loadedAt: null,

  load: async () => {
    set({ loading: true, error: null })
    try {
      const table = await snapshotApi.load()
      set({ table, loading: false, loadedAt: Date.now() })
    } catch (err) {
      console.error('스냅샷 로드 실패:', err)
      // 일부만 보여주지 않음: 실패 시 이전 결과도 비움
      set({ table: null, error: errorMessage(err), loading: false })
    }
  },

  reload: async () => {
    invalidateSnapshot()
    await get().load()
  },
}))
