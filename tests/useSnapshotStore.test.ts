import { describe, it, expect, vi, beforeEach } from 'vitest'
import { useSnapshotStore } from '../src/store/useSnapshotStore'
import { buildSnapshotFromCsv } from '../src/services/snapshotBuilder'
import { DAILY_CSV, WEEKLY_CSV } from './fixtures'

const { mockLoad } = vi.hoisted(() => ({ mockLoad: vi.fn() }))

vi.mock('../src/services/api', () => ({
  snapshotApi: { load: mockLoad },
}))

describe('useSnapshotStore', () => {
  beforeEach(() => {
    mockLoad.mockReset()
    useSnapshotStore.setState({ table: null, loading: false, error: null, loadedAt: null })
  })

  it('stores the loaded table', async () => {
    const table = buildSnapshotFromCsv(DAILY_CSV, WEEKLY_CSV)
    mockLoad.mockResolvedValue(table)

    await useSnapshotStore.getState().load()

    const state = useSnapshotStore.getState()
    expect(state.table).toBe(table)
    expect(state.loading).toBe(false)
    expect(state.error).toBeNull()
    expect(state.loadedAt).not.toBeNull()
  })

  it('drops the previous table when loading fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    useSnapshotStore.setState({ table: buildSnapshotFromCsv(DAILY_CSV, WEEKLY_CSV) })
    mockLoad.mockRejectedValue(new Error('daily source is missing required column(s): date'))

    await useSnapshotStore.getState().load()

    const state = useSnapshotStore.getState()
    expect(state.table).toBeNull()
    expect(state.error).toBe('daily source is missing required column(s): date')
    expect(state.loading).toBe(false)
  })

  it('reload fetches again', async () => {
    mockLoad.mockResolvedValue(buildSnapshotFromCsv(DAILY_CSV, WEEKLY_CSV))

    await useSnapshotStore.getState().load()
    await useSnapshotStore.getState().reload()

    expect(mockLoad).toHaveBeenCalledTimes(2)
  })
})
