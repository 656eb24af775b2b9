import { useEffect, useMemo } from 'react'
import { useSnapshotStore } from '../../store/useSnapshotStore'
import { useSnapshotFilters } from '../../hooks/useSnapshotFilters'
import { Card, CardContent, CardHeader } from '../../components/ui/Card'
import Button from '../../components/ui/Button'
import { SnapshotSkeleton } from '../../components/SkeletonLoader'
import SnapshotTable from './SnapshotTable'
import { buildSnapshotView } from './presentation'

export default function SnapshotPage() {
  const table = useSnapshotStore((s) => s.table)
  const loading = useSnapshotStore((s) => s.loading)
  const error = useSnapshotStore((s) => s.error)
  const load = useSnapshotStore((s) => s.load)
  const reload = useSnapshotStore((s) => s.reload)
  const { filters } = useSnapshotFilters()

  useEffect(() => {
    void load()
  }, [load])

  const view = useMemo(
    () => (table ? buildSnapshotView(table, filters) : null),
    [table, filters],
  )

  return (
    <div className="space-y-6">
      <h1 className="text-2xl font-bold">Daily Snapshot</h1>

      {error ? (
        <div className="p-6 text-center text-red-500" role="alert">
          <p>Failed to load snapshot: {error}</p>
          <Button className="mt-2" onClick={() => { void reload() }}>
            Retry
          </Button>
        </div>
      ) : loading && !view ? (
        <SnapshotSkeleton />
      ) : view ? (
        view.groups.length === 0 ? (
          <p className="text-sm text-gray-500">No tickers match the active filters.</p>
        ) : (
          view.groups.map((group) => (
            <Card key={group.name} id={group.anchor}>
              <CardHeader>
                <h2 className="text-lg font-semibold">{group.name}</h2>
              </CardHeader>
              <CardContent className="px-0 py-0">
                <SnapshotTable group={group} />
              </CardContent>
            </Card>
          ))
        )
      ) : null}
    </div>
  )
}
