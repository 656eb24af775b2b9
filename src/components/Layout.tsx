import { useMemo } from 'react'
import { clsx } from 'clsx'
import Toggle from './ui/Toggle'
import Button from './ui/Button'
import { useSnapshotFilters } from '../hooks/useSnapshotFilters'
import { useSnapshotStore } from '../store/useSnapshotStore'
import { FILTER_OPTIONS } from '../features/snapshot/constants'
import { buildNavigation } from '../features/snapshot/presentation'

interface LayoutProps {
  children: React.ReactNode
}

function SectionTitle({ children }: { children: React.ReactNode }) {
  return (
    <div className="px-2 mb-1.5 text-[10px] font-semibold uppercase tracking-wider text-gray-400">
      {children}
    </div>
  )
}

export default function Layout({ children }: LayoutProps) {
  const { filters, setFilter, resetFilters } = useSnapshotFilters()
  const reload = useSnapshotStore((s) => s.reload)
  const loading = useSnapshotStore((s) => s.loading)
  const loadedAt = useSnapshotStore((s) => s.loadedAt)
  const navigation = useMemo(() => buildNavigation(), [])
  const anyActive = FILTER_OPTIONS.some(({ key }) => filters[key])

  return (
    <div className="min-h-screen bg-gray-50 flex">
      {/* 사이드바 */}
      <aside
        className={clsx(
          'fixed top-0 left-0 h-full w-56 z-40 flex flex-col',
          'bg-white border-r border-gray-200'
        )}
      >
        <div className="flex items-center h-12 px-4 border-b border-gray-200 flex-shrink-0">
          <span className="text-sm font-bold text-gray-900 whitespace-nowrap">Daily Snapshot</span>
        </div>

        <nav className="flex-1 overflow-y-auto overflow-x-hidden py-2 px-2">
          <div>
            <SectionTitle>Filters</SectionTitle>
            {FILTER_OPTIONS.map(({ key, label, help }) => (
              <Toggle
                key={key}
                label={label}
                help={help}
                checked={filters[key]}
                onChange={(value) => setFilter(key, value)}
              />
            ))}
            {anyActive && (
              <button
                type="button"
                onClick={resetFilters}
                className="mt-1 px-2.5 text-xs text-gray-400 hover:text-gray-600"
              >
                Clear filters
              </button>
            )}
          </div>

          <div className="mt-3 pt-3 border-t border-gray-100">
            <SectionTitle>Navigation</SectionTitle>
            {navigation.map((link) => (
              <a
                key={link.href}
                href={link.href}
                className="flex items-center px-2.5 py-1.5 rounded-lg text-sm font-medium text-gray-600 hover:bg-gray-100 hover:text-gray-900 transition-colors"
              >
                {link.label}
              </a>
            ))}
          </div>
        </nav>

        {/* 하단 고정: 새로고침 */}
        <div className="flex-shrink-0 border-t border-gray-200 p-2 space-y-1">
          <Button tone="subtle" className="w-full" busy={loading} onClick={() => { void reload() }}>
            Reload data
          </Button>
          {loadedAt !== null && (
            <div className="px-2 text-[10px] text-gray-400">
              Loaded {new Date(loadedAt).toLocaleTimeString()}
            </div>
          )}
        </div>
      </aside>

      {/* 메인 콘텐츠 영역 */}
      <div className="flex-1 ml-56">
        <main className="p-6">
          {children}
        </main>
      </div>
    </div>
  )
}
