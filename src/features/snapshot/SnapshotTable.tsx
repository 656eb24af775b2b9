import { clsx } from 'clsx'
import type { DisplayColumn, GroupView, SnapshotCell } from '../../types/snapshot'
import MiniSparkline from '../../components/MiniSparkline'
import { STYLE_COLORS } from './presentation'
import { TREND_Y_MAX, TREND_Y_MIN } from './constants'

// 헤더 표기 (RS Trend 컬럼은 차트라 짧게)
const HEADER_LABELS: Partial<Record<DisplayColumn, string>> = {
  'RS Trend': 'RS',
}

const LEFT_ALIGNED: ReadonlySet<DisplayColumn> = new Set(['Ticker', 'RS Trend'])

function Cell({ cell }: { cell: SnapshotCell }) {
  const color = cell.style ? STYLE_COLORS[cell.style] : undefined
  return (
    <td
      className={clsx(
        'py-2 px-3 whitespace-nowrap',
        LEFT_ALIGNED.has(cell.column) ? 'text-left' : 'text-right',
        cell.column === 'Ticker' && 'font-semibold text-gray-900',
        color && 'font-bold'
      )}
      style={color ? { backgroundColor: color } : undefined}
      data-style={cell.style ?? undefined}
    >
      {cell.text}
    </td>
  )
}

export default function SnapshotTable({ group }: { group: GroupView }) {
  return (
    <div className="overflow-x-auto">
      <table className="w-full text-sm">
        <thead className="bg-gray-50">
          <tr>
            {group.columns.map((column) => (
              <th
                key={column}
                className={clsx(
                  'py-2 px-3 font-medium text-gray-600 whitespace-nowrap',
                  LEFT_ALIGNED.has(column) ? 'text-left' : 'text-right'
                )}
              >
                {HEADER_LABELS[column] ?? column}
              </th>
            ))}
          </tr>
        </thead>
        <tbody className="divide-y divide-gray-100">
          {group.rows.map((row) => (
            <tr key={row.ticker} className="hover:bg-gray-50">
              {row.cells.map((cell) =>
                cell.column === 'RS Trend' ? (
                  <td key={cell.column} className="py-1 px-3">
                    <MiniSparkline data={row.trend} width={80} height={24} yMin={TREND_Y_MIN} yMax={TREND_Y_MAX} />
                  </td>
                ) : (
                  <Cell key={cell.column} cell={cell} />
                )
              )}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  )
}
