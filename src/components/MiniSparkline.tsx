/** SVG 미니 스파크라인. 결측값 구간은 선을 끊어서 그림 */
export default function MiniSparkline({
  data,
  width = 80,
  height = 24,
  yMin,
  yMax,
  className,
}: {
  data: Array<number | null>
  width?: number
  height?: number
  /** 지정 시 y축 고정 (범위 밖 값은 잘림) */
  yMin?: number
  yMax?: number
  className?: string
}) {
  const values = data.filter((v): v is number => v !== null && Number.isFinite(v))
  if (values.length === 0) return null

  const min = yMin ?? Math.min(...values)
  const max = yMax ?? Math.max(...values)
  const range = max - min || 1
  const padding = 1
  const step = data.length > 1 ? (width - padding * 2) / (data.length - 1) : 0

  const toPoint = (v: number, i: number) => {
    const clamped = Math.min(Math.max(v, min), max)
    const x = data.length > 1 ? padding + i * step : width / 2
    const y = height - padding - ((clamped - min) / range) * (height - padding * 2)
    return `${x.toFixed(1)},${y.toFixed(1)}`
  }

  const segments: string[][] = []
  let current: string[] = []
  data.forEach((v, i) => {
    if (v === null || !Number.isFinite(v)) {
      if (current.length > 0) segments.push(current)
      current = []
      return
    }
    current.push(toPoint(v, i))
  })
  if (current.length > 0) segments.push(current)

  const isUp = values[values.length - 1] >= values[0]
  const color = isUp ? '#16a34a' : '#dc2626'

  return (
    <svg width={width} height={height} className={className} role="img" aria-label="RS trend">
      {segments.map((points, i) => {
        if (points.length === 1) {
          const [cx, cy] = points[0].split(',')
          return <circle key={i} cx={cx} cy={cy} r={1.5} fill={color} />
        }
        return (
          <polyline
            key={i}
            points={points.join(' ')}
            fill="none"
            stroke={color}
            strokeWidth={1.5}
            strokeLinecap="round"
            strokeLinejoin="round"
          />
        )
      })}
    </svg>
  )
}
