import type { SourceName } from '../types/snapshot'

export class SnapshotError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

interface DataFormatDetail {
  source: SourceName
  row?: number
  column?: string
  value?: string
  cause?: unknown
}

/** 날짜/숫자/CSV 형식 오류. row 는 헤더 제외 1부터 */
export class DataFormatError extends SnapshotError {
  readonly source: SourceName
  readonly row?: number
  readonly column?: string
  readonly value?: string

  constructor(message: string, detail: DataFormatDetail) {
    super(message, { cause: detail.cause })
    this.source = detail.source
    this.row = detail.row
    this.column = detail.column
    this.value = detail.value
  }
}

export class SchemaError extends SnapshotError {
  readonly source: SourceName
  readonly missing: string[]

  constructor(source: SourceName, missing: string[]) {
    super(`${source} source is missing required column(s): ${missing.join(', ')}`)
    this.source = source
    this.missing = missing
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
