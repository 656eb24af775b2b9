import { parse } from 'csv-parse/sync'
import type { CsvRecord, CsvTable, SourceName } from '../types/snapshot'
import { DataFormatError, SchemaError } from './errors'

/**
 * CSV 텍스트를 레코드 배열로 변환하고 필수 컬럼을 검사합니다.
 * 행이 하나도 없어도 헤더는 검사합니다.
 */
export function parseCsv(
  text: string,
  requiredColumns: readonly string[],
  source: SourceName,
): CsvTable {
  let header: string[] = []
  let records: CsvRecord[]

  try {
    records = parse(text, {
      columns: (names: string[]) => {
        header = names.map((name) => name.trim())
        return header
      },
      skip_empty_lines: true,
      trim: true,
      bom: true,
    })
  } catch (err) {
    throw new DataFormatError(`${source} CSV could not be parsed: ${err instanceof Error ? err.message : String(err)}`, {
      source,
      cause: err,
    })
  }

  const missing = requiredColumns.filter((col) => !header.includes(col))
  if (missing.length > 0) {
    throw new SchemaError(source, missing)
  }

  return { columns: header, records }
}
