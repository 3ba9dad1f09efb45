import {
  DATE_COLUMN,
  NOTES_COLUMN,
  OBSERVATION_COLUMNS,
  PHOTO_COLUMN,
  SEEN_COLUMN,
  SOURCE_COLUMN,
  SPECIES_COLUMN,
  type SpeciesDataset,
  type SpeciesRecord,
} from './types'
import { err, errorMessage, ok, type FetchError, type Result } from './result'

export const DEFAULT_EXPORT_FILE_NAME = 'birds_db.csv'

/**
 * Split CSV text into rows of cells. Handles quoted commas, doubled quotes,
 * quoted line breaks and CRLF endings.
 */
function parseCSVRows(text: string): string[][] {
  const rows: string[][] = []
  let row: string[] = []
  let current = ''
  let inQuotes = false

  for (let i = 0; i < text.length; i++) {
    const char = text[i]

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          current += '"'
          i++
        } else {
          inQuotes = false
        }
      } else {
        current += char
      }
    } else if (char === '"') {
      inQuotes = true
    } else if (char === ',') {
      row.push(current)
      current = ''
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i++
      row.push(current)
      rows.push(row)
      row = []
      current = ''
    } else {
      current += char
    }
  }

  if (current !== '' || row.length > 0) {
    row.push(current)
    rows.push(row)
  }

  return rows.filter(cells => cells.some(cell => cell.trim() !== ''))
}

export function parseSpeciesCsv(text: string): SpeciesDataset {
  const [headerRow, ...dataRows] = parseCSVRows(text.replace(/^\uFEFF/, ''))
  if (!headerRow) return { headers: [...OBSERVATION_COLUMNS], records: [] }

  const sourceHeaders = headerRow.map(header => header.trim())
  const headers = [...sourceHeaders]
  for (const column of OBSERVATION_COLUMNS) {
    if (!headers.includes(column)) headers.push(column)
  }
  const copySourceFromPhoto = !headers.includes(SOURCE_COLUMN) && headers.includes(PHOTO_COLUMN)
  if (copySourceFromPhoto) headers.push(SOURCE_COLUMN)

  const records = dataRows.map((values): SpeciesRecord => {
    const cells: Record<string, string> = {}
    for (const header of headers) cells[header] = ''
    sourceHeaders.forEach((header, index) => {
      cells[header] = values[index] ?? ''
    })
    if (copySourceFromPhoto) cells[SOURCE_COLUMN] = cells[PHOTO_COLUMN]

    return {
      speciesName: cells[SPECIES_COLUMN] ?? '',
      cells,
      stored: {
        seen: cells[SEEN_COLUMN],
        firstSeenDate: cells[DATE_COLUMN],
        notes: cells[NOTES_COLUMN],
      },
    }
  })

  return { headers, records }
}

function csvCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value
}

function cellFor(record: SpeciesRecord, header: string): string {
  switch (header) {
    case SEEN_COLUMN:
      return record.stored.seen
    case DATE_COLUMN:
      return record.stored.firstSeenDate
    case NOTES_COLUMN:
      return record.stored.notes
    default:
      return record.cells[header] ?? ''
  }
}

/** Serialize records using the dataset's own header order */
export function exportSpeciesCsv(dataset: SpeciesDataset, records: readonly SpeciesRecord[]): string {
  const lines = [
    dataset.headers.map(csvCell).join(','),
    ...records.map(record => dataset.headers.map(header => csvCell(cellFor(record, header))).join(',')),
  ]
  return `${lines.join('\n')}\n`
}

export async function loadSpeciesDataset(
  path: string,
  fetchImpl: typeof fetch = fetch
): Promise<Result<SpeciesDataset, FetchError>> {
  try {
    const response = await fetchImpl(path)
    if (!response.ok) {
      return err({ kind: 'http', url: path, status: response.status })
    }
    return ok(parseSpeciesCsv(await response.text()))
  } catch (error) {
    return err({ kind: 'network', url: path, message: errorMessage(error) })
  }
}

export function downloadCsv(csv: string, fileName = DEFAULT_EXPORT_FILE_NAME): void {
  const url = URL.createObjectURL(new Blob([csv], { type: 'text/csv' }))
  const link = document.createElement('a')
  link.href = url
  link.download = fileName
  document.body.appendChild(link)
  link.click()
  link.remove()
  URL.revokeObjectURL(url)
}
