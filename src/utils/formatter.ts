// File: src/utils/formatter.ts
// Console output for command results

import { Table } from 'console-table-printer'

/**
 * Flatten a row for table display: nested objects become JSON strings
 */
function processObjectValues(obj: object): Record<string, unknown> {
  const result: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(obj)) {
    if (typeof value === 'object' && value !== null && !(value instanceof Date)) {
      result[key] = JSON.stringify(value)
    } else {
      result[key] = value
    }
  }

  return result
}

/**
 * Format and display output based on the specified format
 */
export function formatOutput(data: object | object[] | undefined, format = 'table'): void {
  if (!data) {
    console.log('No data returned')
    return
  }

  switch (format.toLowerCase()) {
    case 'json':
      console.log(JSON.stringify(data, null, 2))
      break

    case 'table': {
      const rows = Array.isArray(data) ? data : [data]
      if (rows.length === 0) {
        console.log('No data returned')
        break
      }

      const table = new Table()
      rows.forEach((item) => {
        table.addRow(processObjectValues(item))
      })
      table.printTable()
      break
    }

    default:
      console.log('Unsupported output format. Using JSON:')
      console.log(JSON.stringify(data, null, 2))
  }
}
