import { ColumnarMap } from "./columnar-map"

/**
 * One stored value: (row, family, qualifier, timestamp) → value.
 */
export type Cell = {
  readonly row: Uint8Array
  readonly family: Uint8Array
  readonly qualifier: Uint8Array
  readonly timestamp: number
  readonly value: Uint8Array
}

/**
 * A row as exchanged with a storage-client adapter.
 */
export type RowData = {
  readonly rowKey: Uint8Array
  readonly columns: ColumnarMap
}

/**
 * Flatten a row into cells ordered by family, qualifier, then newest version first.
 */
export function toCells(row: RowData): Cell[] {
  const cells: Cell[] = []

  for (const [family, qualifiers] of row.columns) {
    for (const [qualifier, versions] of qualifiers) {
      for (const [timestamp, value] of versions) {
        cells.push({ row: row.rowKey, family, qualifier, timestamp, value })
      }
    }
  }

  return cells
}

/**
 * Group cells into a ColumnarMap. The row key of each cell is ignored;
 * a later cell with the same coordinates replaces an earlier one.
 */
export function fromCells(cells: Iterable<Cell>): ColumnarMap {
  const columns = new ColumnarMap()

  for (const cell of cells) {
    columns.put(cell.family, cell.qualifier, cell.timestamp, cell.value)
  }

  return columns
}
