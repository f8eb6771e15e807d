export interface ConstTable<D> {
  numRows: number;
  numCols: number;
  getCell(row: number, col: number): D;
  toDebugStr(): string;
}

/**
 * A fixed grid of cells, used to render parse tables as text.
 */
export class Table<D> implements ConstTable<D> {
  private rows: D[][] = [];
  private _numCols: number = 0;
  get numRows() {
    return this.rows.length;
  }
  get numCols() {
    return this._numCols;
  }

  static init<D>(numRows: number, numCols: number, value: () => D) {
    let table: Table<D> = new Table();
    table._numCols = numCols;
    for (let row = 0; row < numRows; row++) {
      let cols: D[] = [];
      for (let c = 0; c < numCols; c++) {
        cols.push(value());
      }
      table.rows.push(cols);
    }
    return table;
  }

  /**
   * Set the value of the cell at the given row/col to the given value.
   */
  setCell(row: number, col: number, value: D) {
    if (row < 0 || row >= this.rows.length) {
      throw new Error(
        `TableIndexError: Invalid row ${row}. Must be between 0 and ${this.rows.length} exclusive`
      );
    }
    if (col < 0 || col >= this._numCols) {
      throw new Error(
        `TableIndexError: Invalid col ${col}. Must be between 0 and ${this._numCols} exclusive`
      );
    }
    this.rows[row][col] = value;
  }

  getCell(row: number, col: number): D {
    return this.rows[row][col];
  }

  /**
   * Left aligned columns, two spaces apart, with no trailing whitespace.
   */
  toDebugStr() {
    let minWidths: number[] = [];
    for (let ci = 0; ci < this.numCols; ci++) {
      let minWidth = 1;
      for (let ri = 0; ri < this.numRows; ri++) {
        minWidth = Math.max(minWidth, `${this.getCell(ri, ci)}`.length);
      }
      minWidths.push(minWidth);
    }

    const lines: string[] = [];
    for (let row = 0; row < this.numRows; row++) {
      let line = '';
      for (let col = 0; col < this.numCols; col++) {
        const cell = `${this.getCell(row, col)}`.padEnd(minWidths[col]);
        line += col === 0 ? cell : '  ' + cell;
      }
      lines.push(line.trimEnd());
    }
    return lines.join('\n');
  }
}
