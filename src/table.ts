export type Cell = unknown;

/**
 * Row-oriented in-memory table. The column set is the union of keys across
 * the source records, in first-seen order; a key a record lacks is a null cell.
 */
export class Table {
  public readonly columns: readonly string[];
  public readonly rows: readonly Readonly<Record<string, Cell>>[];

  private constructor(columns: string[], rows: Record<string, Cell>[]) {
    this.columns = Object.freeze(columns);
    this.rows = Object.freeze(rows.map((r) => Object.freeze(r)));
  }

  static fromRecords(records: readonly Record<string, unknown>[]): Table {
    const seen = new Set<string>();
    const columns: string[] = [];
    for (const record of records) {
      for (const key of Object.keys(record)) {
        if (!seen.has(key)) {
          seen.add(key);
          columns.push(key);
        }
      }
    }

    const rows = records.map((record) => {
      const row: Record<string, Cell> = {};
      for (const column of columns) {
        row[column] = Object.prototype.hasOwnProperty.call(record, column)
          ? record[column]
          : null;
      }
      return row;
    });

    return new Table(columns, rows);
  }

  get length(): number {
    return this.rows.length;
  }

  /** Values of one column, top to bottom. Throws for an unknown column. */
  column(name: string): Cell[] {
    if (!this.columns.includes(name)) {
      throw new RangeError(`Unknown column "${name}"`);
    }
    return this.rows.map((row) => row[name]);
  }

  head(n = 5): Table {
    return new Table([...this.columns], this.rows.slice(0, Math.max(0, n)).map((r) => ({ ...r })));
  }

  toRecords(): Record<string, Cell>[] {
    return this.rows.map((row) => ({ ...row }));
  }

  /** RFC 4180 CSV with a header row. Nulls become empty fields; objects are JSON. */
  toCSV(): string {
    const lines = [this.columns.map(csvField).join(",")];
    for (const row of this.rows) {
      lines.push(this.columns.map((c) => csvField(row[c])).join(","));
    }
    return lines.join("\r\n") + "\r\n";
  }
}

function csvField(value: Cell): string {
  if (value === null || value === undefined) return "";
  const text = typeof value === "object" ? JSON.stringify(value) : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}
