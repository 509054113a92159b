/**
 * Export snapshots - CSV and Parquet files named by provider, dataset and run
 *
 * Both formats carry the same columns in the same order (EXPORT_COLUMNS) and
 * read back to the same ExportRow values.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { stringify } from 'csv-stringify/sync';
import { parse } from 'csv-parse/sync';
import { ParquetReader, ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import {
  EXPORT_COLUMNS,
  fromSnapshotValues,
  type ExportRow,
  type RecordKind,
} from '../records';

export interface SnapshotFiles {
  csvPath: string;
  parquetPath: string;
  rows: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// Writing
// =============================================================================

/**
 * Write the CSV + Parquet pair for one dataset; existing files are replaced
 */
export async function writeSnapshot(
  dir: string,
  stem: string,
  kind: RecordKind,
  rows: readonly ExportRow[]
): Promise<SnapshotFiles> {
  await mkdir(dir, { recursive: true });
  const csvPath = join(dir, `${stem}.csv`);
  const parquetPath = join(dir, `${stem}.parquet`);

  await writeCsvSnapshot(csvPath, kind, rows);
  await writeParquetSnapshot(parquetPath, kind, rows);

  return { csvPath, parquetPath, rows: rows.length };
}

export async function writeCsvSnapshot(path: string, kind: RecordKind, rows: readonly ExportRow[]): Promise<void> {
  const columns = EXPORT_COLUMNS[kind].map((column) => column.name);
  const csv = stringify(
    rows.map((row) => Object.fromEntries(columns.map((name) => [name, row[name] ?? null]))),
    { header: true, columns }
  );
  await writeFile(path, csv, 'utf8');
}

export async function writeParquetSnapshot(path: string, kind: RecordKind, rows: readonly ExportRow[]): Promise<void> {
  const columns = EXPORT_COLUMNS[kind];
  const schema = new ParquetSchema(
    Object.fromEntries(
      columns.map((column) => [column.name, { type: column.type, optional: column.optional ?? false }])
    )
  );

  const writer = await ParquetWriter.openFile(schema, path);
  try {
    for (const row of rows) {
      // Unset optional values are left out of the row, not written as null
      const values: Record<string, string | number> = {};
      for (const column of columns) {
        const value = row[column.name];
        if (value !== null && value !== undefined) {
          values[column.name] = value;
        }
      }
      await writer.appendRow(values);
    }
  } finally {
    await writer.close();
  }
}

// =============================================================================
// Reading
// =============================================================================

export async function readCsvSnapshot(path: string, kind: RecordKind): Promise<ExportRow[]> {
  const text = await readFile(path, 'utf8');
  const parsed: unknown = parse(text, { columns: true, skip_empty_lines: true });
  if (!Array.isArray(parsed)) {
    throw new Error(`CSV snapshot ${path} did not parse to rows`);
  }
  return parsed.filter(isRecord).map((raw) => fromSnapshotValues(kind, raw));
}

export async function readParquetSnapshot(path: string, kind: RecordKind): Promise<ExportRow[]> {
  const reader = await ParquetReader.openFile(path);
  try {
    const cursor = reader.getCursor();
    const rows: ExportRow[] = [];
    for (let raw: unknown = await cursor.next(); raw; raw = await cursor.next()) {
      if (isRecord(raw)) {
        rows.push(fromSnapshotValues(kind, raw));
      }
    }
    return rows;
  } finally {
    await reader.close();
  }
}
