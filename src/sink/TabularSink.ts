/**
 * TabularSink: writes pipeline results as CSV and JSON files
 *
 * Each file is written to a temporary path and renamed over the previous run's
 * output, so a reader never sees a half-written table.
 */

import * as fs from 'fs';
import * as path from 'path';

import { createScopedLogger, type Logger } from '../logging/logger.js';
import { rowsWrittenTotal } from '../metrics/index.js';

export type CellValue = string | number | bigint | boolean | null | undefined;

export interface ColumnDefinition<T> {
  header: string;
  value: (row: T) => CellValue;
}

export interface TableDefinition<T> {
  /** File name without extension. */
  name: string;
  columns: ReadonlyArray<ColumnDefinition<T>>;
}

/**
 * Render one cell. Quotes values containing separators, quotes or line breaks.
 * @example formatCell('a,b') // '"a,b"'
 */
export function formatCell(value: CellValue): string {
  let text: string;
  if (value === null || value === undefined) {
    text = '';
  } else if (typeof value === 'number') {
    text = Number.isFinite(value) ? String(value) : '';
  } else {
    text = String(value);
  }
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function renderCsv<T>(table: TableDefinition<T>, rows: readonly T[]): string {
  const header = table.columns.map((column) => formatCell(column.header)).join(',');
  const lines = rows.map((row) => table.columns.map((column) => formatCell(column.value(row))).join(','));
  return [header, ...lines].join('\n') + '\n';
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export class TabularSink {
  private readonly outputDir: string;
  private readonly logger: Logger;

  constructor(outputDir: string, logger: Logger = createScopedLogger('sink')) {
    this.outputDir = outputDir;
    this.logger = logger;
  }

  async writeTable<T>(table: TableDefinition<T>, rows: readonly T[]): Promise<string> {
    const filePath = await this.writeFile(`${table.name}.csv`, renderCsv(table, rows));
    rowsWrittenTotal.inc({ table: table.name }, rows.length);
    this.logger.info('Table written', { table: table.name, rows: rows.length, path: filePath });
    return filePath;
  }

  async writeJson(name: string, value: unknown): Promise<string> {
    return this.writeFile(`${name}.json`, JSON.stringify(value, jsonReplacer, 2) + '\n');
  }

  async writeText(fileName: string, content: string): Promise<string> {
    return this.writeFile(fileName, content);
  }

  private async writeFile(fileName: string, content: string): Promise<string> {
    await fs.promises.mkdir(this.outputDir, { recursive: true });
    const target = path.join(this.outputDir, fileName);
    const temp = `${target}.${process.pid}.tmp`;
    await fs.promises.writeFile(temp, content, 'utf-8');
    await fs.promises.rename(temp, target);
    return target;
  }
}
