// pattern: Imperative Shell
import { appendFileSync, mkdirSync, readFileSync, rmSync } from "node:fs";
import { dirname } from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { ConfigError } from "../errors";

const csvRowsSchema = z.array(z.array(z.string()));

export type CsvValue = string | number | null;

export type CsvColumn<T> = {
  readonly key: keyof T & string;
  readonly header: string;
};

export type CsvAppender<T> = {
  readonly path: string;
  readonly append: (record: T) => void;
};

export type CsvRow<Shape extends z.ZodRawShape> = z.objectOutputType<Shape, z.ZodTypeAny, "strip">;

/**
 * Reads a CSV with a header row and parses every data row against `shape`.
 * The shape's keys are the required columns: if the header lacks one of them a
 * {@link ConfigError} is thrown before any row is returned. Cells are trimmed
 * and missing cells read as empty strings.
 */
export function readCsvRows<Shape extends z.ZodRawShape>(
  path: string,
  shape: Shape,
): Array<CsvRow<Shape>> {
  const schema = z.object(shape);

  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`failed to read input CSV at ${path}: ${message}`);
  }

  let rows: Array<Array<string>>;
  try {
    rows = csvRowsSchema.parse(
      parse(raw, { bom: true, skip_empty_lines: true, relax_column_count: true }),
    );
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`failed to parse input CSV at ${path}: ${message}`);
  }

  const [header = [], ...body] = rows;
  const names = header.map((name) => name.trim());
  const required = Object.keys(shape);
  const missing = required.filter((column) => !names.includes(column));
  if (missing.length > 0) {
    throw new ConfigError(
      `missing required columns in ${path}: ${missing.join(", ")}`,
    );
  }

  return body.map((row, index) => {
    const cells: Record<string, string> = {};
    for (const column of required) {
      cells[column] = (row[names.indexOf(column)] ?? "").trim();
    }
    const result = schema.safeParse(cells);
    if (!result.success) {
      throw new ConfigError(
        `invalid row ${index + 2} in ${path}: ${result.error.issues.map((i) => i.message).join(", ")}`,
      );
    }
    return result.data;
  });
}

/**
 * Starts a fresh output file: any existing file at `path` is removed now, and
 * each appended record is written immediately. The header goes out with the
 * first record, so a run that produces nothing leaves no file behind.
 */
export function createCsvAppender<T extends Readonly<Record<string, CsvValue>>>(
  path: string,
  columns: ReadonlyArray<CsvColumn<T>>,
): CsvAppender<T> {
  rmSync(path, { force: true });
  mkdirSync(dirname(path), { recursive: true });

  let wroteHeader = false;

  return {
    path,
    append(record) {
      const line = stringify([record], {
        header: !wroteHeader,
        columns: columns.map((c) => ({ key: c.key, header: c.header })),
      });
      appendFileSync(path, line, "utf-8");
      wroteHeader = true;
    },
  };
}
