import { type AddressListResult, normalizeAddressList } from "@shotbatch/core";
import { parse } from "csv-parse/sync";
import { z } from "zod";

export const CSV_ADDRESS_COLUMN = "name";

export class CsvInputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CsvInputError";
  }
}

const csvRowsSchema = z.array(z.array(z.string()));

/**
 * Read addresses from the `name` column of an uploaded CSV. Empty cells are
 * dropped and repeated names collapse to their first occurrence.
 */
export const parseAddressCsv = (
  text: string,
  options: { limit: number },
): AddressListResult => {
  let rows: string[][];
  try {
    rows = csvRowsSchema.parse(
      parse(text, {
        bom: true,
        trim: true,
        skip_empty_lines: true,
        relax_column_count: true,
      }),
    );
  } catch (error) {
    throw new CsvInputError(
      `Error reading CSV file: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  const [header = [], ...records] = rows;
  const columnIndex = header.indexOf(CSV_ADDRESS_COLUMN);
  if (columnIndex === -1) {
    throw new CsvInputError(
      `CSV file must contain a column named '${CSV_ADDRESS_COLUMN}'.`,
    );
  }

  const seen = new Set<string>();
  const names: string[] = [];
  for (const record of records) {
    const value = record[columnIndex]?.trim();
    if (!value || seen.has(value)) continue;
    seen.add(value);
    names.push(value);
  }

  return normalizeAddressList(names, options);
};
