export const DEFAULT_GENE_COLUMN = 'Gene.symbol';
export const DEFAULT_DATA_COLUMN = 'logFC';

export interface OmicTableOptions {
  geneColumn: string;
  dataColumn: string;
}

export interface ParsedOmicTable {
  /** gene → value; a gene listed twice keeps its last value */
  data: Record<string, number>;
  numberGenes: number;
  skippedRows: number;
}

/** Thrown with the reason a table yields no usable values */
export class OmicTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OmicTableError';
  }
}

/**
 * Reads a tab- or comma-separated table with a header row. The separator
 * is tab when the header contains one, comma otherwise. Cells may be
 * wrapped in double quotes; separators inside quotes are not supported.
 *
 * Rows with an empty gene, or a value that is not a finite number, are
 * skipped.
 */
export function parseOmicTable(text: string, options: OmicTableOptions): ParsedOmicTable {
  const lines = text
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter((line) => line.trim() !== '');

  const header = lines.shift();
  if (header === undefined) {
    throw new OmicTableError('the file is empty');
  }

  const separator = header.includes('\t') ? '\t' : ',';
  const columns = splitRow(header, separator);
  const geneIndex = columns.indexOf(options.geneColumn);
  const dataIndex = columns.indexOf(options.dataColumn);
  if (geneIndex === -1) {
    throw new OmicTableError(`gene column "${options.geneColumn}" not found`);
  }
  if (dataIndex === -1) {
    throw new OmicTableError(`data column "${options.dataColumn}" not found`);
  }

  const data: Record<string, number> = {};
  let skippedRows = 0;
  for (const line of lines) {
    const cells = splitRow(line, separator);
    const gene = cells[geneIndex] ?? '';
    const raw = cells[dataIndex] ?? '';
    const value = raw === '' ? Number.NaN : Number(raw);

    if (gene === '' || !Number.isFinite(value)) {
      skippedRows += 1;
      continue;
    }
    data[gene] = value;
  }

  const numberGenes = Object.keys(data).length;
  if (numberGenes === 0) {
    throw new OmicTableError('no row has both a gene and a numeric value');
  }
  return { data, numberGenes, skippedRows };
}

function splitRow(line: string, separator: string): string[] {
  return line.split(separator).map((cell) => unquote(cell.trim()));
}

function unquote(cell: string): string {
  return cell.length >= 2 && cell.startsWith('"') && cell.endsWith('"')
    ? cell.slice(1, -1).replace(/""/g, '"').trim()
    : cell;
}
