export const DEFAULT_SHEET_NAME = "Sheet1";

export type SheetName = string;

/**
 * 1-based cell coordinates on a named sheet.
 */
export interface CellAddress {
  sheet: SheetName;
  row: number;
  col: number;
}

export interface RangeAddress {
  sheet: SheetName;
  startRow: number;
  startCol: number;
  endRow: number;
  endCol: number;
}

// Calc caps a sheet at 16384 columns (XFD) and 1048576 rows.
export const MAX_COLUMNS = 16_384;
export const MAX_ROWS = 1_048_576;

// Support absolute references (e.g. $A$1) by allowing optional `$` markers.
const CELL_RE = /^\$?([A-Z]+)\$?([1-9]\d*)$/i;

export function columnLabelToIndex(label: string): number {
  const normalized = label.trim().toUpperCase();
  if (!/^[A-Z]+$/.test(normalized)) {
    throw new Error(`Invalid column label: ${label}`);
  }

  let value = 0;
  for (const char of normalized) {
    value = value * 26 + (char.charCodeAt(0) - 64);
  }
  return value;
}

export function columnIndexToLabel(index: number): string {
  if (!Number.isInteger(index) || index <= 0) {
    throw new Error(`Invalid column index: ${index}`);
  }

  let value = index;
  let label = "";
  while (value > 0) {
    const remainder = (value - 1) % 26;
    label = String.fromCharCode(65 + remainder) + label;
    value = Math.floor((value - 1) / 26);
  }

  return label;
}

// Only `!` separates a sheet prefix. Calc's native `Sheet1.A1` form is not
// accepted because `.` is a legal sheet-name character.
function parseSheetPrefix(input: string, defaultSheet: string): { sheet: string; rest: string } {
  const bangIndex = input.lastIndexOf("!");
  if (bangIndex === -1) {
    return { sheet: defaultSheet, rest: input.trim() };
  }

  const rawSheet = input.slice(0, bangIndex).trim();
  const rest = input.slice(bangIndex + 1).trim();
  if (!rawSheet) {
    throw new Error(`Invalid A1 reference: missing sheet name before "!" in "${input}"`);
  }

  // 'Sheet Name'!A1 (single quotes, '' to escape).
  const sheet =
    rawSheet.startsWith("'") && rawSheet.endsWith("'") && rawSheet.length >= 2
      ? rawSheet.slice(1, -1).replace(/''/g, "'")
      : rawSheet;

  if (!sheet) {
    throw new Error(`Invalid A1 reference: empty sheet name in "${input}"`);
  }

  return { sheet, rest };
}

export function parseA1Cell(input: string, defaultSheet: string = DEFAULT_SHEET_NAME): CellAddress {
  const { sheet, rest } = parseSheetPrefix(input, defaultSheet);
  const match = CELL_RE.exec(rest);
  if (!match) {
    throw new Error(`Invalid cell reference: "${input}"`);
  }

  const col = columnLabelToIndex(match[1] ?? "");
  const row = Number(match[2]);
  if (col > MAX_COLUMNS) {
    throw new Error(`Column out of range in cell reference: "${input}"`);
  }
  if (!Number.isSafeInteger(row) || row > MAX_ROWS) {
    throw new Error(`Row out of range in cell reference: "${input}"`);
  }

  return { sheet, row, col };
}

export function parseA1Range(input: string, defaultSheet: string = DEFAULT_SHEET_NAME): RangeAddress {
  const { sheet, rest } = parseSheetPrefix(input, defaultSheet);
  const parts = rest.split(":").map((part) => part.trim());
  if (parts.length === 0 || parts.length > 2) {
    throw new Error(`Invalid range reference: "${input}"`);
  }

  const [first, second] = parts;
  if (!first || (parts.length === 2 && !second)) {
    throw new Error(`Invalid range reference: "${input}"`);
  }

  const start = parseA1Cell(first, sheet);
  const end = second ? parseA1Cell(second, sheet) : start;

  return {
    sheet,
    startRow: Math.min(start.row, end.row),
    startCol: Math.min(start.col, end.col),
    endRow: Math.max(start.row, end.row),
    endCol: Math.max(start.col, end.col)
  };
}

/**
 * Cell body without the sheet prefix (e.g. `B3`).
 */
export function formatCellBody(address: Pick<CellAddress, "row" | "col">): string {
  return `${columnIndexToLabel(address.col)}${address.row}`;
}

export function formatRangeBody(range: Omit<RangeAddress, "sheet">): string {
  const start = formatCellBody({ row: range.startRow, col: range.startCol });
  const end = formatCellBody({ row: range.endRow, col: range.endCol });
  return start === end ? start : `${start}:${end}`;
}
