import type { CellAddress, RangeAddress } from "../spreadsheet/a1.ts";
import type { CellProperties, CellReading, CellValue } from "../spreadsheet/types.ts";

export interface ExportOptions {
  /** Office export filter (e.g. `calc_pdf_Export`). */
  filterName: string;
  /** Filter-specific option string (CSV token options). */
  filterOptions?: string;
  /** Sheet to activate before exporting; single-sheet formats export only the active sheet. */
  sheet?: string;
  overwrite?: boolean;
}

/**
 * Primitive operations of the office automation bridge.
 *
 * Every method is a single pass-through call to the office process. Failures
 * are whatever the office reports, surfaced as `BridgeCallError`; transport
 * failures surface as `BridgeUnavailableError`. Implementations must not
 * retry, cache workbook content or add validation of their own.
 */
export interface OfficeBridge {
  /** Open the connection to the office process. */
  connect(): Promise<void>;
  /** Close the open document (discarding changes) and drop the connection. */
  disconnect(): Promise<void>;

  /** Replace the open document with a new, empty spreadsheet. */
  newDocument(): Promise<void>;
  openDocument(filePath: string): Promise<void>;
  storeDocument(filePath: string): Promise<void>;
  exportDocument(filePath: string, options: ExportOptions): Promise<void>;

  /** Sheet names in tab order. */
  listSheets(): Promise<string[]>;
  /** Insert at `position` in tab order; without one the office appends after the last sheet. */
  insertSheet(name: string, position?: number): Promise<void>;
  removeSheet(name: string): Promise<void>;
  renameSheet(oldName: string, newName: string): Promise<void>;

  readCell(address: CellAddress): Promise<CellReading>;
  writeCellValue(address: CellAddress, value: number): Promise<void>;
  writeCellText(address: CellAddress, text: string): Promise<void>;
  writeCellFormula(address: CellAddress, formula: string): Promise<void>;

  /**
   * Read a rectangular block (`getDataArray`): numbers for numeric cells,
   * display text otherwise.
   */
  readRange(range: RangeAddress): Promise<CellValue[][]>;
  /**
   * Write rows of values starting at `origin`. Rows may be ragged; each value
   * lands at `origin + (rowIndex, colIndex)`.
   */
  writeRange(origin: CellAddress, values: CellValue[][]): Promise<void>;

  setCellProperties(address: CellAddress, properties: CellProperties): Promise<void>;
}
