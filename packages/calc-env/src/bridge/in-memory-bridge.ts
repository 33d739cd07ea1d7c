import { DEFAULT_SHEET_NAME, formatCellBody } from "../spreadsheet/a1.ts";
import type { CellAddress, RangeAddress } from "../spreadsheet/a1.ts";
import type { CellProperties, CellReading, CellValue } from "../spreadsheet/types.ts";
import type { ExportOptions, OfficeBridge } from "./api.ts";
import { BridgeCallError, BridgeUnavailableError } from "./errors.ts";

type StoredCell =
  | { kind: "value"; value: number }
  | { kind: "text"; text: string }
  | { kind: "formula"; formula: string };

/**
 * Optional formula evaluator. The in-memory bridge has no formula engine; tests
 * that need computed results plug in a small evaluator for the formulas they use.
 */
export type FormulaEvaluator = (formula: string, lookup: (address: CellAddress) => CellReading) => CellValue;

export interface InMemoryOfficeBridgeOptions {
  sheetNames?: string[];
  evaluate?: FormulaEvaluator;
}

export interface RecordedExport {
  filePath: string;
  options: ExportOptions;
}

function cellKey(row: number, col: number): string {
  return `${row}:${col}`;
}

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : String(Number(value.toPrecision(15)));
}

class InMemorySheet {
  name: string;
  private readonly cells = new Map<string, StoredCell>();
  private readonly properties = new Map<string, CellProperties>();

  constructor(name: string) {
    this.name = name;
  }

  clone(): InMemorySheet {
    const next = new InMemorySheet(this.name);
    for (const [key, cell] of this.cells.entries()) next.cells.set(key, { ...cell });
    for (const [key, props] of this.properties.entries()) next.properties.set(key, { ...props });
    return next;
  }

  get(row: number, col: number): StoredCell | undefined {
    return this.cells.get(cellKey(row, col));
  }

  set(row: number, col: number, cell: StoredCell | undefined): void {
    const key = cellKey(row, col);
    if (!cell || (cell.kind === "text" && cell.text === "")) {
      this.cells.delete(key);
      return;
    }
    this.cells.set(key, cell);
  }

  getProperties(row: number, col: number): CellProperties {
    return { ...(this.properties.get(cellKey(row, col)) ?? {}) };
  }

  mergeProperties(row: number, col: number, properties: CellProperties): void {
    const key = cellKey(row, col);
    this.properties.set(key, { ...(this.properties.get(key) ?? {}), ...properties });
  }
}

/**
 * In-process stand-in for the office automation bridge.
 *
 * Mirrors the office behaviors callers depend on: unknown sheets raise, the
 * last sheet of a workbook cannot be removed, duplicate sheet names are
 * rejected and numbers display as text. Stored documents live in memory keyed
 * by path, so `storeDocument` followed by `openDocument` round-trips.
 */
export class InMemoryOfficeBridge implements OfficeBridge {
  private readonly initialSheetNames: string[];
  private readonly evaluate: FormulaEvaluator | null;
  private sheets: InMemorySheet[] = [];
  private connected = false;
  private documentOpen = false;
  private outage: string | null = null;
  private readonly files = new Map<string, InMemorySheet[]>();
  private readonly exportsList: RecordedExport[] = [];

  constructor(options: InMemoryOfficeBridgeOptions = {}) {
    const names = options.sheetNames ?? [DEFAULT_SHEET_NAME];
    this.initialSheetNames = names.length > 0 ? [...names] : [DEFAULT_SHEET_NAME];
    this.evaluate = options.evaluate ?? null;
  }

  /** Make every subsequent call fail as if the office process died. */
  simulateOutage(message = "Office process is not reachable"): void {
    this.outage = message;
  }

  endOutage(): void {
    this.outage = null;
  }

  /** Seed a document that `openDocument(filePath)` can load. */
  addFile(filePath: string, sheets: Record<string, CellValue[][]>): void {
    const created: InMemorySheet[] = [];
    for (const [name, rows] of Object.entries(sheets)) {
      const sheet = new InMemorySheet(name);
      rows.forEach((row, r) => {
        row.forEach((value, c) => sheet.set(r + 1, c + 1, toStoredCell(value)));
      });
      created.push(sheet);
    }
    this.files.set(filePath, created);
  }

  hasFile(filePath: string): boolean {
    return this.files.has(filePath);
  }

  listExports(): RecordedExport[] {
    return this.exportsList.map((entry) => ({ filePath: entry.filePath, options: { ...entry.options } }));
  }

  getCellProperties(address: CellAddress): CellProperties {
    return this.requireSheet("getCellProperties", address.sheet).getProperties(address.row, address.col);
  }

  get isConnected(): boolean {
    return this.connected;
  }

  async connect(): Promise<void> {
    this.assertReachable("connect");
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    this.documentOpen = false;
    this.sheets = [];
  }

  async newDocument(): Promise<void> {
    this.assertReady("newDocument", false);
    this.sheets = this.initialSheetNames.map((name) => new InMemorySheet(name));
    this.documentOpen = true;
  }

  async openDocument(filePath: string): Promise<void> {
    this.assertReady("openDocument", false);
    const stored = this.files.get(filePath);
    if (!stored) {
      throw new BridgeCallError("openDocument", `File not found: ${filePath}`, "IllegalArgumentException");
    }
    this.sheets = stored.map((sheet) => sheet.clone());
    this.documentOpen = true;
  }

  async storeDocument(filePath: string): Promise<void> {
    this.assertReady("storeDocument");
    this.files.set(
      filePath,
      this.sheets.map((sheet) => sheet.clone())
    );
  }

  async exportDocument(filePath: string, options: ExportOptions): Promise<void> {
    this.assertReady("exportDocument");
    if (options.sheet !== undefined) this.requireSheet("exportDocument", options.sheet);
    this.exportsList.push({ filePath, options: { ...options } });
  }

  async listSheets(): Promise<string[]> {
    this.assertReady("listSheets");
    return this.sheets.map((sheet) => sheet.name);
  }

  async insertSheet(name: string, position = this.sheets.length): Promise<void> {
    this.assertReady("insertSheet");
    if (this.findSheet(name)) {
      throw new BridgeCallError("insertSheet", `Sheet "${name}" already exists`, "ElementExistException");
    }
    const index = Math.max(0, Math.min(position, this.sheets.length));
    this.sheets.splice(index, 0, new InMemorySheet(name));
  }

  async removeSheet(name: string): Promise<void> {
    this.assertReady("removeSheet");
    const index = this.sheets.findIndex((sheet) => sheet.name === name);
    if (index === -1) {
      throw new BridgeCallError("removeSheet", `Sheet "${name}" not found`, "NoSuchElementException");
    }
    if (this.sheets.length === 1) {
      throw new BridgeCallError("removeSheet", "Cannot remove the only sheet of a workbook", "RuntimeException");
    }
    this.sheets.splice(index, 1);
  }

  async renameSheet(oldName: string, newName: string): Promise<void> {
    this.assertReady("renameSheet");
    const sheet = this.requireSheet("renameSheet", oldName);
    if (oldName !== newName && this.findSheet(newName)) {
      throw new BridgeCallError("renameSheet", `Sheet "${newName}" already exists`, "ElementExistException");
    }
    sheet.name = newName;
  }

  async readCell(address: CellAddress): Promise<CellReading> {
    this.assertReady("readCell");
    return this.reading(address);
  }

  async writeCellValue(address: CellAddress, value: number): Promise<void> {
    this.assertReady("writeCellValue");
    if (!Number.isFinite(value)) {
      throw new BridgeCallError("writeCellValue", `Invalid numeric value: ${value}`, "IllegalArgumentException");
    }
    this.requireSheet("writeCellValue", address.sheet).set(address.row, address.col, { kind: "value", value });
  }

  async writeCellText(address: CellAddress, text: string): Promise<void> {
    this.assertReady("writeCellText");
    this.requireSheet("writeCellText", address.sheet).set(address.row, address.col, { kind: "text", text });
  }

  async writeCellFormula(address: CellAddress, formula: string): Promise<void> {
    this.assertReady("writeCellFormula");
    const sheet = this.requireSheet("writeCellFormula", address.sheet);
    // Calc treats formula input without a leading "=" as a literal.
    sheet.set(address.row, address.col, formula.startsWith("=") ? { kind: "formula", formula } : toStoredCell(formula));
  }

  async readRange(range: RangeAddress): Promise<CellValue[][]> {
    this.assertReady("readRange");
    this.requireSheet("readRange", range.sheet);
    const rows: CellValue[][] = [];
    for (let r = range.startRow; r <= range.endRow; r++) {
      const row: CellValue[] = [];
      for (let c = range.startCol; c <= range.endCol; c++) {
        row.push(this.dataValue({ sheet: range.sheet, row: r, col: c }));
      }
      rows.push(row);
    }
    return rows;
  }

  async writeRange(origin: CellAddress, values: CellValue[][]): Promise<void> {
    this.assertReady("writeRange");
    const sheet = this.requireSheet("writeRange", origin.sheet);
    values.forEach((row, r) => {
      row.forEach((value, c) => sheet.set(origin.row + r, origin.col + c, toStoredCell(value)));
    });
  }

  async setCellProperties(address: CellAddress, properties: CellProperties): Promise<void> {
    this.assertReady("setCellProperties");
    this.requireSheet("setCellProperties", address.sheet).mergeProperties(address.row, address.col, properties);
  }

  private reading(address: CellAddress): CellReading {
    const sheet = this.requireSheet("readCell", address.sheet);
    const cell = sheet.get(address.row, address.col);
    if (!cell) return { text: "", value: 0, formula: "" };
    switch (cell.kind) {
      case "value":
        return { text: formatNumber(cell.value), value: cell.value, formula: formatNumber(cell.value) };
      case "text":
        return { text: cell.text, value: 0, formula: cell.text };
      case "formula": {
        const result = this.evaluateFormula(cell.formula, address);
        if (typeof result === "number") return { text: formatNumber(result), value: result, formula: cell.formula };
        return { text: result, value: 0, formula: cell.formula };
      }
      default: {
        const exhaustive: never = cell;
        throw new Error(`Unhandled cell kind: ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  private dataValue(address: CellAddress): CellValue {
    const cell = this.requireSheet("readRange", address.sheet).get(address.row, address.col);
    if (!cell) return "";
    switch (cell.kind) {
      case "value":
        return cell.value;
      case "text":
        return cell.text;
      case "formula":
        return this.evaluateFormula(cell.formula, address);
    }
  }

  private evaluateFormula(formula: string, address: CellAddress): CellValue {
    if (!this.evaluate) return "";
    try {
      return this.evaluate(formula, (target) => this.reading(target));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new BridgeCallError(
        "readCell",
        `Formula evaluation failed at ${address.sheet}!${formatCellBody(address)}: ${detail}`
      );
    }
  }

  private findSheet(name: string): InMemorySheet | undefined {
    return this.sheets.find((sheet) => sheet.name === name);
  }

  private requireSheet(method: string, name: string): InMemorySheet {
    const sheet = this.findSheet(name);
    if (!sheet) {
      throw new BridgeCallError(method, `Sheet "${name}" not found`, "NoSuchElementException");
    }
    return sheet;
  }

  private assertReachable(method: string): void {
    if (this.outage !== null) throw new BridgeUnavailableError(method, this.outage);
  }

  private assertReady(method: string, requireDocument = true): void {
    this.assertReachable(method);
    if (!this.connected) throw new BridgeUnavailableError(method, "Office bridge is not connected");
    if (requireDocument && !this.documentOpen) {
      throw new BridgeCallError(method, "No spreadsheet document is open");
    }
  }
}

function toStoredCell(value: CellValue): StoredCell | undefined {
  if (typeof value === "number") return { kind: "value", value };
  if (value === "") return undefined;
  return { kind: "text", text: value };
}
