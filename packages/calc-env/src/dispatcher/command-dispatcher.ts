import type {
  Action,
  AddSheetParams,
  CommandName,
  DeleteSheetParams,
  ExportCsvParams,
  FileParams,
  FormatCellParams,
  GetCellParams,
  GetFormulaParams,
  GetRangeParams,
  RenameSheetParams,
  SetCellParams,
  SetFormulaParams,
  SetRangeParams,
  UnknownAction
} from "../action-schema.ts";
import { UnknownCommandError, validateAction } from "../action-schema.ts";
import type { OfficeBridge } from "../bridge/api.ts";
import { BridgeError, isBridgeUnavailable } from "../bridge/errors.ts";
import type { ObservationData, Observation } from "../observation.ts";
import { failureObservation, successObservation } from "../observation.ts";
import { DEFAULT_SHEET_NAME, parseA1Cell, parseA1Range } from "../spreadsheet/a1.ts";
import type { CellAddress, RangeAddress } from "../spreadsheet/a1.ts";
import type { CellProperties, CellScalar, CellValue } from "../spreadsheet/types.ts";
import {
  FONT_SLANT_ITALIC,
  FONT_SLANT_NONE,
  FONT_WEIGHT_BOLD,
  FONT_WEIGHT_NORMAL,
  isBlankText
} from "../spreadsheet/types.ts";

export const PDF_EXPORT_FILTER = "calc_pdf_Export";
export const CSV_EXPORT_FILTER = "Text - txt - csv (StarCalc)";
// Field separator ",", text delimiter '"', system charset, start at line 1, standard cell format.
export const CSV_FILTER_OPTIONS = "44,34,0,1,1";

/**
 * Per-environment context the dispatcher reads and updates. Workbook content
 * lives in the office process; only addressing state is kept here.
 */
export interface WorkbookSession {
  /** Sheet addressed when a command names none. `null` until the first observation lists sheets. */
  currentSheet: string | null;
  /** Path of the last opened or saved document. */
  filePath: string | null;
  connected: boolean;
}

export function createWorkbookSession(): WorkbookSession {
  return { currentSheet: null, filePath: null, connected: false };
}

export type DispatchErrorCode =
  | "unknown_command"
  | "validation_error"
  | "not_connected"
  | "bridge_error"
  | "bridge_unavailable";

interface CommandOutcome {
  result: string;
  data?: ObservationData;
}

const ACTIVITY: Record<CommandName, string> = {
  create_sheet: "creating spreadsheet",
  set_cell: "setting cell",
  get_cell: "getting cell",
  set_formula: "setting formula",
  get_formula: "getting formula",
  set_range: "setting range",
  get_range: "getting range",
  add_sheet: "adding sheet",
  delete_sheet: "deleting sheet",
  rename_sheet: "renaming sheet",
  open_file: "opening file",
  save_file: "saving file",
  export_pdf: "exporting PDF",
  export_csv: "exporting CSV",
  format_cell: "formatting cell"
};

const NOT_CONNECTED_MESSAGE = "Office bridge is not connected";

/**
 * Routes actions to bridge primitives and turns every outcome into an
 * observation. `dispatch` never throws.
 */
export class CommandDispatcher {
  private readonly bridge: OfficeBridge;

  constructor(bridge: OfficeBridge) {
    this.bridge = bridge;
  }

  async dispatch(input: UnknownAction | Action, session: WorkbookSession): Promise<Observation> {
    let action: Action;
    try {
      action = validateAction(input);
    } catch (error) {
      return this.rejectInput(input.command, error, session);
    }

    const activity = ACTIVITY[action.command];
    if (!session.connected) {
      return this.fail(session, `Error ${activity}: ${NOT_CONNECTED_MESSAGE}`, NOT_CONNECTED_MESSAGE, "not_connected");
    }

    let outcome: CommandOutcome;
    try {
      outcome = await this.run(action, session);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const code: DispatchErrorCode = isBridgeUnavailable(error) ? "bridge_unavailable" : "bridge_error";
      const sheetNames = await this.observeSheets(session);
      return failureObservation(`Error ${activity}: ${message}`, message, {
        ...this.sessionFields(session),
        sheetNames,
        metadata: { error_code: code }
      });
    }

    const sheetNames = await this.observeSheets(session);
    return successObservation(outcome.result, {
      ...this.sessionFields(session),
      data: outcome.data ?? null,
      sheetNames
    });
  }

  /**
   * List sheets for the observation and keep `currentSheet` pointing at one of
   * them. A listing failure reports no sheets.
   */
  async observeSheets(session: WorkbookSession): Promise<string[]> {
    if (!session.connected) return [];
    let names: string[];
    try {
      names = await this.bridge.listSheets();
    } catch (error) {
      if (error instanceof BridgeError) return [];
      throw error;
    }
    if (session.currentSheet === null || !names.includes(session.currentSheet)) {
      session.currentSheet = names[0] ?? null;
    }
    return names;
  }

  private async run(action: Action, session: WorkbookSession): Promise<CommandOutcome> {
    switch (action.command) {
      case "create_sheet":
        return { result: "New spreadsheet created" };
      case "set_cell":
        return this.setCell(action.parameters, session);
      case "get_cell":
        return this.getCell(action.parameters, session);
      case "set_formula":
        return this.setFormula(action.parameters, session);
      case "get_formula":
        return this.getFormula(action.parameters, session);
      case "set_range":
        return this.setRange(action.parameters, session);
      case "get_range":
        return this.getRange(action.parameters, session);
      case "add_sheet":
        return this.addSheet(action.parameters, session);
      case "delete_sheet":
        return this.deleteSheet(action.parameters, session);
      case "rename_sheet":
        return this.renameSheet(action.parameters, session);
      case "open_file":
        return this.openFile(action.parameters, session);
      case "save_file":
        return this.saveFile(action.parameters, session);
      case "export_pdf":
        return this.exportPdf(action.parameters);
      case "export_csv":
        return this.exportCsv(action.parameters, session);
      case "format_cell":
        return this.formatCell(action.parameters, session);
      default: {
        const exhaustive: never = action;
        throw new Error(`Unhandled command: ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  private async setCell(params: Readonly<SetCellParams>, session: WorkbookSession): Promise<CommandOutcome> {
    const address = resolveCell(params.cell, params.sheet, session);
    const { value } = params;
    if (typeof value === "number") {
      await this.bridge.writeCellValue(address, value);
    } else {
      await this.bridge.writeCellText(address, scalarToText(value));
    }
    if (value === null) return { result: `Cell ${params.cell} cleared` };
    return { result: `Cell ${params.cell} set to ${String(value)}` };
  }

  private async getCell(params: Readonly<GetCellParams>, session: WorkbookSession): Promise<CommandOutcome> {
    const reading = await this.bridge.readCell(resolveCell(params.cell, params.sheet, session));
    return {
      result: `Retrieved value from cell ${params.cell}`,
      data: isBlankText(reading.text) ? reading.value : reading.text
    };
  }

  private async setFormula(params: Readonly<SetFormulaParams>, session: WorkbookSession): Promise<CommandOutcome> {
    await this.bridge.writeCellFormula(resolveCell(params.cell, params.sheet, session), params.formula);
    return { result: `Formula set in cell ${params.cell}: ${params.formula}` };
  }

  private async getFormula(params: Readonly<GetFormulaParams>, session: WorkbookSession): Promise<CommandOutcome> {
    const reading = await this.bridge.readCell(resolveCell(params.cell, params.sheet, session));
    return { result: `Retrieved formula from cell ${params.cell}`, data: reading.formula };
  }

  private async setRange(params: Readonly<SetRangeParams>, session: WorkbookSession): Promise<CommandOutcome> {
    const range = resolveRange(params.range, params.sheet, session);
    const origin: CellAddress = { sheet: range.sheet, row: range.startRow, col: range.startCol };
    const values: CellValue[][] = params.values.map((row) =>
      row.map((value) => (typeof value === "number" ? value : scalarToText(value)))
    );
    await this.bridge.writeRange(origin, values);
    return { result: `Range ${params.range} set successfully.` };
  }

  private async getRange(params: Readonly<GetRangeParams>, session: WorkbookSession): Promise<CommandOutcome> {
    const data = await this.bridge.readRange(resolveRange(params.range, params.sheet, session));
    return { result: `Retrieved data from range ${params.range}`, data };
  }

  private async addSheet(params: Readonly<AddSheetParams>, session: WorkbookSession): Promise<CommandOutcome> {
    // Only the default name needs the sheet count.
    const name = params.name ?? `Sheet${(await this.bridge.listSheets()).length + 1}`;
    await this.bridge.insertSheet(name);
    session.currentSheet = name;
    return { result: `Sheet '${name}' added successfully`, data: { sheet_name: name } };
  }

  private async deleteSheet(params: Readonly<DeleteSheetParams>, session: WorkbookSession): Promise<CommandOutcome> {
    await this.bridge.removeSheet(params.name);
    // The observation's sheet listing moves the session to the first sheet.
    if (session.currentSheet === params.name) session.currentSheet = null;
    return { result: `Sheet '${params.name}' deleted successfully` };
  }

  private async renameSheet(params: Readonly<RenameSheetParams>, session: WorkbookSession): Promise<CommandOutcome> {
    await this.bridge.renameSheet(params.old_name, params.new_name);
    if (session.currentSheet === params.old_name) session.currentSheet = params.new_name;
    return { result: `Sheet renamed from '${params.old_name}' to '${params.new_name}'` };
  }

  private async openFile(params: Readonly<FileParams>, session: WorkbookSession): Promise<CommandOutcome> {
    await this.bridge.openDocument(params.file_path);
    session.filePath = params.file_path;
    session.currentSheet = null;
    return { result: `File opened successfully: ${params.file_path}` };
  }

  private async saveFile(params: Readonly<FileParams>, session: WorkbookSession): Promise<CommandOutcome> {
    await this.bridge.storeDocument(params.file_path);
    session.filePath = params.file_path;
    return { result: `File saved successfully: ${params.file_path}` };
  }

  private async exportPdf(params: Readonly<FileParams>): Promise<CommandOutcome> {
    await this.bridge.exportDocument(params.file_path, { filterName: PDF_EXPORT_FILTER, overwrite: true });
    return { result: "PDF export completed", data: { exported_file: params.file_path } };
  }

  private async exportCsv(params: Readonly<ExportCsvParams>, session: WorkbookSession): Promise<CommandOutcome> {
    const sheet = params.sheet ?? session.currentSheet ?? undefined;
    await this.bridge.exportDocument(params.file_path, {
      filterName: CSV_EXPORT_FILTER,
      filterOptions: CSV_FILTER_OPTIONS,
      overwrite: true,
      ...(sheet !== undefined ? { sheet } : {})
    });
    return { result: `CSV exported successfully: ${params.file_path}`, data: { exported_file: params.file_path } };
  }

  private async formatCell(params: Readonly<FormatCellParams>, session: WorkbookSession): Promise<CommandOutcome> {
    const { bold, italic, color } = params.format_options;
    const properties: CellProperties = {};
    if (bold !== undefined) properties.CharWeight = bold ? FONT_WEIGHT_BOLD : FONT_WEIGHT_NORMAL;
    if (italic !== undefined) properties.CharPosture = italic ? FONT_SLANT_ITALIC : FONT_SLANT_NONE;
    if (color !== undefined) properties.CharColor = parseColor(color);
    await this.bridge.setCellProperties(resolveCell(params.cell, params.sheet, session), properties);
    return { result: `Cell ${params.cell} formatted successfully` };
  }

  private async rejectInput(command: string, error: unknown, session: WorkbookSession): Promise<Observation> {
    if (error instanceof UnknownCommandError) {
      return this.fail(session, `Unknown command: ${command}`, error.message, "unknown_command");
    }
    const message = error instanceof Error ? error.message : String(error);
    return this.fail(session, `Invalid parameters for ${command}`, message, "validation_error");
  }

  private async fail(
    session: WorkbookSession,
    result: string,
    errorMessage: string,
    code: DispatchErrorCode
  ): Promise<Observation> {
    const sheetNames = await this.observeSheets(session);
    return failureObservation(result, errorMessage, {
      ...this.sessionFields(session),
      sheetNames,
      metadata: { error_code: code }
    });
  }

  private sessionFields(session: WorkbookSession): { currentSheet: string | null; filePath: string | null } {
    return { currentSheet: session.currentSheet, filePath: session.filePath };
  }
}

function defaultSheet(session: WorkbookSession): string {
  return session.currentSheet ?? DEFAULT_SHEET_NAME;
}

// An explicit `sheet` parameter wins over a `Sheet!` prefix, which wins over the current sheet.
function resolveCell(ref: string, sheet: string | undefined, session: WorkbookSession): CellAddress {
  const address = parseA1Cell(ref, defaultSheet(session));
  return sheet !== undefined ? { ...address, sheet } : address;
}

function resolveRange(ref: string, sheet: string | undefined, session: WorkbookSession): RangeAddress {
  const range = parseA1Range(ref, defaultSheet(session));
  return sheet !== undefined ? { ...range, sheet } : range;
}

function scalarToText(value: Exclude<CellScalar, number>): string {
  if (value === null) return "";
  if (typeof value === "boolean") return value ? "true" : "false";
  return value;
}

function parseColor(color: string | number): number {
  if (typeof color === "number") return color;
  return Number.parseInt(color.slice(1), 16);
}
