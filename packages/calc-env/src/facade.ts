import type { CellScalar, FormatOptions } from "./spreadsheet/types.ts";
import type { CommandName, ParamsByCommand } from "./action-schema.ts";
import { createAction } from "./action-schema.ts";
import type { StepRunner } from "./environment.ts";
import type { Observation } from "./observation.ts";

export interface SheetOption {
  /** Sheet to address instead of the current one. */
  sheet?: string;
}

/**
 * One method per command over any {@link StepRunner}.
 *
 * Parameters are validated locally; malformed calls throw
 * `ActionValidationError` before anything is sent.
 */
export class CalcEnvFacade {
  private readonly runner: StepRunner;

  constructor(runner: StepRunner) {
    this.runner = runner;
  }

  createSheet(): Promise<Observation> {
    return this.send("create_sheet", {});
  }

  setCell(cell: string, value: CellScalar, options: SheetOption = {}): Promise<Observation> {
    return this.send("set_cell", { cell, value, ...options });
  }

  getCell(cell: string, options: SheetOption = {}): Promise<Observation> {
    return this.send("get_cell", { cell, ...options });
  }

  setFormula(cell: string, formula: string, options: SheetOption = {}): Promise<Observation> {
    return this.send("set_formula", { cell, formula, ...options });
  }

  getFormula(cell: string, options: SheetOption = {}): Promise<Observation> {
    return this.send("get_formula", { cell, ...options });
  }

  setRange(range: string, values: CellScalar[][], options: SheetOption = {}): Promise<Observation> {
    return this.send("set_range", { range, values, ...options });
  }

  getRange(range: string, options: SheetOption = {}): Promise<Observation> {
    return this.send("get_range", { range, ...options });
  }

  addSheet(name?: string): Promise<Observation> {
    return this.send("add_sheet", name === undefined ? {} : { name });
  }

  deleteSheet(name: string): Promise<Observation> {
    return this.send("delete_sheet", { name });
  }

  renameSheet(oldName: string, newName: string): Promise<Observation> {
    return this.send("rename_sheet", { old_name: oldName, new_name: newName });
  }

  openFile(filePath: string): Promise<Observation> {
    return this.send("open_file", { file_path: filePath });
  }

  saveFile(filePath: string): Promise<Observation> {
    return this.send("save_file", { file_path: filePath });
  }

  exportPdf(filePath: string): Promise<Observation> {
    return this.send("export_pdf", { file_path: filePath });
  }

  exportCsv(filePath: string, options: SheetOption = {}): Promise<Observation> {
    return this.send("export_csv", { file_path: filePath, ...options });
  }

  formatCell(cell: string, formatOptions: FormatOptions, options: SheetOption = {}): Promise<Observation> {
    return this.send("format_cell", { cell, format_options: formatOptions, ...options });
  }

  private async send<K extends CommandName>(command: K, parameters: ParamsByCommand[K]): Promise<Observation> {
    return this.runner.step(createAction(command, parameters));
  }
}
