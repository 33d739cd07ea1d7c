import { beforeEach, describe, expect, it, vi } from "vitest";
import type { UnknownAction } from "../src/action-schema.ts";
import { InMemoryOfficeBridge, type FormulaEvaluator } from "../src/bridge/in-memory-bridge.ts";
import {
  CSV_EXPORT_FILTER,
  CSV_FILTER_OPTIONS,
  CommandDispatcher,
  PDF_EXPORT_FILTER,
  createWorkbookSession,
  type WorkbookSession
} from "../src/dispatcher/command-dispatcher.ts";
import { parseA1Cell } from "../src/spreadsheet/a1.ts";

// Handles `=<cell>*<n>` only.
const multiplyEvaluator: FormulaEvaluator = (formula, lookup) => {
  const match = /^=([A-Z]+\d+)\*(\d+)$/.exec(formula);
  if (!match || match[1] === undefined || match[2] === undefined) {
    throw new Error(`unsupported formula: ${formula}`);
  }
  return lookup(parseA1Cell(match[1])).value * Number(match[2]);
};

async function openSession(bridge: InMemoryOfficeBridge): Promise<WorkbookSession> {
  await bridge.connect();
  await bridge.newDocument();
  const session = createWorkbookSession();
  session.connected = true;
  session.currentSheet = "Sheet1";
  return session;
}

describe("CommandDispatcher", () => {
  let bridge: InMemoryOfficeBridge;
  let dispatcher: CommandDispatcher;
  let session: WorkbookSession;

  beforeEach(async () => {
    bridge = new InMemoryOfficeBridge({ evaluate: multiplyEvaluator });
    dispatcher = new CommandDispatcher(bridge);
    session = await openSession(bridge);
  });

  const run = (action: UnknownAction) => dispatcher.dispatch(action, session);

  it("round-trips a number through set_cell and get_cell as display text", async () => {
    const set = await run({ command: "set_cell", parameters: { cell: "A1", value: 42 } });
    expect(set.success).toBe(true);
    expect(set.result).toBe("Cell A1 set to 42");

    const get = await run({ command: "get_cell", parameters: { cell: "A1" } });
    expect(get.success).toBe(true);
    expect(get.result).toBe("Retrieved value from cell A1");
    expect(get.data).toBe("42");
  });

  it("round-trips text and reports blank cells as 0", async () => {
    await run({ command: "set_cell", parameters: { cell: "B2", value: "hello" } });
    expect((await run({ command: "get_cell", parameters: { cell: "B2" } })).data).toBe("hello");
    expect((await run({ command: "get_cell", parameters: { cell: "Z99" } })).data).toBe(0);
  });

  it("writes booleans as text and clears cells with null", async () => {
    await run({ command: "set_cell", parameters: { cell: "A1", value: true } });
    expect((await run({ command: "get_cell", parameters: { cell: "A1" } })).data).toBe("true");

    const cleared = await run({ command: "set_cell", parameters: { cell: "A1", value: null } });
    expect(cleared.result).toBe("Cell A1 cleared");
    expect((await run({ command: "get_cell", parameters: { cell: "A1" } })).data).toBe(0);
  });

  it("reads a formula result and the formula itself", async () => {
    await run({ command: "set_cell", parameters: { cell: "A1", value: 21 } });
    const set = await run({ command: "set_formula", parameters: { cell: "B1", formula: "=A1*2" } });
    expect(set.result).toBe("Formula set in cell B1: =A1*2");

    expect((await run({ command: "get_cell", parameters: { cell: "B1" } })).data).toBe("42");
    expect((await run({ command: "get_formula", parameters: { cell: "B1" } })).data).toBe("=A1*2");
  });

  it("round-trips a range", async () => {
    const values = [
      [1, "a", 3.5],
      [2, "b", 4]
    ];
    const set = await run({ command: "set_range", parameters: { range: "B2:D3", values } });
    expect(set.result).toBe("Range B2:D3 set successfully.");

    const get = await run({ command: "get_range", parameters: { range: "B2:D3" } });
    expect(get.result).toBe("Retrieved data from range B2:D3");
    expect(get.data).toEqual(values);
  });

  it("returns blank cells of a range as empty strings", async () => {
    await run({ command: "set_cell", parameters: { cell: "A1", value: 7 } });
    const get = await run({ command: "get_range", parameters: { range: "A1:B1" } });
    expect(get.data).toEqual([[7, ""]]);
  });

  it("fails unknown commands without throwing", async () => {
    const observation = await run({ command: "copy_range", parameters: {} });
    expect(observation.success).toBe(false);
    expect(observation.result).toBe("Unknown command: copy_range");
    expect(observation.error_message).toBe("Command 'copy_range' not supported");
    expect(observation.metadata).toEqual({ error_code: "unknown_command" });
    expect(observation.sheet_names).toEqual(["Sheet1"]);
  });

  it("names the missing parameter", async () => {
    const observation = await run({ command: "get_cell", parameters: {} });
    expect(observation.success).toBe(false);
    expect(observation.result).toBe("Invalid parameters for get_cell");
    expect(observation.error_message).toBe("cell parameter is required");
    expect(observation.metadata).toEqual({ error_code: "validation_error" });
  });

  it("fails descriptively when deleting a missing sheet", async () => {
    const observation = await run({ command: "delete_sheet", parameters: { name: "Nope" } });
    expect(observation.success).toBe(false);
    expect(observation.result).toBe('Error deleting sheet: Sheet "Nope" not found');
    expect(observation.error_message).toBe('Sheet "Nope" not found');
    expect(observation.metadata).toEqual({ error_code: "bridge_error" });
  });

  it("refuses to delete the only sheet", async () => {
    const observation = await run({ command: "delete_sheet", parameters: { name: "Sheet1" } });
    expect(observation.success).toBe(false);
    expect(observation.error_message).toBe("Cannot remove the only sheet of a workbook");
    expect(observation.sheet_names).toEqual(["Sheet1"]);
  });

  it("adds a default-named sheet and makes it current", async () => {
    const observation = await run({ command: "add_sheet", parameters: {} });
    expect(observation.result).toBe("Sheet 'Sheet2' added successfully");
    expect(observation.data).toEqual({ sheet_name: "Sheet2" });
    expect(observation.current_sheet).toBe("Sheet2");
    expect(observation.sheet_names).toEqual(["Sheet1", "Sheet2"]);

    await run({ command: "set_cell", parameters: { cell: "A1", value: "on sheet 2" } });
    expect((await bridge.readCell({ sheet: "Sheet2", row: 1, col: 1 })).text).toBe("on sheet 2");
    expect((await bridge.readCell({ sheet: "Sheet1", row: 1, col: 1 })).text).toBe("");
  });

  it("lists sheets for the default name only", async () => {
    const listSheets = vi.spyOn(bridge, "listSheets");
    const insertSheet = vi.spyOn(bridge, "insertSheet");

    await run({ command: "add_sheet", parameters: { name: "Data" } });
    expect(insertSheet).toHaveBeenLastCalledWith("Data");
    // The observation's own listing.
    expect(listSheets).toHaveBeenCalledTimes(1);

    listSheets.mockClear();
    const observation = await run({ command: "add_sheet", parameters: {} });
    expect(insertSheet).toHaveBeenLastCalledWith("Sheet3");
    expect(listSheets).toHaveBeenCalledTimes(2);
    expect(observation.sheet_names).toEqual(["Sheet1", "Data", "Sheet3"]);
  });

  it("moves to the first sheet when the current sheet is deleted", async () => {
    await run({ command: "add_sheet", parameters: { name: "Data" } });
    const observation = await run({ command: "delete_sheet", parameters: { name: "Data" } });
    expect(observation.result).toBe("Sheet 'Data' deleted successfully");
    expect(observation.current_sheet).toBe("Sheet1");
    expect(observation.sheet_names).toEqual(["Sheet1"]);
  });

  it("keeps a renamed current sheet current", async () => {
    const observation = await run({ command: "rename_sheet", parameters: { old_name: "Sheet1", new_name: "Budget" } });
    expect(observation.result).toBe("Sheet renamed from 'Sheet1' to 'Budget'");
    expect(observation.current_sheet).toBe("Budget");
    expect(observation.sheet_names).toEqual(["Budget"]);
  });

  it("prefers an explicit sheet parameter over a reference prefix", async () => {
    await run({ command: "add_sheet", parameters: { name: "Data" } });
    await run({ command: "set_cell", parameters: { cell: "Sheet1!A1", value: 5, sheet: "Data" } });
    expect((await bridge.readCell({ sheet: "Data", row: 1, col: 1 })).value).toBe(5);

    await run({ command: "set_cell", parameters: { cell: "Sheet1!A2", value: 6 } });
    expect((await bridge.readCell({ sheet: "Sheet1", row: 2, col: 1 })).value).toBe(6);
  });

  it("passes sheet names and file paths through untrimmed", async () => {
    await run({ command: "add_sheet", parameters: { name: " Data" } });

    const set = await run({ command: "set_cell", parameters: { cell: "A1", value: 7, sheet: " Data" } });
    expect(set.success).toBe(true);
    expect((await bridge.readCell({ sheet: " Data", row: 1, col: 1 })).value).toBe(7);

    const saved = await run({ command: "save_file", parameters: { file_path: "/tmp/padded.ods " } });
    expect(saved.file_path).toBe("/tmp/padded.ods ");
    expect(bridge.hasFile("/tmp/padded.ods ")).toBe(true);

    const deleted = await run({ command: "delete_sheet", parameters: { name: " Data" } });
    expect(deleted.result).toBe("Sheet ' Data' deleted successfully");
    expect(deleted.sheet_names).toEqual(["Sheet1"]);
  });

  it("rejects blank sheet names", async () => {
    const observation = await run({ command: "delete_sheet", parameters: { name: "   " } });
    expect(observation.success).toBe(false);
    expect(observation.error_message).toBe("name: sheet name must not be empty");
    expect(observation.metadata.error_code).toBe("validation_error");
  });

  it("fails when a named sheet does not exist", async () => {
    const observation = await run({ command: "get_cell", parameters: { cell: "A1", sheet: "Ghost" } });
    expect(observation.success).toBe(false);
    expect(observation.error_message).toBe('Sheet "Ghost" not found');
  });

  it("saves and reopens documents", async () => {
    await run({ command: "set_cell", parameters: { cell: "A1", value: 1 } });
    const saved = await run({ command: "save_file", parameters: { file_path: "/tmp/book.ods" } });
    expect(saved.result).toBe("File saved successfully: /tmp/book.ods");
    expect(saved.file_path).toBe("/tmp/book.ods");

    await run({ command: "set_cell", parameters: { cell: "A1", value: 2 } });
    const opened = await run({ command: "open_file", parameters: { file_path: "/tmp/book.ods" } });
    expect(opened.result).toBe("File opened successfully: /tmp/book.ods");
    expect((await run({ command: "get_cell", parameters: { cell: "A1" } })).data).toBe("1");
  });

  it("makes the first sheet current after opening a file", async () => {
    bridge.addFile("/data/report.ods", { Summary: [["total"]], Detail: [[1, 2]] });
    await run({ command: "add_sheet", parameters: { name: "Detail" } });

    const opened = await run({ command: "open_file", parameters: { file_path: "/data/report.ods" } });
    expect(opened.current_sheet).toBe("Summary");
    expect(opened.sheet_names).toEqual(["Summary", "Detail"]);
    expect(opened.file_path).toBe("/data/report.ods");
  });

  it("reports a missing file", async () => {
    const observation = await run({ command: "open_file", parameters: { file_path: "/missing.ods" } });
    expect(observation.success).toBe(false);
    expect(observation.result).toBe("Error opening file: File not found: /missing.ods");
  });

  it("exports PDF with the calc filter", async () => {
    const observation = await run({ command: "export_pdf", parameters: { file_path: "/tmp/out.pdf" } });
    expect(observation.result).toBe("PDF export completed");
    expect(observation.data).toEqual({ exported_file: "/tmp/out.pdf" });
    expect(bridge.listExports()).toEqual([
      { filePath: "/tmp/out.pdf", options: { filterName: PDF_EXPORT_FILTER, overwrite: true } }
    ]);
  });

  it("exports the current sheet as CSV", async () => {
    const observation = await run({ command: "export_csv", parameters: { file_path: "/tmp/out.csv" } });
    expect(observation.result).toBe("CSV exported successfully: /tmp/out.csv");
    expect(bridge.listExports()).toEqual([
      {
        filePath: "/tmp/out.csv",
        options: { filterName: CSV_EXPORT_FILTER, filterOptions: CSV_FILTER_OPTIONS, overwrite: true, sheet: "Sheet1" }
      }
    ]);
  });

  it("maps format options to character properties", async () => {
    const observation = await run({
      command: "format_cell",
      parameters: { cell: "A1", format_options: { bold: true, italic: true, color: "#FF0000" } }
    });
    expect(observation.result).toBe("Cell A1 formatted successfully");
    expect(bridge.getCellProperties({ sheet: "Sheet1", row: 1, col: 1 })).toEqual({
      CharWeight: 150,
      CharPosture: 2,
      CharColor: 0xff0000
    });

    await run({ command: "format_cell", parameters: { cell: "A1", format_options: { bold: false } } });
    expect(bridge.getCellProperties({ sheet: "Sheet1", row: 1, col: 1 }).CharWeight).toBe(100);
  });

  it("succeeds for every command given its required parameters", async () => {
    bridge.addFile("/data/base.ods", { Sheet1: [[1]] });
    const actions: UnknownAction[] = [
      { command: "create_sheet", parameters: {} },
      { command: "set_cell", parameters: { cell: "A1", value: 1 } },
      { command: "get_cell", parameters: { cell: "A1" } },
      { command: "set_formula", parameters: { cell: "B1", formula: "=A1*3" } },
      { command: "get_formula", parameters: { cell: "B1" } },
      { command: "set_range", parameters: { range: "A2:B2", values: [[1, 2]] } },
      { command: "get_range", parameters: { range: "A1:B2" } },
      { command: "add_sheet", parameters: { name: "Extra" } },
      { command: "rename_sheet", parameters: { old_name: "Extra", new_name: "Renamed" } },
      { command: "delete_sheet", parameters: { name: "Renamed" } },
      { command: "format_cell", parameters: { cell: "A1", format_options: { italic: true } } },
      { command: "save_file", parameters: { file_path: "/tmp/all.ods" } },
      { command: "export_pdf", parameters: { file_path: "/tmp/all.pdf" } },
      { command: "export_csv", parameters: { file_path: "/tmp/all.csv" } },
      { command: "open_file", parameters: { file_path: "/data/base.ods" } }
    ];

    for (const action of actions) {
      const observation = await run(action);
      expect({ command: action.command, success: observation.success, error: observation.error_message }).toEqual({
        command: action.command,
        success: true,
        error: null
      });
    }
  });

  it("fails every command before the session is connected", async () => {
    const observation = await dispatcher.dispatch(
      { command: "get_cell", parameters: { cell: "A1" } },
      createWorkbookSession()
    );
    expect(observation.success).toBe(false);
    expect(observation.result).toBe("Error getting cell: Office bridge is not connected");
    expect(observation.error_message).toBe("Office bridge is not connected");
    expect(observation.metadata).toEqual({ error_code: "not_connected" });
    expect(observation.current_sheet).toBe("");
    expect(observation.sheet_names).toEqual([]);
  });

  it("reports an unreachable office process", async () => {
    bridge.simulateOutage();
    const observation = await run({ command: "get_cell", parameters: { cell: "A1" } });
    expect(observation.success).toBe(false);
    expect(observation.error_message).toBe("Office process is not reachable");
    expect(observation.metadata).toEqual({ error_code: "bridge_unavailable" });
    expect(observation.sheet_names).toEqual([]);
  });
});
