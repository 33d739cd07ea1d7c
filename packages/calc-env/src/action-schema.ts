import { z, ZodError } from "zod";
import { parseA1Cell, parseA1Range } from "./spreadsheet/a1.ts";

export type CommandName =
  | "create_sheet"
  | "set_cell"
  | "get_cell"
  | "set_formula"
  | "get_formula"
  | "set_range"
  | "get_range"
  | "add_sheet"
  | "delete_sheet"
  | "rename_sheet"
  | "open_file"
  | "save_file"
  | "export_pdf"
  | "export_csv"
  | "format_cell";

export const CommandNameSchema = z.enum([
  "create_sheet",
  "set_cell",
  "get_cell",
  "set_formula",
  "get_formula",
  "set_range",
  "get_range",
  "add_sheet",
  "delete_sheet",
  "rename_sheet",
  "open_file",
  "save_file",
  "export_pdf",
  "export_csv",
  "format_cell"
]);

export const COMMAND_NAMES: readonly CommandName[] = CommandNameSchema.options;

export function isCommandName(name: string): name is CommandName {
  return COMMAND_NAMES.some((command) => command === name);
}

const CellScalarSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

const A1CellSchema = z.string().min(1).superRefine((value, ctx) => {
  try {
    parseA1Cell(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : `Invalid cell reference: ${value}`
    });
  }
});

const A1RangeSchema = z.string().min(1).superRefine((value, ctx) => {
  try {
    parseA1Range(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : `Invalid range reference: ${value}`
    });
  }
});

// Checks only: names and paths reach the office exactly as given, surrounding spaces included.
function nonBlank(message: string) {
  return z.string().refine((value) => value.trim().length > 0, message);
}

const SheetNameSchema = nonBlank("sheet name must not be empty");

const FilePathSchema = nonBlank("file_path must not be empty");

const ColorSchema = z.union([
  z.string().regex(/^#[0-9a-fA-F]{6}$/, "color must be #RRGGBB"),
  z.number().int().min(0).max(0xffffff)
]);

export const CreateSheetParamsSchema = z.object({});

export type CreateSheetParams = z.infer<typeof CreateSheetParamsSchema>;

export const SetCellParamsSchema = z.object({
  cell: A1CellSchema,
  // `value` may legitimately be null (clears the cell), but the key itself is required.
  value: CellScalarSchema,
  sheet: SheetNameSchema.optional()
});

export type SetCellParams = z.infer<typeof SetCellParamsSchema>;

export const GetCellParamsSchema = z.object({
  cell: A1CellSchema,
  sheet: SheetNameSchema.optional()
});

export type GetCellParams = z.infer<typeof GetCellParamsSchema>;

export const SetFormulaParamsSchema = z.object({
  cell: A1CellSchema,
  formula: nonBlank("formula must not be empty"),
  sheet: SheetNameSchema.optional()
});

export type SetFormulaParams = z.infer<typeof SetFormulaParamsSchema>;

export const GetFormulaParamsSchema = GetCellParamsSchema;

export type GetFormulaParams = z.infer<typeof GetFormulaParamsSchema>;

export const SetRangeParamsSchema = z.object({
  range: A1RangeSchema,
  values: z
    .array(z.array(CellScalarSchema))
    .min(1, "values must contain at least one row")
    .refine((rows) => rows.some((row) => row.length > 0), "values must contain at least one column"),
  sheet: SheetNameSchema.optional()
});

export type SetRangeParams = z.infer<typeof SetRangeParamsSchema>;

export const GetRangeParamsSchema = z.object({
  range: A1RangeSchema,
  sheet: SheetNameSchema.optional()
});

export type GetRangeParams = z.infer<typeof GetRangeParamsSchema>;

export const AddSheetParamsSchema = z.object({
  name: SheetNameSchema.optional()
});

export type AddSheetParams = z.infer<typeof AddSheetParamsSchema>;

export const DeleteSheetParamsSchema = z.object({
  name: SheetNameSchema
});

export type DeleteSheetParams = z.infer<typeof DeleteSheetParamsSchema>;

export const RenameSheetParamsSchema = z.object({
  old_name: SheetNameSchema,
  new_name: SheetNameSchema
});

export type RenameSheetParams = z.infer<typeof RenameSheetParamsSchema>;

export const FileParamsSchema = z.object({
  file_path: FilePathSchema
});

export type FileParams = z.infer<typeof FileParamsSchema>;

export const ExportCsvParamsSchema = z.object({
  file_path: FilePathSchema,
  sheet: SheetNameSchema.optional()
});

export type ExportCsvParams = z.infer<typeof ExportCsvParamsSchema>;

export const FormatCellParamsSchema = z.object({
  cell: A1CellSchema,
  format_options: z
    .object({
      bold: z.boolean().optional(),
      italic: z.boolean().optional(),
      color: ColorSchema.optional()
    })
    .refine(
      (format) => format.bold !== undefined || format.italic !== undefined || format.color !== undefined,
      "format_options must specify at least one of bold, italic, color"
    ),
  sheet: SheetNameSchema.optional()
});

export type FormatCellParams = z.infer<typeof FormatCellParamsSchema>;

export type ParamsByCommand = {
  create_sheet: CreateSheetParams;
  set_cell: SetCellParams;
  get_cell: GetCellParams;
  set_formula: SetFormulaParams;
  get_formula: GetFormulaParams;
  set_range: SetRangeParams;
  get_range: GetRangeParams;
  add_sheet: AddSheetParams;
  delete_sheet: DeleteSheetParams;
  rename_sheet: RenameSheetParams;
  open_file: FileParams;
  save_file: FileParams;
  export_pdf: FileParams;
  export_csv: ExportCsvParams;
  format_cell: FormatCellParams;
};

/**
 * A validated action: one variant per command, each with its own parameter record.
 */
export type Action = { [K in CommandName]: { readonly command: K; readonly parameters: Readonly<ParamsByCommand[K]> } }[CommandName];

export type ActionOf<K extends CommandName> = Extract<Action, { command: K }>;

/**
 * Action as it arrives over the wire, before validation.
 */
export interface UnknownAction {
  command: string;
  parameters?: unknown;
}

export interface CommandRegistryEntry<K extends CommandName> {
  name: K;
  description: string;
  paramsSchema: z.ZodType<ParamsByCommand[K], z.ZodTypeDef, unknown>;
}

export const COMMAND_REGISTRY: { [K in CommandName]: CommandRegistryEntry<K> } = {
  create_sheet: {
    name: "create_sheet",
    description: "Report the spreadsheet created when the environment was reset.",
    paramsSchema: CreateSheetParamsSchema
  },
  set_cell: {
    name: "set_cell",
    description: "Set a cell to a number or text.",
    paramsSchema: SetCellParamsSchema
  },
  get_cell: {
    name: "get_cell",
    description: "Read a cell's displayed value.",
    paramsSchema: GetCellParamsSchema
  },
  set_formula: {
    name: "set_formula",
    description: "Set a formula (e.g. '=SUM(A1:A10)') in a cell.",
    paramsSchema: SetFormulaParamsSchema
  },
  get_formula: {
    name: "get_formula",
    description: "Read the formula stored in a cell.",
    paramsSchema: GetFormulaParamsSchema
  },
  set_range: {
    name: "set_range",
    description: "Write a 2D array of values starting at the range's top-left cell.",
    paramsSchema: SetRangeParamsSchema
  },
  get_range: {
    name: "get_range",
    description: "Read a rectangular range as a 2D array.",
    paramsSchema: GetRangeParamsSchema
  },
  add_sheet: {
    name: "add_sheet",
    description: "Append a sheet and make it current.",
    paramsSchema: AddSheetParamsSchema
  },
  delete_sheet: {
    name: "delete_sheet",
    description: "Delete a sheet by name.",
    paramsSchema: DeleteSheetParamsSchema
  },
  rename_sheet: {
    name: "rename_sheet",
    description: "Rename a sheet.",
    paramsSchema: RenameSheetParamsSchema
  },
  open_file: {
    name: "open_file",
    description: "Open a spreadsheet file, replacing the current document.",
    paramsSchema: FileParamsSchema
  },
  save_file: {
    name: "save_file",
    description: "Save the document to a path.",
    paramsSchema: FileParamsSchema
  },
  export_pdf: {
    name: "export_pdf",
    description: "Export the document as PDF.",
    paramsSchema: FileParamsSchema
  },
  export_csv: {
    name: "export_csv",
    description: "Export a sheet as CSV.",
    paramsSchema: ExportCsvParamsSchema
  },
  format_cell: {
    name: "format_cell",
    description: "Apply bold, italic or font color to a cell.",
    paramsSchema: FormatCellParamsSchema
  }
};

/**
 * Raised when an action is constructed with malformed parameters.
 */
export class ActionValidationError extends Error {
  readonly command: string;
  readonly issues: string[];

  constructor(command: string, issues: string[]) {
    super(issues.join("; "));
    this.name = "ActionValidationError";
    this.command = command;
    this.issues = issues;
  }
}

export class UnknownCommandError extends Error {
  readonly command: string;

  constructor(command: string) {
    super(`Command '${command}' not supported`);
    this.name = "UnknownCommandError";
    this.command = command;
  }
}

/**
 * Human-readable issue lines. A missing key reads "<field> parameter is required".
 */
export function describeIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.map(String).join(".");
    if (field && isMissingValue(issue)) return `${field} parameter is required`;
    return field ? `${field}: ${issue.message}` : issue.message;
  });
}

function isMissingValue(issue: z.ZodIssue): boolean {
  if (issue.code === z.ZodIssueCode.invalid_type) return issue.received === z.ZodParsedType.undefined;
  // Union-typed parameters (e.g. `value`) report an absent key as a union failure.
  if (issue.code === z.ZodIssueCode.invalid_union) {
    return issue.unionErrors.every((unionError) => unionError.issues.every(isMissingValue));
  }
  return false;
}

/**
 * Validate wire input into a typed action. Throws {@link UnknownCommandError}
 * or {@link ActionValidationError}.
 */
export function validateAction(input: UnknownAction): Action {
  const command = input.command;
  if (!isCommandName(command)) throw new UnknownCommandError(command);

  const normalized = normalizeParameters(command, input.parameters ?? {});
  const parsed = COMMAND_REGISTRY[command].paramsSchema.safeParse(normalized);
  if (!parsed.success) {
    throw new ActionValidationError(command, describeIssues(parsed.error));
  }
  return Object.freeze({ command, parameters: Object.freeze(parsed.data) }) as Action;
}

/**
 * Build a typed action, validating at construction time.
 */
export function createAction<K extends CommandName>(command: K, parameters: ParamsByCommand[K]): ActionOf<K> {
  const action = validateAction({ command, parameters });
  if (!isActionOf(action, command)) throw new UnknownCommandError(command);
  return action;
}

export function isActionOf<K extends CommandName>(action: Action, command: K): action is ActionOf<K> {
  return action.command === command;
}

/**
 * Accept camelCase spellings for the multi-word parameter names.
 */
function normalizeParameters(command: CommandName, parameters: unknown): unknown {
  if (!parameters || typeof parameters !== "object" || Array.isArray(parameters)) return parameters;

  const params: Record<string, unknown> = { ...parameters };
  const alias = (canonical: string, camel: string) => {
    if (params[canonical] === undefined && params[camel] !== undefined) {
      params[canonical] = params[camel];
    }
    delete params[camel];
  };

  switch (command) {
    case "rename_sheet":
      alias("old_name", "oldName");
      alias("new_name", "newName");
      break;
    case "open_file":
    case "save_file":
    case "export_pdf":
    case "export_csv":
      alias("file_path", "filePath");
      break;
    case "format_cell":
      alias("format_options", "formatOptions");
      break;
    case "create_sheet":
    case "set_cell":
    case "get_cell":
    case "set_formula":
    case "get_formula":
    case "set_range":
    case "get_range":
    case "add_sheet":
    case "delete_sheet":
      // No aliases currently.
      break;
    default: {
      const exhaustive: never = command;
      return exhaustive;
    }
  }

  return params;
}
