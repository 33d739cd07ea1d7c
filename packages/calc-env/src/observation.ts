import type { CellValue } from "./spreadsheet/types.ts";

export type ObservationData = string | number | CellValue[][] | Record<string, unknown> | null;

export interface Observation {
  readonly result: string;
  readonly success: boolean;
  readonly data: ObservationData;
  /** Name of the sheet commands address by default; `""` when no workbook is open. */
  readonly current_sheet: string;
  readonly sheet_names: readonly string[];
  readonly error_message: string | null;
  readonly file_path: string | null;
  readonly done: boolean;
  readonly reward: number | null;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface ObservationInput {
  result: string;
  success: boolean;
  data?: ObservationData;
  currentSheet?: string | null;
  sheetNames?: readonly string[];
  errorMessage?: string | null;
  filePath?: string | null;
  done?: boolean;
  reward?: number | null;
  metadata?: Record<string, unknown>;
}

/**
 * Build the fixed observation shape. Every key is present and the result is frozen.
 */
export function buildObservation(input: ObservationInput): Observation {
  return Object.freeze({
    result: input.result,
    success: input.success,
    data: input.data ?? null,
    current_sheet: input.currentSheet ?? "",
    sheet_names: Object.freeze([...(input.sheetNames ?? [])]),
    error_message: input.errorMessage ?? null,
    file_path: input.filePath ?? null,
    done: input.done ?? false,
    reward: input.reward ?? null,
    metadata: Object.freeze({ ...(input.metadata ?? {}) })
  });
}

export function successObservation(result: string, rest: Omit<ObservationInput, "result" | "success"> = {}): Observation {
  return buildObservation({ ...rest, result, success: true, errorMessage: null });
}

export function failureObservation(
  result: string,
  errorMessage: string,
  rest: Omit<ObservationInput, "result" | "success" | "errorMessage"> = {}
): Observation {
  return buildObservation({ ...rest, result, success: false, errorMessage });
}

/**
 * Copy an observation with some fields replaced (the environment stamps reward
 * and step metadata onto what the dispatcher returns).
 */
export function withObservationFields(
  observation: Observation,
  fields: Partial<Pick<Observation, "reward" | "done" | "metadata">>
): Observation {
  return Object.freeze({
    ...observation,
    ...fields,
    metadata: Object.freeze({ ...(fields.metadata ?? observation.metadata) })
  });
}
