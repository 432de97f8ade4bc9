import type { ResponseRow } from "../types.js";

/** Where form responses come from (spreadsheet or local CSV export). */
export interface ResponseSource {
  readonly label: string;
  loadRows(): Promise<ResponseRow[]>;
}
