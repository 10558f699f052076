export type CellValue = string | number;

export interface RgbColor {
  red: number;
  green: number;
  blue: number;
}

export interface HeaderFormat {
  backgroundColor: RgbColor;
  foregroundColor: RgbColor;
  fontSize: number;
  bold: boolean;
  horizontalAlignment: 'LEFT' | 'CENTER' | 'RIGHT';
}

/**
 * The remote spreadsheet tab holding every expense row, header included.
 */
export interface TabularStore {
  /** Every row, cells rendered as strings. Row 0 is whatever sits in the first line. */
  getAllValues(): Promise<string[][]>;
  appendRows(rows: CellValue[][]): Promise<void>;
  clear(): Promise<void>;
  formatHeaderRow(format: HeaderFormat): Promise<void>;
  setColumnWidths(widths: readonly number[]): Promise<void>;
  describe(): string;
}

export interface OperationResult {
  success: boolean;
  message: string;
  errorCode?: string;
}

export interface ReconcileResult extends OperationResult {
  changed: boolean;
  preservedRows: number;
  warnings: string[];
}
