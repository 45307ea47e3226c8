/**
 * Brokerage position snapshots as uploaded.
 * Values stay as the raw strings from the export ("$1,234.56"); parsing happens at analysis time.
 */

export interface Position {
  accountNumber: string;
  accountName?: string;
  symbol: string;
  description?: string;
  currentValue: string;
  quantity: string;
}

export interface AccountUpload {
  id: string;
  userId: string;
  filename: string;
  uploadedAt: Date;
  fileDatetime?: string; // "Date downloaded ..." footer from the export, if any
  positions: Position[];
}
