import type { DataSource, FileFormat } from "@shared/dataSource";
import type { PartialIngestionWarning } from "@shared/domain/errors";

/** A raw export as read from disk: the file's base name and its text. */
export interface RawFile {
  name: string;
  content: string;
}

/**
 * One provider field value before canonicalization. Field names are the
 * provider's own (column header, JSON path, or markup type identifier).
 */
export interface RawRecord {
  provider: DataSource;
  fieldName: string;
  rawValue: string | number;
  unitHint: string | null;
  timestampRaw: string;
  utcOffsetMinutes?: number;
  location: string; // file:row or file:element, for warnings
  metadata?: Record<string, unknown>;
}

export interface ParseOutcome {
  format: FileFormat;
  records: RawRecord[];
  warnings: PartialIngestionWarning[];
}

export interface ProviderAdapter {
  readonly format: FileFormat;
  parse(file: RawFile, provider: DataSource): ParseOutcome;
}

export function malformedRow(location: string, message: string): PartialIngestionWarning {
  return { kind: 'malformed_row', location, message };
}
