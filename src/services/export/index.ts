/**
 * Export service barrel export
 */

export {
  exportEntries,
  renderEntries,
  entriesToCsv,
  entriesToJson,
  toExportedEntry,
  escapeCsvField,
  EXPORT_FORMATS,
  CSV_HEADER,
  NO_PROJECT,
  type ExportFormat,
  type ExportOptions,
  type ExportResult,
  type ExportedEntry,
} from './exporter.js';
