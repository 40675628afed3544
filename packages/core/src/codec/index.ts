/**
 * Codec module: CSV/JSON import and export of ledger transactions.
 */

export { importCsv, exportCsv, draftFromCsvRow } from './csv.js';
export type { CsvExport } from './csv.js';
export { importJson, exportJson, draftFromJsonRecord } from './json.js';
export { validateCsvRecords } from './validate.js';
export { postDraft, importRecords, parseRecordAmount, parseRecordDate } from './record.js';
export type { DraftLeg, TransactionDraft } from './record.js';
