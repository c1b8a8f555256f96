export { parseCsvContent, readCsvFile, REQUIRED_COLUMNS, type CsvContents, type CsvRow } from './csv/csv-reader.ts';
export { parseTimestamp, parseTransactionRow } from './csv/row-parser.ts';
export {
  DEFAULT_PROGRESS_INTERVAL,
  loadTransactionsFromCsv,
  writeRows,
  type LoadOptions,
  type LoadSummary,
} from './csv/transaction-loader.ts';
