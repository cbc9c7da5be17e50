export { NoticeStore, deriveStoreName, CSV_HEADER, type NoticeStoreOptions } from './store.js';
export { toCsv, escapeCsvField } from './csv.js';
