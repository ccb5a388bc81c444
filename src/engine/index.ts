export { InMemoryTableEngine } from './memory.js';
export { JsonTableEngine, objectPointer, readRowsFile } from './json-table.js';
export { JsonValueSchema, RowsSchema, parseRows, contentHash } from './rows.js';
