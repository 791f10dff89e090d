import { onRequest } from 'firebase-functions/v2/https';
import { createHandlers } from './lib/session-api';

// Sessions live in instance memory, so every endpoint runs on one instance.
const opts = { cors: true, maxInstances: 1 };
const handlers = createHandlers();

export const rulesUpload = onRequest(opts, handlers.rulesUpload);
export const sessionStart = onRequest(opts, handlers.sessionStart);
export const sessionReport = onRequest(opts, handlers.sessionReport);
export const sessionPreview = onRequest(opts, handlers.sessionPreview);
export const sessionFix = onRequest(opts, handlers.sessionFix);
export const sessionConfirm = onRequest(opts, handlers.sessionConfirm);
export const sessionRevert = onRequest(opts, handlers.sessionRevert);
export const sessionReset = onRequest(opts, handlers.sessionReset);
export const sessionExport = onRequest(opts, handlers.sessionExport);
export const sessionClose = onRequest(opts, handlers.sessionClose);

export * from './lib/types';
export { SchemaError, CoercionError } from './lib/errors';
export { compileRules } from './lib/rule-compiler';
export { inferHeaderFormat } from './lib/date-formats';
export { ValidationEngine, validateDataset } from './lib/rules-engine';
export { coerceColumn, toCoercionRequest } from './lib/coercion';
export { DatasetSession } from './lib/dataset-session';
export { StateMaster } from './lib/state-master';
export { listSheets, openWorkbook, readDataset, readRuleTable, readStateMaster, writeWorkbook, writeCsv } from './lib/workbook';
