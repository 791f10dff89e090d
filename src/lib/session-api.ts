/*
  HTTP handlers for the interactive fix loop.
  -------------------------------------------------
  rulesUpload      POST  raw validation master workbook  ?validationSheet=&stateSheet=
  sessionStart     POST  raw dataset file (x-file-name)   ?rulesId=&sheet=
  sessionReport    GET   ?sessionId=
  sessionPreview   POST  { sessionId, field, targetType, format? }
  sessionFix       POST  { sessionId, field, targetType, format? }
  sessionConfirm   POST  { sessionId }
  sessionRevert    POST  { sessionId }
  sessionReset     POST  { sessionId }
  sessionExport    GET   ?sessionId=&format=xlsx|csv
  sessionClose     POST  { sessionId }

  Export is never gated on outstanding findings.
*/

import * as logger from 'firebase-functions/logger';
import { toCoercionRequest } from './coercion';
import { config } from './config';
import { CoercionError, SchemaError, errorMessage } from './errors';
import { compileRules } from './rule-compiler';
import { SessionStore, type SessionEntry } from './session-store';
import {
  listSheets,
  openWorkbook,
  readDataset,
  readRuleTable,
  readStateMaster,
  writeCsv,
  writeWorkbook,
} from './workbook';
import { StateMaster } from './state-master';

export interface HttpRequest {
  method: string;
  headers: Record<string, string | string[] | undefined>;
  query: Record<string, unknown>;
  body?: unknown;
  rawBody?: Buffer;
}

export interface HttpResponse {
  status(code: number): HttpResponse;
  setHeader(name: string, value: string): unknown;
  send(body: unknown): unknown;
  json(body: unknown): unknown;
}

export type Handler = (req: HttpRequest, res: HttpResponse) => Promise<void>;

class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
  }
}

const str = (v: unknown) => (typeof v === 'string' && v.trim() ? v.trim() : undefined);
const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === 'object' && v !== null && !Array.isArray(v);

function header(req: HttpRequest, name: string): string | undefined {
  const v = req.headers[name];
  return str(Array.isArray(v) ? v[0] : v);
}

function requireMethod(req: HttpRequest, method: 'GET' | 'POST') {
  if (req.method !== method) throw new HttpError(405, `Use ${method}`);
}

function requireRaw(req: HttpRequest): Buffer {
  const raw = req.rawBody;
  if (!raw || !raw.length) throw new HttpError(400, 'Empty request body');
  return raw;
}

function bodyOf(req: HttpRequest): Record<string, unknown> {
  return isRecord(req.body) ? req.body : {};
}

function handle(name: string, fn: Handler): Handler {
  return async (req, res) => {
    try {
      await fn(req, res);
    } catch (e) {
      if (e instanceof HttpError) {
        res.status(e.status).json({ error: e.message });
        return;
      }
      if (e instanceof SchemaError || e instanceof CoercionError) {
        logger.warn(`${name} rejected`, { error: e.message });
        res.status(422).json({
          error: e.message,
          kind: e.name,
          ...(e instanceof CoercionError ? { field: e.field, reason: e.reason } : { row: e.row ?? null }),
        });
        return;
      }
      logger.error(`${name} error`, { error: errorMessage(e) });
      res.status(500).json({ error: errorMessage(e) });
    }
  };
}

export function createHandlers(store: SessionStore = new SessionStore()) {
  function sessionFrom(id: unknown): SessionEntry {
    const sessionId = str(id);
    if (!sessionId) throw new HttpError(400, 'sessionId required');
    const entry = store.get(sessionId);
    if (!entry) throw new HttpError(404, `Unknown session: ${sessionId}`);
    return entry;
  }

  const report = (entry: SessionEntry) => entry.session.validate(entry.engine);

  const rulesUpload = handle('rulesUpload', async (req, res) => {
    requireMethod(req, 'POST');
    const book = openWorkbook(requireRaw(req));
    const sheetNames = listSheets(book);
    const validationSheet = str(req.query.validationSheet) ?? sheetNames[0];
    if (!validationSheet) throw new SchemaError('Validation master has no sheets.');
    const stateSheet = str(req.query.stateSheet);

    const spec = compileRules(readRuleTable(book, validationSheet));
    const stateMaster = stateSheet ? readStateMaster(book, stateSheet) : new StateMaster([]);
    const bundle = store.addRules({ spec, stateMaster, sheetNames });

    res.json({ rulesId: bundle.id, fields: spec.fieldOrder, stateCount: stateMaster.size, sheetNames });
  });

  const sessionStart = handle('sessionStart', async (req, res) => {
    requireMethod(req, 'POST');
    const rulesId = str(req.query.rulesId);
    if (!rulesId) throw new HttpError(400, 'rulesId required');
    if (!store.getRules(rulesId)) throw new HttpError(404, `Unknown rule set: ${rulesId}`);
    const raw = requireRaw(req);
    const fileName = header(req, 'x-file-name') ?? 'upload.xlsx';

    const dataset = readDataset(raw, fileName, str(req.query.sheet), header(req, 'content-type'));
    const entry = store.open(rulesId, dataset);
    if (!entry) throw new HttpError(404, `Unknown rule set: ${rulesId}`);

    res.json({ sessionId: entry.id, columns: dataset.columns, rowCount: dataset.rows.length, report: report(entry) });
  });

  const sessionReport = handle('sessionReport', async (req, res) => {
    requireMethod(req, 'GET');
    res.json({ report: report(sessionFrom(req.query.sessionId)) });
  });

  const sessionPreview = handle('sessionPreview', async (req, res) => {
    requireMethod(req, 'POST');
    const body = bodyOf(req);
    const entry = sessionFrom(body.sessionId);
    const request = toCoercionRequest(body.field, body.targetType, body.format);
    res.json({ preview: entry.session.preview(request) });
  });

  const sessionFix = handle('sessionFix', async (req, res) => {
    requireMethod(req, 'POST');
    const body = bodyOf(req);
    const entry = sessionFrom(body.sessionId);
    const request = toCoercionRequest(body.field, body.targetType, body.format);
    const preview = entry.session.applyCoercion(request);
    res.json({ preview, report: report(entry) });
  });

  const sessionConfirm = handle('sessionConfirm', async (req, res) => {
    requireMethod(req, 'POST');
    const entry = sessionFrom(bodyOf(req).sessionId);
    entry.session.confirm();
    res.json({ report: report(entry) });
  });

  const sessionRevert = handle('sessionRevert', async (req, res) => {
    requireMethod(req, 'POST');
    const entry = sessionFrom(bodyOf(req).sessionId);
    const restored = entry.session.revert();
    res.json({ restored, report: report(entry) });
  });

  const sessionReset = handle('sessionReset', async (req, res) => {
    requireMethod(req, 'POST');
    const entry = sessionFrom(bodyOf(req).sessionId);
    entry.session.reset();
    res.json({ report: report(entry) });
  });

  const sessionExport = handle('sessionExport', async (req, res) => {
    requireMethod(req, 'GET');
    const entry = sessionFrom(req.query.sessionId);
    const format = str(req.query.format) ?? 'xlsx';
    const table = entry.session.export();

    if (format === 'csv') {
      const name = config.exportFileName.replace(/\.xlsx?$/i, '') + '.csv';
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="${name}"`);
      res.send(writeCsv(table));
      return;
    }
    if (format !== 'xlsx') throw new HttpError(400, `Unsupported export format: ${format}`);

    res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
    res.setHeader('Content-Disposition', `attachment; filename="${config.exportFileName}"`);
    res.send(writeWorkbook(table));
  });

  const sessionClose = handle('sessionClose', async (req, res) => {
    requireMethod(req, 'POST');
    const id = str(bodyOf(req).sessionId);
    if (!id) throw new HttpError(400, 'sessionId required');
    if (!store.close(id)) throw new HttpError(404, `Unknown session: ${id}`);
    res.json({ ok: true });
  });

  return {
    rulesUpload,
    sessionStart,
    sessionReport,
    sessionPreview,
    sessionFix,
    sessionConfirm,
    sessionRevert,
    sessionReset,
    sessionExport,
    sessionClose,
  };
}
