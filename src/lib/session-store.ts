import * as crypto from 'crypto';
import * as logger from 'firebase-functions/logger';
import { config } from './config';
import { DatasetSession, type SessionOptions } from './dataset-session';
import { ValidationEngine } from './rules-engine';
import type { StateMaster } from './state-master';
import type { Dataset, ValidationSpec } from './types';

export interface RuleBundle {
  id: string;
  spec: ValidationSpec;
  stateMaster: StateMaster;
  sheetNames: string[];
}

export interface SessionEntry {
  id: string;
  rulesId: string;
  session: DatasetSession;
  engine: ValidationEngine;
}

export interface StoreOptions extends SessionOptions {
  maxSessions?: number;
}

const newId = (prefix: string) => `${prefix}-${crypto.randomBytes(4).toString('hex')}`;

/**
 * In-memory registry of compiled rule sets and open sessions. Nothing is persisted;
 * each map keeps at most `maxSessions` entries and evicts the oldest first.
 */
export class SessionStore {
  private readonly rules = new Map<string, RuleBundle>();
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly options: StoreOptions;

  constructor(options: StoreOptions = {}) {
    this.options = options;
  }

  private get cap() {
    return this.options.maxSessions ?? config.maxSessions;
  }

  private evict<T>(map: Map<string, T>, kind: string) {
    while (map.size > this.cap) {
      const oldest = map.keys().next().value;
      if (oldest === undefined) return;
      map.delete(oldest);
      logger.warn(`Evicted ${kind}`, { id: oldest, cap: this.cap });
    }
  }

  addRules(bundle: Omit<RuleBundle, 'id'>): RuleBundle {
    const entry = { ...bundle, id: newId('rules') };
    this.rules.set(entry.id, entry);
    this.evict(this.rules, 'rule set');
    logger.info('Rule set compiled', { rulesId: entry.id, fields: bundle.spec.fieldOrder.length, states: bundle.stateMaster.size });
    return entry;
  }

  getRules(id: string): RuleBundle | undefined {
    return this.rules.get(id);
  }

  open(rulesId: string, dataset: Dataset): SessionEntry | undefined {
    const bundle = this.rules.get(rulesId);
    if (!bundle) return undefined;
    const entry: SessionEntry = {
      id: newId('session'),
      rulesId,
      session: new DatasetSession(dataset, this.options),
      engine: new ValidationEngine(bundle.spec, { genericDateFormat: this.options.genericDateFormat }),
    };
    this.sessions.set(entry.id, entry);
    this.evict(this.sessions, 'session');
    logger.info('Session opened', { sessionId: entry.id, rulesId, rows: dataset.rows.length });
    return entry;
  }

  get(id: string): SessionEntry | undefined {
    return this.sessions.get(id);
  }

  close(id: string): boolean {
    const removed = this.sessions.delete(id);
    if (removed) logger.info('Session closed', { sessionId: id });
    return removed;
  }

  get sessionCount() {
    return this.sessions.size;
  }
}
