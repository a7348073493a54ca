// src/lib/store.ts
import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import { StoreError } from './errors';
import type { StoreClient, WideCell } from '../types';

const REQUEST_TIMEOUT_MS = 30000;

export interface StoreSettings {
  url: string;
  key: string;
}

function describeFailure(action: string, error: unknown): StoreError {
  if (axios.isAxiosError(error)) {
    const data: unknown = error.response?.data;
    let detail = error.message;
    if (typeof data === 'string' && data.length > 0) {
      detail = data;
    } else if (data && typeof data === 'object' && 'message' in data && typeof data.message === 'string') {
      detail = data.message;
    }
    return new StoreError(`${action} failed: ${detail}`, error.response?.status);
  }
  return new StoreError(`${action} failed: ${error instanceof Error ? error.message : String(error)}`);
}

/**
 * Supabase REST (PostgREST) client. DDL goes through the `execute_sql`
 * database function, rows through the table endpoint.
 */
export class PostgrestStore implements StoreClient {
  constructor(private readonly http: AxiosInstance) {}

  static fromSettings(settings: StoreSettings, defaults: CreateAxiosDefaults = {}): PostgrestStore {
    const http = axios.create({
      ...defaults,
      baseURL: `${settings.url.replace(/\/+$/, '')}/rest/v1`,
      headers: {
        apikey: settings.key,
        Authorization: `Bearer ${settings.key}`,
        'Content-Type': 'application/json',
      },
      timeout: REQUEST_TIMEOUT_MS,
    });
    return new PostgrestStore(http);
  }

  async executeStatement(sql: string): Promise<void> {
    try {
      await this.http.post('/rpc/execute_sql', { sql });
    } catch (error) {
      throw describeFailure('execute_sql', error);
    }
  }

  async insertRows(tableName: string, rows: Array<Record<string, WideCell>>): Promise<void> {
    try {
      await this.http.post(`/${encodeURIComponent(tableName)}`, rows, {
        headers: { Prefer: 'return=minimal' },
      });
    } catch (error) {
      throw describeFailure(`insert into '${tableName}'`, error);
    }
  }
}
