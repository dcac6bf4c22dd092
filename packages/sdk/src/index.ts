/**
 * @stockbook/sdk - Typed client for the Stockbook HTTP API
 *
 * Every response body is parsed with the shared schemas from
 * @stockbook/types, so callers get the same types the API validates with.
 */

import type { z } from 'zod';
import {
  AddItemResponseSchema,
  ClearDebtResponseSchema,
  DebtsResponseSchema,
  ExpenseEntriesResponseSchema,
  FinancialSummarySchema,
  HealthResponseSchema,
  ListDebtorsResponseSchema,
  ListInventoryResponseSchema,
  ListTransactionsResponseSchema,
  LowStockResponseSchema,
  MetricsSeriesResponseSchema,
  RecordSaleResponseSchema,
  type AddItemRequestSchema,
  type AddItemResponse,
  type ClearDebtResponse,
  type DebtsResponse,
  type Debtor,
  type FinancialSummary,
  type HealthResponse,
  type InventoryItem,
  type LowStockResponse,
  type MetricsSeriesResponse,
  type RecordSaleRequestSchema,
  type RecordSaleResponse,
  type TransactionResponse,
} from '@stockbook/types';

const DEFAULT_TIMEOUT_MS = 30000;

export interface StockbookClientConfig {
  baseUrl: string;
  /** Milliseconds before a request is aborted (default 30000) */
  timeout?: number;
  fetch?: typeof fetch;
}

export type AddItemInput = z.input<typeof AddItemRequestSchema>;
export type RecordSaleInput = z.input<typeof RecordSaleRequestSchema>;

type RequestMethod = 'GET' | 'POST' | 'DELETE';

/**
 * Raised for any non-2xx response; `body` is the parsed JSON error
 * payload, or the raw text when the body is not JSON
 */
export class StockbookApiError extends Error {
  readonly status: number;
  readonly body: unknown;

  constructor(status: number, body: unknown) {
    super(StockbookApiError.messageFrom(status, body));
    this.name = 'StockbookApiError';
    this.status = status;
    this.body = body;
  }

  private static messageFrom(status: number, body: unknown): string {
    if (typeof body === 'object' && body !== null && 'error' in body) {
      const { error } = body;
      if (typeof error === 'string') {
        return error;
      }
    }
    return `Request failed with status ${status}`;
  }
}

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

export class StockbookClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: StockbookClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? fetch;
  }

  async health(): Promise<HealthResponse> {
    return this.request('GET', '/v1/health', HealthResponseSchema);
  }

  // Inventory

  async listItems(): Promise<InventoryItem[]> {
    const data = await this.request('GET', '/v1/inventory', ListInventoryResponseSchema);
    return data.items;
  }

  async addOrRestockItem(input: AddItemInput): Promise<AddItemResponse> {
    return this.request('POST', '/v1/inventory', AddItemResponseSchema, input);
  }

  async deleteItem(name: string): Promise<void> {
    await this.send('DELETE', `/v1/inventory/${encodeURIComponent(name)}`);
  }

  async lowStock(threshold?: number): Promise<LowStockResponse> {
    const query = threshold === undefined ? '' : `?threshold=${threshold}`;
    return this.request('GET', `/v1/inventory/low-stock${query}`, LowStockResponseSchema);
  }

  // Transactions

  async listTransactions(): Promise<TransactionResponse[]> {
    const data = await this.request('GET', '/v1/transactions', ListTransactionsResponseSchema);
    return data.transactions;
  }

  async recordSale(input: RecordSaleInput): Promise<RecordSaleResponse> {
    return this.request('POST', '/v1/transactions/sales', RecordSaleResponseSchema, input);
  }

  async deleteTransaction(index: number): Promise<void> {
    await this.send('DELETE', `/v1/transactions/${index}`);
  }

  // Debts

  async debts(customerName?: string): Promise<DebtsResponse> {
    const query = customerName === undefined ? '' : `?customer=${encodeURIComponent(customerName)}`;
    return this.request('GET', `/v1/debts${query}`, DebtsResponseSchema);
  }

  async listDebtors(): Promise<Debtor[]> {
    const data = await this.request('GET', '/v1/debts/debtors', ListDebtorsResponseSchema);
    return data.debtors;
  }

  async clearDebt(customerName: string): Promise<ClearDebtResponse> {
    return this.request('POST', '/v1/debts/clear', ClearDebtResponseSchema, { customerName });
  }

  // Metrics

  async summary(): Promise<FinancialSummary> {
    return this.request('GET', '/v1/metrics/summary', FinancialSummarySchema);
  }

  async series(): Promise<MetricsSeriesResponse> {
    return this.request('GET', '/v1/metrics/series', MetricsSeriesResponseSchema);
  }

  async expenses(): Promise<TransactionResponse[]> {
    const data = await this.request('GET', '/v1/metrics/expenses', ExpenseEntriesResponseSchema);
    return data.expenses;
  }

  // Export

  async exportInventoryCsv(): Promise<string> {
    const response = await this.send('GET', '/v1/export/inventory.csv');
    return response.text();
  }

  async exportTransactionsCsv(): Promise<string> {
    const response = await this.send('GET', '/v1/export/transactions.csv');
    return response.text();
  }

  private async request<T extends z.ZodTypeAny>(
    method: RequestMethod,
    path: string,
    schema: T,
    body?: unknown
  ): Promise<z.infer<T>> {
    const response = await this.send(method, path, body);
    return schema.parse(await response.json());
  }

  private async send(method: RequestMethod, path: string, body?: unknown): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const headers: Record<string, string> = { Accept: 'application/json' };
      const init: RequestInit = { method, headers, signal: controller.signal };
      if (body !== undefined) {
        headers['Content-Type'] = 'application/json';
        init.body = JSON.stringify(body);
      }

      const response = await this.fetchImpl(`${this.baseUrl}${path}`, init);
      if (!response.ok) {
        throw new StockbookApiError(response.status, await readBody(response));
      }
      return response;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
