/**
 * Ledger Store
 *
 * Owns the inventory and transaction collections and keeps them
 * consistent: every purchase and sale moves stock, deleting a single
 * transaction reverses its stock effect, and every mutation writes the
 * full state back to storage.
 */

import { logger as defaultLogger, type Logger } from '@stockbook/observability';
import type { LedgerSnapshot, LedgerStorage } from '@stockbook/storage';
import type { InventoryItem, SalePaymentMode, Transaction } from '@stockbook/types';
import {
  DebtNotFoundError,
  InsufficientStockError,
  ItemNotFoundError,
  LedgerError,
  LedgerValidationError,
  PersistenceError,
  TransactionNotFoundError,
} from './ledger-errors.js';
import { DEBT_PAYMENT_ITEM, isOutstandingDebt } from './transaction-filters.js';
import type {
  ClearDebtResult,
  DeleteItemResult,
  DeleteTransactionResult,
  IndexedTransaction,
  LedgerStoreOptions,
  OversellPolicy,
  RestockResult,
  SaleResult,
} from './ledger-types.js';

function copyItem(item: InventoryItem): InventoryItem {
  return { ...item };
}

function copyTransaction(tx: Transaction): Transaction {
  return { ...tx, date: new Date(tx.date) };
}

function assertNonNegativeAmount(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new LedgerValidationError(`${field} must be a non-negative number`);
  }
}

function assertWholeNumber(value: number, field: string, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new LedgerValidationError(`${field} must be a whole number of at least ${min}`);
  }
}

export class LedgerStore {
  private inventory: InventoryItem[] = [];
  private transactions: Transaction[] = [];
  private loaded = false;
  private queue: Promise<unknown> = Promise.resolve();

  private readonly storage: LedgerStorage;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly oversellPolicy: OversellPolicy;

  constructor(options: LedgerStoreOptions) {
    this.storage = options.storage;
    this.log = (options.logger ?? defaultLogger).child({ module: 'ledger' });
    this.now = options.now ?? (() => new Date());
    this.oversellPolicy = options.oversellPolicy ?? 'allow';
  }

  /**
   * Create a store and load its state from storage
   */
  static async open(options: LedgerStoreOptions): Promise<LedgerStore> {
    const store = new LedgerStore(options);
    await store.load();
    return store;
  }

  /**
   * Replace in-memory state with the stored snapshot
   */
  async load(): Promise<void> {
    const snapshot = await this.storage.load();
    this.inventory = snapshot.inventory.map(copyItem);
    this.transactions = snapshot.transactions.map(copyTransaction);
    this.loaded = true;

    this.log.info(
      { items: this.inventory.length, transactions: this.transactions.length },
      'Ledger loaded'
    );
  }

  listItems(): InventoryItem[] {
    return this.inventory.map(copyItem);
  }

  getItem(name: string): InventoryItem | null {
    const item = this.findItem(name);
    return item ? copyItem(item) : null;
  }

  listTransactions(): IndexedTransaction[] {
    return this.transactions.map((tx, index) => ({ ...copyTransaction(tx), index }));
  }

  /**
   * Outstanding debt sales, optionally for one customer
   */
  debtRows(customerName?: string): IndexedTransaction[] {
    return this.listTransactions().filter(
      (tx) =>
        isOutstandingDebt(tx) && (customerName === undefined || tx.customerName === customerName)
    );
  }

  /**
   * Customers with outstanding debt, in the order they first borrowed
   */
  listDebtors(): string[] {
    const names = new Set<string>();
    for (const tx of this.transactions) {
      if (isOutstandingDebt(tx)) {
        names.add(tx.customerName);
      }
    }
    return [...names];
  }

  /**
   * Record a purchase of stock
   *
   * A known item gains `unitsPurchased`; a new item is created with its
   * cost per unit derived from the purchase. Either way a Purchase row
   * carrying the amount as expense is appended.
   *
   * @throws {LedgerValidationError} If the name is empty or a number is out of range
   * @throws {PersistenceError} If the new state could not be saved
   */
  addOrRestockItem(
    name: string,
    purchaseAmountTotal: number,
    unitsPurchased: number
  ): Promise<RestockResult> {
    return this.run(async () => {
      this.assertLoaded();

      const itemName = name.trim();
      if (!itemName) {
        throw new LedgerValidationError('Item name is required');
      }
      assertNonNegativeAmount(purchaseAmountTotal, 'Purchase amount');
      assertWholeNumber(unitsPurchased, 'Units purchased', 0);

      let item = this.findItem(itemName);
      const created = item === undefined;

      if (item) {
        item.quantity += unitsPurchased;
      } else {
        item = {
          name: itemName,
          quantity: unitsPurchased,
          costPerUnit: unitsPurchased > 0 ? purchaseAmountTotal / unitsPurchased : 0,
          sellingPrice: 0,
        };
        this.inventory.push(item);
      }

      const transaction: Transaction = {
        date: this.now(),
        type: 'Purchase',
        item: itemName,
        quantity: unitsPurchased,
        price: 0,
        customerName: '',
        paymentMode: '',
        expense: purchaseAmountTotal,
      };
      this.transactions.push(transaction);
      const index = this.transactions.length - 1;

      this.log.info(
        { item: itemName, unitsPurchased, amount: purchaseAmountTotal, created },
        created ? 'Item added' : 'Item restocked'
      );
      await this.persist('addOrRestockItem');

      return {
        item: copyItem(item),
        transaction: copyTransaction(transaction),
        index,
        created,
      };
    });
  }

  /**
   * Remove an item together with its Purchase rows
   *
   * Sales of the item stay in the ledger and nothing is reversed.
   *
   * @throws {ItemNotFoundError} If no item has this name
   */
  deleteItem(name: string): Promise<DeleteItemResult> {
    return this.run(async () => {
      this.assertLoaded();

      const itemName = name.trim();
      const position = this.inventory.findIndex((item) => item.name === itemName);
      const item = this.inventory[position];
      if (!item) {
        throw new ItemNotFoundError(itemName);
      }

      this.inventory.splice(position, 1);
      const before = this.transactions.length;
      this.transactions = this.transactions.filter(
        (tx) => !(tx.type === 'Purchase' && tx.item === itemName)
      );
      const removedTransactions = before - this.transactions.length;

      this.log.info({ item: itemName, removedTransactions }, 'Item deleted');
      await this.persist('deleteItem');

      return { item: copyItem(item), removedTransactions };
    });
  }

  /**
   * Record a sale and take the units out of stock
   *
   * Debt sales stay out of realized revenue until cleared with clearDebt.
   *
   * @throws {ItemNotFoundError} If the item is not in inventory
   * @throws {LedgerValidationError} If a number is out of range or a debt sale has no customer
   * @throws {InsufficientStockError} If oversell is rejected and stock is short
   */
  recordSale(
    itemName: string,
    quantity: number,
    unitPrice: number,
    customerName: string,
    paymentMode: SalePaymentMode
  ): Promise<SaleResult> {
    return this.run(async () => {
      this.assertLoaded();

      assertWholeNumber(quantity, 'Quantity', 1);
      assertNonNegativeAmount(unitPrice, 'Unit price');

      const customer = customerName.trim();
      if (paymentMode === 'Debt' && !customer) {
        throw new LedgerValidationError('Customer name is required for a debt sale');
      }

      const item = this.findItem(itemName);
      if (!item) {
        throw new ItemNotFoundError(itemName);
      }

      const remaining = item.quantity - quantity;
      if (remaining < 0) {
        if (this.oversellPolicy === 'reject') {
          throw new InsufficientStockError(item.name, item.quantity, quantity);
        }
        this.log.warn(
          { item: item.name, available: item.quantity, requested: quantity },
          'Sale takes stock below zero'
        );
      }

      const transaction: Transaction = {
        date: this.now(),
        type: 'Sale',
        item: item.name,
        quantity,
        price: unitPrice,
        customerName: customer,
        paymentMode,
        expense: 0,
      };
      this.transactions.push(transaction);
      const index = this.transactions.length - 1;
      item.quantity = remaining;

      this.log.info({ item: item.name, quantity, unitPrice, paymentMode }, 'Sale recorded');
      await this.persist('recordSale');

      return {
        item: copyItem(item),
        transaction: copyTransaction(transaction),
        index,
      };
    });
  }

  /**
   * Remove one transaction by position and reverse its stock effect
   *
   * A deleted sale returns its units to stock; a deleted purchase takes
   * them back out. Debt payments have no stock effect.
   *
   * @throws {TransactionNotFoundError} If the index is out of range
   */
  deleteTransaction(index: number): Promise<DeleteTransactionResult> {
    return this.run(async () => {
      this.assertLoaded();

      const transaction = Number.isInteger(index) ? this.transactions[index] : undefined;
      if (!transaction) {
        throw new TransactionNotFoundError(index);
      }

      const item = this.findItem(transaction.item);
      if (item) {
        if (transaction.type === 'Sale') {
          item.quantity += transaction.quantity;
        } else if (transaction.type === 'Purchase') {
          item.quantity -= transaction.quantity;
        }
      }
      this.transactions.splice(index, 1);

      this.log.info(
        { index, type: transaction.type, item: transaction.item },
        'Transaction deleted'
      );
      await this.persist('deleteTransaction');

      return {
        transaction: copyTransaction(transaction),
        item: item ? copyItem(item) : null,
      };
    });
  }

  /**
   * Settle every outstanding debt sale of a customer
   *
   * Appends one Debt Payment row for the summed price of the debt rows,
   * then drops those rows. Item and quantity detail of the settled sales
   * is not kept.
   *
   * @throws {DebtNotFoundError} If the customer has no outstanding debt
   */
  clearDebt(customerName: string): Promise<ClearDebtResult> {
    return this.run(async () => {
      this.assertLoaded();

      const customer = customerName.trim();
      const debts = this.transactions.filter(
        (tx) => isOutstandingDebt(tx) && tx.customerName === customer
      );
      if (debts.length === 0) {
        throw new DebtNotFoundError(customer);
      }

      const amount = debts.reduce((sum, tx) => sum + tx.price, 0);
      const payment: Transaction = {
        date: this.now(),
        type: 'Debt Payment',
        item: DEBT_PAYMENT_ITEM,
        quantity: 1,
        price: amount,
        customerName: customer,
        paymentMode: 'Full',
        expense: 0,
      };

      this.transactions.push(payment);
      this.transactions = this.transactions.filter(
        (tx) => !(tx.customerName === customer && tx.paymentMode === 'Debt')
      );
      const index = this.transactions.length - 1;

      this.log.info({ customerName: customer, amount, clearedRows: debts.length }, 'Debt cleared');
      await this.persist('clearDebt');

      return {
        payment: copyTransaction(payment),
        index,
        clearedRows: debts.length,
      };
    });
  }

  snapshot(): LedgerSnapshot {
    return {
      inventory: this.listItems(),
      transactions: this.transactions.map(copyTransaction),
    };
  }

  private findItem(name: string): InventoryItem | undefined {
    return this.inventory.find((item) => item.name === name);
  }

  private assertLoaded(): void {
    if (!this.loaded) {
      throw new LedgerError('Ledger store has not been loaded');
    }
  }

  /**
   * Run a mutation after every earlier one has finished, so each change
   * and its save complete before the next change starts.
   */
  private run<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.queue.then(operation);
    // A failed mutation is reported to its own caller; the next one still runs
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /**
   * Write the full state. The in-memory change is kept when this fails.
   */
  private async persist(operation: string): Promise<void> {
    try {
      await this.storage.save(this.snapshot());
    } catch (error) {
      this.log.error({ err: error, operation }, 'Failed to persist ledger');
      throw new PersistenceError(operation, error);
    }
  }
}
