// ---------------------------------------------------------------------------
// Store: transactional sessions over the SQLite database
// ---------------------------------------------------------------------------
//
// A session is one transaction's view of the store: the locks it holds and
// the writes it has buffered. Reads go straight to the database, always
// after the relevant lock is held. Writes are queued and applied in a single
// synchronous SQLite transaction at commit, so nothing can interleave with
// them. Locks are released after commit or rollback.
//
// Lock order: cart:<userId> or order:<orderId> first, then product:<id> in
// ascending id order.
// ---------------------------------------------------------------------------

import { errorFromAbortReason } from '../errors.js';
import { getConfiguration } from '../config.js';
import { createServiceLogger } from '../logging/logger.js';
import { storeCall, withTransaction, type Db } from './database.js';
import { LockManager } from './lock-manager.js';
import { StockLedger, type LedgerSession } from './stock-ledger.js';
import { CartRepository } from './carts.js';
import { OrderRepository } from './orders.js';
import { CatalogRepository } from './catalog.js';
import { DirectoryRepository } from './directory.js';

const log = createServiceLogger('store');

export interface StoreOptions {
  /** Lock-wait bound (default: the configured lockTimeoutMs) */
  lockTimeoutMs?: number;
  locks?: LockManager;
}

export interface TransactionOptions {
  signal?: AbortSignal;
}

export class TransactionSession implements LedgerSession {
  readonly ledger: StockLedger;
  readonly carts: CartRepository;
  readonly orders: OrderRepository;
  readonly catalog: CatalogRepository;
  readonly directory: DirectoryRepository;

  private readonly held: string[] = [];
  private readonly writes: Array<() => void> = [];
  private finished = false;

  constructor(
    private readonly store: Store,
    private readonly signal?: AbortSignal,
  ) {
    const defer = (write: () => void): void => this.defer(write);
    this.ledger = new StockLedger(store.db, this);
    this.carts = new CartRepository(store.db, defer);
    this.orders = new OrderRepository(store.db, defer);
    this.catalog = new CatalogRepository(store.db);
    this.directory = new DirectoryRepository(store.db);
  }

  /**
   * Acquire an exclusive lock held until the session ends.
   */
  async lock(key: string): Promise<void> {
    this.assertOpen();
    if (this.holds(key)) return;

    await this.store.locks.acquire(key, this, {
      timeoutMs: this.store.lockTimeoutMs,
      signal: this.signal,
    });
    this.held.push(key);
  }

  holds(key: string): boolean {
    return this.held.includes(key);
  }

  get lockedKeys(): readonly string[] {
    return this.held;
  }

  defer(write: () => void): void {
    this.assertOpen();
    this.writes.push(write);
  }

  /**
   * Apply every buffered write atomically. Fails without writing anything
   * when the session's signal has been aborted.
   */
  commit(): void {
    this.assertOpen();
    if (this.signal?.aborted) {
      throw errorFromAbortReason(this.signal.reason);
    }

    storeCall(() =>
      withTransaction(this.store.db, () => {
        for (const write of this.writes) write();
      }),
    );
    this.finished = true;
  }

  /** Discard buffered writes and release every lock */
  end(): void {
    this.finished = true;
    this.writes.length = 0;
    for (const key of this.held.splice(0).reverse()) {
      this.store.locks.release(key, this);
    }
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new Error('Transaction session has already ended');
    }
  }
}

export class Store {
  readonly locks: LockManager;
  readonly carts: CartRepository;
  readonly orders: OrderRepository;
  readonly catalog: CatalogRepository;
  readonly directory: DirectoryRepository;

  constructor(
    readonly db: Db,
    private readonly options: StoreOptions = {},
  ) {
    this.locks = options.locks ?? new LockManager();

    // Outside a session, writes apply immediately in their own transaction
    const immediate = (write: () => void): void => storeCall(() => withTransaction(db, write));
    this.carts = new CartRepository(db, immediate);
    this.orders = new OrderRepository(db, immediate);
    this.catalog = new CatalogRepository(db);
    this.directory = new DirectoryRepository(db);
  }

  get lockTimeoutMs(): number {
    return this.options.lockTimeoutMs ?? getConfiguration().lockTimeoutMs;
  }

  /**
   * Run `fn` in a session and commit its writes when it resolves. Any
   * error, including one raised at commit, rolls everything back.
   */
  async transaction<T>(
    fn: (session: TransactionSession) => Promise<T>,
    options: TransactionOptions = {},
  ): Promise<T> {
    const session = new TransactionSession(this, options.signal);
    try {
      const value = await fn(session);
      session.commit();
      return value;
    } catch (err) {
      log.debug('Transaction rolled back', {
        locks: [...session.lockedKeys],
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    } finally {
      session.end();
    }
  }

  close(): void {
    this.db.close();
  }
}
