/**
 * Loads the page of rows that follows the row keyed `after` (`null` for the
 * first page). Pages must be ordered by the same key `keyOf` reads.
 */
export type PageLoader<T> = (
  after: number | null,
  limit: number,
) => ReadonlyArray<T> | Promise<ReadonlyArray<T>>;

export type CursorOptions<T> = {
  readonly pageSize: number;
  readonly keyOf: (row: T) => number;
  readonly signal?: AbortSignal;
};

/**
 * Lazy, forward-only, single-consumer sequence over a result set.
 *
 * `error` holds the failure that ended the sequence early, if any. Rows
 * yielded before it are still valid.
 */
export type Cursor<T> = AsyncIterableIterator<T> & {
  readonly closed: boolean;
  readonly error: unknown;
  close(): void;
};

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Keyset-paginated cursor. Only one page is held in memory, and no database
 * statement stays open between pages, so the consumer may write to the same
 * connection while it iterates.
 *
 * The sequence ends when the loader returns a short page, when the consumer
 * calls `close()` or `return()` (a `break` out of `for await`), or when the
 * signal aborts. A failure on the first page is thrown from `next()`; a
 * failure on a later page ends the sequence and is kept on `error`.
 */
export class PagedCursor<T extends object> implements Cursor<T> {
  private buffer: Array<T> = [];
  private after: number | null = null;
  private pagesLoaded = 0;
  private exhausted = false;
  private isClosed = false;
  private failure: unknown = null;

  constructor(
    private readonly loadPage: PageLoader<T>,
    private readonly options: CursorOptions<T>,
  ) {
    if (!Number.isInteger(options.pageSize) || options.pageSize < 1) {
      throw new RangeError(`page size must be a positive integer, got ${options.pageSize}`);
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get error(): unknown {
    return this.failure;
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    if (this.isClosed) return DONE;

    if (this.options.signal?.aborted) {
      this.close();
      return DONE;
    }

    if (this.buffer.length === 0 && !(await this.fill())) {
      this.close();
      return DONE;
    }

    const row = this.buffer.shift();
    if (row === undefined) {
      this.close();
      return DONE;
    }
    return { done: false, value: row };
  }

  async return(): Promise<IteratorResult<T, undefined>> {
    this.close();
    return DONE;
  }

  close(): void {
    this.isClosed = true;
    this.buffer = [];
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  private async fill(): Promise<boolean> {
    if (this.exhausted) return false;

    let page: ReadonlyArray<T>;
    try {
      page = await this.loadPage(this.after, this.options.pageSize);
    } catch (err) {
      if (this.pagesLoaded === 0) {
        this.close();
        throw err;
      }
      this.failure = err;
      return false;
    }
    this.pagesLoaded++;

    // The signal may have fired while the page was loading.
    if (this.options.signal?.aborted) return false;

    if (page.length < this.options.pageSize) this.exhausted = true;

    const last = page[page.length - 1];
    if (last === undefined) return false;

    this.after = this.options.keyOf(last);
    this.buffer = [...page];
    return true;
  }
}

/**
 * Drains a cursor into an array. For result sets known to be small, such as
 * one destination's subscriptions rendered into a single reply.
 */
export async function collect<T>(cursor: AsyncIterable<T>): Promise<Array<T>> {
  const rows: Array<T> = [];
  for await (const row of cursor) {
    rows.push(row);
  }
  return rows;
}
