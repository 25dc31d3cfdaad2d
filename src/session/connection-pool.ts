/**
 * Small pool of dedicated connections.
 *
 * A connection that fails during `use` is disposed rather than returned,
 * since its state (e.g. an outstanding WATCH) is unknown. Idle connections
 * beyond `maxIdle` are disposed on release.
 */
export class ConnectionPool<T> {
  private idle: T[] = [];
  private created = 0;
  private closed = false;

  constructor(
    private readonly create: () => T,
    private readonly dispose: (conn: T) => void,
    private readonly maxIdle = 4,
  ) {}

  async use<R>(fn: (conn: T) => Promise<R>): Promise<R> {
    if (this.closed) throw new Error('Connection pool is closed');

    const conn = this.idle.pop() ?? this.open();
    try {
      const result = await fn(conn);
      this.release(conn);
      return result;
    } catch (err) {
      this.dispose(conn);
      throw err;
    }
  }

  /** Dispose every idle connection and refuse further use */
  drain(): void {
    this.closed = true;
    for (const conn of this.idle.splice(0)) this.dispose(conn);
  }

  get idleCount(): number {
    return this.idle.length;
  }

  get createdCount(): number {
    return this.created;
  }

  private open(): T {
    this.created++;
    return this.create();
  }

  private release(conn: T): void {
    if (this.closed || this.idle.length >= this.maxIdle) {
      this.dispose(conn);
      return;
    }
    this.idle.push(conn);
  }
}
