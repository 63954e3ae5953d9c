/**
 * Lazy single-notification result. The underlying work starts on the first
 * subscription and runs at most once; every subscriber observes the same
 * value or error. There are no intermediate notifications.
 */
export class Deferred<T> implements PromiseLike<T> {
  private result?: Promise<T>;

  constructor(private readonly start: () => Promise<T>) {}

  get started(): boolean {
    return this.result !== undefined;
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
  ): Promise<TResult1 | TResult2> {
    return this.toPromise().then(onfulfilled, onrejected);
  }

  catch<TResult = never>(onrejected?: ((reason: unknown) => TResult | PromiseLike<TResult>) | null): Promise<T | TResult> {
    return this.toPromise().catch(onrejected);
  }

  toPromise(): Promise<T> {
    if (!this.result) {
      this.result = this.start();
    }
    return this.result;
  }
}
