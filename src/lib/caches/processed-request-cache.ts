import { ErrorCode, StateError, ValidationError } from '../errors';
import { RestoreFn, Snapshottable } from '../ledger-types';
import Runtime from '../runtime';

/**
 * Claim and cancel request ids that have been consumed. Entries never expire.
 */
export default class ProcessedRequestCache implements Snapshottable {
  private store: Set<string>;

  constructor(runtime: Runtime) {
    this.store = new Set();
    runtime.register(this);
  }

  public contains(requestId: string): boolean {
    return this.store.has(requestId);
  }

  public requireUnprocessed(requestId: string): void {
    if (!requestId) {
      throw new ValidationError(ErrorCode.InvalidRequestId);
    }
    if (this.contains(requestId)) {
      throw new StateError(ErrorCode.DuplicateRequest, requestId);
    }
  }

  public consume(requestId: string): void {
    this.requireUnprocessed(requestId);
    this.store.add(requestId);
  }

  public takeSnapshot(): RestoreFn {
    const store = new Set(this.store);
    return () => {
      this.store = store;
    };
  }
}
