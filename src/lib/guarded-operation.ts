import { ErrorCode, isContractError, StateError } from './errors';
import { RestoreFn, Snapshottable } from './ledger-types';
import Logger from './logger';
import Runtime from './runtime';

export interface GuardOptions {
  /**
   * Defaults to true. Admin entry points such as `unpause` turn it off.
   */
  whenNotPaused?: boolean;
}

/**
 * Wraps every contract entry point: pause check, reentrancy check, then the all-or-nothing boundary of the runtime.
 */
export default class GuardedOperation implements Snapshottable {
  private paused: boolean;
  private entered: boolean;

  constructor(
    private readonly runtime: Runtime,
    private readonly contractName: string,
  ) {
    this.paused = false;
    this.entered = false;
    runtime.register(this);
  }

  public isPaused(): boolean {
    return this.paused;
  }

  public setPaused(paused: boolean): void {
    this.paused = paused;
  }

  public run<T>(method: string, fn: () => T, options: GuardOptions = {}): T {
    const at = `${this.contractName}#${method}`;
    if (options.whenNotPaused !== false && this.paused) {
      throw new StateError(ErrorCode.Paused, at);
    }
    if (this.entered) {
      throw new StateError(ErrorCode.ReentrantCall, at);
    }

    this.entered = true;
    try {
      return this.runtime.atomic(fn);
    } catch (error) {
      Logger.warn({
        at,
        message: 'Call reverted',
        code: isContractError(error) ? error.code : undefined,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      this.entered = false;
    }
  }

  public takeSnapshot(): RestoreFn {
    const paused = this.paused;
    return () => {
      this.paused = paused;
    };
  }
}
