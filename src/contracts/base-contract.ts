import AccessControl from '../lib/access-control';
import GuardedOperation from '../lib/guarded-operation';
import { EventArgValue, RestoreFn, Snapshottable } from '../lib/ledger-types';
import Logger from '../lib/logger';
import Runtime from '../lib/runtime';

/**
 * Holds what every contract composes: an address, the entry-point guard and the owner/allow-list gate.
 */
export default abstract class BaseContract implements Snapshottable {
  public readonly address: string;

  protected readonly runtime: Runtime;
  protected readonly guard: GuardedOperation;
  protected readonly access: AccessControl;

  protected constructor(runtime: Runtime, contractName: string, owner: string) {
    this.runtime = runtime;
    this.address = runtime.nextContractAddress();
    this.guard = new GuardedOperation(runtime, contractName);
    this.access = new AccessControl(runtime, owner);
    runtime.register(this);
  }

  public getOwner(): string {
    return this.access.getOwner();
  }

  public isPaused(): boolean {
    return this.guard.isPaused();
  }

  public pause(sender: string): void {
    this.guard.run('pause', () => {
      this.access.requireOwner(sender);
      this.guard.setPaused(true);
      this.emit('Paused', { account: sender.toLowerCase() });
    });
  }

  public unpause(sender: string): void {
    this.guard.run('unpause', () => {
      this.access.requireOwner(sender);
      this.guard.setPaused(false);
      this.emit('Unpaused', { account: sender.toLowerCase() });
    }, { whenNotPaused: false });
  }

  public transferOwnership(sender: string, newOwner: string): void {
    this.guard.run('transferOwnership', () => {
      this.access.requireOwner(sender);
      const previousOwner = this.access.getOwner();
      this.access.transferOwnership(newOwner);
      this.emit('OwnershipTransferred', { previousOwner, newOwner: this.access.getOwner() });

      Logger.info({
        at: `${this.constructor.name}#transferOwnership`,
        message: 'Transferred ownership',
        previousOwner,
        newOwner: this.access.getOwner(),
      });
    });
  }

  public abstract takeSnapshot(): RestoreFn;

  protected now(): number {
    return this.runtime.now();
  }

  protected emit(name: string, args: Record<string, EventArgValue>): void {
    this.runtime.emit(this.address, name, args);
  }
}
