import GuardedOperation from '../../src/lib/guarded-operation';
import { ErrorCode, StateError } from '../../src/lib/errors';
import { ALICE, BOB, deployBase, fund, MANAGEMENT, OWNER, START_TIMESTAMP, TOTAL_SUPPLY, wei } from '../fixtures';

describe('Runtime', () => {
  it('should derive a distinct address for every deployed contract', () => {
    const { token, vesting } = deployBase();
    expect(token.address).toMatch(/^0x[0-9a-f]{40}$/);
    expect(vesting.address).toMatch(/^0x[0-9a-f]{40}$/);
    expect(token.address).not.toEqual(vesting.address);
  });

  it('should read the clock from the block store', () => {
    const { runtime, blockStore } = deployBase();
    expect(runtime.now()).toEqual(START_TIMESTAMP);
    blockStore.mine(15);
    expect(runtime.now()).toEqual(START_TIMESTAMP + 15);
    expect(blockStore.getBlockNumber()).toEqual(1);
    expect(() => blockStore.setBlockTimestamp(START_TIMESTAMP)).toThrow('cannot move backwards');
  });

  it('should undo every write and event when the boundary throws', () => {
    const { runtime, token } = deployBase();
    const eventCount = runtime.getEvents().length;

    expect(() => runtime.atomic(() => {
      token.transfer(MANAGEMENT, ALICE, wei(5));
      token.transfer(ALICE, BOB, wei(2));
      throw new Error('boom');
    })).toThrow('boom');

    expect(token.balanceOf(MANAGEMENT).toFixed()).toEqual(TOTAL_SUPPLY.toFixed());
    expect(token.balanceOf(ALICE).toFixed()).toEqual('0');
    expect(token.balanceOf(BOB).toFixed()).toEqual('0');
    expect(runtime.getEvents().length).toEqual(eventCount);
  });

  it('should keep writes from a boundary that completes', () => {
    const { runtime, token } = deployBase();
    runtime.atomic(() => fund(token, ALICE, wei(5)));

    expect(token.balanceOf(ALICE).toFixed()).toEqual(wei(5).toFixed());
    const transfers = runtime.getEvents({ address: token.address, name: 'Transfer' });
    expect(transfers[transfers.length - 1].args).toEqual({ from: MANAGEMENT, to: ALICE, amount: wei(5).toFixed() });
  });

  it('should roll back a failed inner call with the rest of the outer one', () => {
    const { token } = deployBase();
    fund(token, ALICE, wei(1));

    expect(() => token.transferFrom(BOB, ALICE, BOB, wei(1))).toThrow(ErrorCode.InsufficientAllowance);
    expect(token.balanceOf(ALICE).toFixed()).toEqual(wei(1).toFixed());
  });
});

describe('GuardedOperation', () => {
  it('should reject calls while paused and accept them after unpausing', () => {
    const { token } = deployBase();
    token.pause(OWNER);

    expect(() => token.transfer(MANAGEMENT, ALICE, wei(1))).toThrow(StateError);
    expect(() => token.transfer(MANAGEMENT, ALICE, wei(1))).toThrow(ErrorCode.Paused);

    token.unpause(OWNER);
    token.transfer(MANAGEMENT, ALICE, wei(1));
    expect(token.balanceOf(ALICE).toFixed()).toEqual(wei(1).toFixed());
  });

  it('should only let the owner pause', () => {
    const { token } = deployBase();
    expect(() => token.pause(ALICE)).toThrow(ErrorCode.NotOwner);
    expect(token.isPaused()).toEqual(false);
  });

  it('should reject reentrant calls', () => {
    const { runtime } = deployBase();
    const guard = new GuardedOperation(runtime, 'Reentrant');

    expect(() => guard.run('outer', () => guard.run('inner', () => 1))).toThrow(ErrorCode.ReentrantCall);
    expect(guard.run('again', () => 2)).toEqual(2);
  });
});
