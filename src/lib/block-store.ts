import { DateTime } from 'luxon';
import Logger from './logger';

export default class BlockStore {
  private blockNumber: number;
  private blockTimestamp: number;

  constructor(blockTimestamp: number = Math.floor(DateTime.now().toSeconds()), blockNumber: number = 0) {
    this.blockNumber = blockNumber;
    this.blockTimestamp = blockTimestamp;
  }

  public getBlockNumber(): number {
    return this.blockNumber;
  }

  public getBlockTimestamp(): number {
    return this.blockTimestamp;
  }

  /**
   * Produces one new block `seconds` after the current one
   */
  mine = (seconds: number) => {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new Error(`Invalid block interval: ${seconds}`);
    }
    this.blockNumber += 1;
    this.blockTimestamp += seconds;
  };

  setBlockTimestamp = (timestamp: number) => {
    if (timestamp < this.blockTimestamp) {
      throw new Error(`Block timestamp cannot move backwards: ${timestamp} < ${this.blockTimestamp}`);
    }
    this.mine(timestamp - this.blockTimestamp);

    Logger.debug({
      at: 'BlockStore#setBlockTimestamp',
      message: 'Advanced block',
      blockNumber: this.blockNumber,
      blockTimestamp: this.blockTimestamp,
    });
  };
}
