/** Source of the current block height. Must never move backwards. */
export interface BlockClock {
  currentBlock(): bigint;
}

/** Clock advanced by hand; used by tests and local simulations. */
export class ManualClock implements BlockClock {
  constructor(private height: bigint = 0n) {}

  currentBlock(): bigint {
    return this.height;
  }

  /** Advance by n blocks. */
  mine(n: bigint = 1n): bigint {
    if (n < 0n) throw new Error(`Cannot mine a negative number of blocks: ${n}`);
    this.height += n;
    return this.height;
  }
}
