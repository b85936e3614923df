/** Source of the current time, in unix seconds */
export interface Clock {
  now(): bigint
}

export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
}

/** A clock that only moves when told to */
export class ManualClock implements Clock {
  private timestamp: bigint

  constructor(timestamp = 0n) {
    this.timestamp = timestamp
  }

  now(): bigint {
    return this.timestamp
  }

  set(timestamp: bigint): void {
    this.timestamp = timestamp
  }

  advance(seconds: bigint): void {
    this.timestamp += seconds
  }
}
