import type { AccountId } from '../ledger/types';

export interface AccessGate {
  isOwner(caller: AccountId): boolean;
  isPaused(): boolean;
  setPaused(paused: boolean): void;
}

/** Single configured platform owner with an in-memory pause switch. */
export class StaticAccessGate implements AccessGate {
  private paused: boolean;

  constructor(private readonly owner: AccountId, paused = false) {
    this.paused = paused;
  }

  isOwner(caller: AccountId): boolean {
    return caller === this.owner;
  }

  isPaused(): boolean {
    return this.paused;
  }

  setPaused(paused: boolean): void {
    this.paused = paused;
  }
}
