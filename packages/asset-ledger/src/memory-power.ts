/**
 * In-memory voting power oracle.
 *
 * Power is whatever setPower() last said. Total power is the sum over all
 * holders, so holders who never stake still dilute the boost.
 */

import type { PowerSource } from "./types.js";

export class MemoryPowerSource implements PowerSource {
  private readonly powers = new Map<string, bigint>();

  async powerOf(holder: string): Promise<bigint> {
    return this.powers.get(holder) ?? 0n;
  }

  async totalPower(): Promise<bigint> {
    let total = 0n;
    for (const p of this.powers.values()) total += p;
    return total;
  }

  /** Test helper: set (or clear, with 0n) a holder's power. */
  setPower(holder: string, power: bigint): void {
    if (power < 0n) throw new RangeError(`negative power for ${holder}`);
    if (power === 0n) this.powers.delete(holder);
    else this.powers.set(holder, power);
  }
}
