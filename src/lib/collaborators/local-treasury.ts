import type { Treasury } from "@/lib/collaborators/types";
import type { ActorAddress } from "@/lib/types";
import { formatAmount, nowIso } from "@/lib/utils";

export interface Payout {
  to: ActorAddress;
  amount: string;
  paidAt: string;
}

export class LocalTreasury implements Treasury {
  readonly payouts: Payout[] = [];

  transfer(to: ActorAddress, amount: bigint): boolean {
    if (amount <= 0n) return false;
    this.payouts.push({ to, amount: formatAmount(amount), paidAt: nowIso() });
    return true;
  }
}
