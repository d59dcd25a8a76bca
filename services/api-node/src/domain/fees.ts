import { MAX_BASIS_POINTS, type Circle } from "@roscaflow/shared";

export interface FeeSplit {
  fee: number;
  net: number;
}

export function isValidBasisPoints(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_BASIS_POINTS;
}

/** `floor(amount * bps / 10000)`, exactly 0 when `bps` is 0. */
export function basisPointsOf(amount: number, bps: number): number {
  if (bps === 0 || amount === 0) {
    return 0;
  }
  return Math.floor((amount * bps) / MAX_BASIS_POINTS);
}

export function splitProtocolFee(gross: number, feeBps: number): FeeSplit {
  const fee = basisPointsOf(gross, feeBps);
  return { fee, net: gross - fee };
}

export function lateFeeFor(contribution: number, lateFeeBps: number, now: number, deadline: number): number {
  return now > deadline ? basisPointsOf(contribution, lateFeeBps) : 0;
}

export function insuranceFeeFor(contribution: number, insuranceFeeBps: number): number {
  return basisPointsOf(contribution, insuranceFeeBps);
}

export type PayoutTargetInput = Pick<
  Circle,
  "contribution" | "lateFeeBps" | "insuranceFeeBps" | "groupReserve" | "insuranceBalance" | "deadline"
>;

/**
 * Amount custody must hold before a payout is disbursed: the contribution plus
 * the surcharges owed against it, each capped at what its earmark still holds.
 */
export function payoutTarget(circle: PayoutTargetInput, now: number): number {
  const lateFee = Math.min(
    lateFeeFor(circle.contribution, circle.lateFeeBps, now, circle.deadline),
    circle.groupReserve
  );
  const insuranceFee = Math.min(insuranceFeeFor(circle.contribution, circle.insuranceFeeBps), circle.insuranceBalance);
  return circle.contribution + lateFee + insuranceFee;
}

export function saturatingSub(value: number, amount: number): number {
  return value > amount ? value - amount : 0;
}
