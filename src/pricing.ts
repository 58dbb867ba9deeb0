// ============================================================================
// @phasemint/engine — Cost Computation
// ============================================================================

import { BPS_DENOMINATOR } from './constants.js';
import type { CostBreakdown, FeeConfig } from './types.js';

/**
 * Price a purchase of `amount` units at `price` each.
 *
 * The platform takes the flat per-unit mint fee plus `salesFeeBps` of the
 * subtotal (rounded down), both charged on top of the price. The creator
 * receives the subtotal. `platformShare + creatorShare === requiredCost`.
 */
export function computeCost(
  amount: number,
  price: bigint,
  fees: Pick<FeeConfig, 'mintFeePerUnit' | 'salesFeeBps'>,
): CostBreakdown {
  const units = BigInt(amount);
  const subtotal = units * price;
  const mintFeeTotal = units * fees.mintFeePerUnit;
  const salesFee = (subtotal * BigInt(fees.salesFeeBps)) / BPS_DENOMINATOR;
  const requiredCost = subtotal + mintFeeTotal + salesFee;
  const platformShare = mintFeeTotal + salesFee;
  return {
    subtotal,
    mintFeeTotal,
    salesFee,
    requiredCost,
    platformShare,
    creatorShare: requiredCost - platformShare,
  };
}
