import type { LineItem } from '@nfe-ledger/contracts';

/**
 * Allowed difference between quantity × unit price and the declared item total.
 */
export const ITEM_TOTAL_TOLERANCE = 0.02;

export interface ItemTotalMismatch {
  index: number;
  quantity: number;
  unitPrice: number;
  computed: number;
  declared: number;
  difference: number;
}

/**
 * Items whose quantity × unit price differs from the declared total by more
 * than {@link ITEM_TOTAL_TOLERANCE}. Items missing quantity or price are skipped.
 */
export function findItemTotalMismatches(items: readonly LineItem[]): ItemTotalMismatch[] {
  const mismatches: ItemTotalMismatch[] = [];
  items.forEach((item, index) => {
    if (item.quantity === null || item.unitPrice === null) {
      return;
    }
    const computed = item.quantity * item.unitPrice;
    const difference = Math.abs(computed - item.totalValue);
    if (difference > ITEM_TOTAL_TOLERANCE) {
      mismatches.push({
        index,
        quantity: item.quantity,
        unitPrice: item.unitPrice,
        computed,
        declared: item.totalValue,
        difference,
      });
    }
  });
  return mismatches;
}
