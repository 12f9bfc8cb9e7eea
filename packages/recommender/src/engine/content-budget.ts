import type { ServiceId } from '../types.js';

export interface AnchorBudgetOptions {
  budget: number;
  selectedShare: number;
}

const spread = (anchors: readonly ServiceId[], total: number, into: Map<ServiceId, number>): void => {
  if (anchors.length === 0) {
    return;
  }
  const base = Math.floor(total / anchors.length);
  const extra = total % anchors.length;
  anchors.forEach((anchor, index) => {
    into.set(anchor, base + (index < extra ? 1 : 0));
  });
};

/**
 * Splits the content-recommendation budget across anchor services.
 * The selected service takes its share first; history anchors split the
 * rest in the order given, earlier anchors taking the remainder.
 */
export const allocateAnchorBudget = (
  historyAnchors: readonly ServiceId[],
  selectedServiceId: ServiceId | null,
  options: AnchorBudgetOptions
): Map<ServiceId, number> => {
  const allocation = new Map<ServiceId, number>();
  const budget = Math.max(0, options.budget);

  if (selectedServiceId === null) {
    spread(historyAnchors, budget, allocation);
    return allocation;
  }

  const others = historyAnchors.filter((anchor) => anchor !== selectedServiceId);
  if (others.length === 0) {
    allocation.set(selectedServiceId, budget);
    return allocation;
  }

  const selectedShare = Math.min(Math.max(0, options.selectedShare), budget);
  allocation.set(selectedServiceId, selectedShare);
  spread(others, budget - selectedShare, allocation);
  return allocation;
};
