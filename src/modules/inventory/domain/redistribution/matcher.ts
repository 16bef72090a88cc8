import { normalizeLabel } from '../../../../common/utils/text-normalize.utils';
import { compareText } from '../store-registry';
import type { RedistributionSuggestion, StorePosition } from './types';

/** Dormant surplus: above its floor, nothing sold, and not a fixed store. */
export function isOrigin(position: StorePosition): boolean {
  return position.stock > position.minimumStock && position.sales === 0 && !position.fixed;
}

/** Actively selling below its floor. */
export function isDestination(position: StorePosition, minDestinationSales: number): boolean {
  return position.stock < position.minimumStock && position.sales >= minDestinationSales;
}

/**
 * Half the origin's surplus, capped by the destination's deficit, at least one
 * unit when both sides have a gap. Each destination is computed on its own, so
 * several destinations may together exceed one origin's surplus.
 */
export function suggestTransfer(origin: StorePosition, destination: StorePosition): number {
  const excess = Math.max(origin.stock - origin.minimumStock, 0);
  const deficit = Math.max(destination.minimumStock - destination.stock, 0);
  if (excess === 0 || deficit === 0) {
    return 0;
  }

  return Math.max(1, Math.min(Math.floor(excess / 2), deficit));
}

export function matchKey(position: StorePosition): string {
  return `${position.region}|${position.itemCode}|${normalizeLabel(position.brand)}`;
}

/**
 * Pairs origins with destinations sharing region, item and brand.
 * With `originStoreKey`, origins are that store only and destinations are
 * limited to its region; an origin store without surplus yields nothing.
 */
export function matchRedistribution(
  positions: readonly StorePosition[],
  options: { minDestinationSales: number; originStoreKey?: string | null },
): RedistributionSuggestion[] {
  let origins = positions.filter(isOrigin);
  let destinations = positions.filter((position) =>
    isDestination(position, options.minDestinationSales),
  );

  if (options.originStoreKey) {
    const originKey = options.originStoreKey;
    origins = origins.filter((position) => position.storeKey === originKey);
    if (origins.length === 0) {
      return [];
    }
    const region = origins[0].region;
    destinations = destinations.filter((position) => position.region === region);
  }

  const destinationsByKey = new Map<string, StorePosition[]>();
  for (const destination of destinations) {
    const key = matchKey(destination);
    const group = destinationsByKey.get(key);
    if (group) {
      group.push(destination);
    } else {
      destinationsByKey.set(key, [destination]);
    }
  }

  const suggestions: RedistributionSuggestion[] = [];
  for (const origin of origins) {
    for (const destination of destinationsByKey.get(matchKey(origin)) ?? []) {
      if (destination.storeKey === origin.storeKey) {
        continue;
      }

      const suggestedQuantity = suggestTransfer(origin, destination);
      if (suggestedQuantity === 0) {
        continue;
      }

      suggestions.push({
        region: origin.region,
        itemCode: origin.itemCode,
        brand: origin.brand,
        originStore: origin.storeName,
        destinationStore: destination.storeName,
        originStock: origin.stock,
        destinationStock: destination.stock,
        suggestedQuantity,
      });
    }
  }

  return suggestions.sort(compareSuggestions);
}

export function compareSuggestions(
  left: RedistributionSuggestion,
  right: RedistributionSuggestion,
): number {
  return (
    compareText(left.region, right.region) ||
    compareText(left.brand, right.brand) ||
    compareText(left.itemCode, right.itemCode) ||
    compareText(left.originStore, right.originStore) ||
    compareText(left.destinationStore, right.destinationStore)
  );
}
