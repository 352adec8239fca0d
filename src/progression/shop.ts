/**
 * Upgrade shop catalogue and pricing.
 *
 * Each item raises one upgrade multiplier by a fixed boost per level.
 * Prices grow linearly with the level being bought; the multiplier is
 * capped at MAX_MULTIPLIER, which fixes each item's max level.
 */

import type { UpgradeKind, UpgradeMultipliers } from '../engine/types';
import { MAX_MULTIPLIER, MIN_MULTIPLIER, UPGRADE_KINDS } from '../engine/config';

export interface ShopItem {
  kind: UpgradeKind;
  name: string;
  description: string;
  /** Price of the first level, coins */
  baseCost: number;
  /** Multiplier gained per level */
  boost: number;
}

export type UpgradeLevels = Record<UpgradeKind, number>;

export const SHOP_ITEMS: readonly ShopItem[] = [
  { kind: 'acceleration',   name: 'Engine Upgrade',    description: 'Increases acceleration by 15%',  baseCost: 500, boost: 0.15 },
  { kind: 'topSpeed',       name: 'Turbo Kit',         description: 'Increases top speed by 20%',     baseCost: 800, boost: 0.20 },
  { kind: 'traction',       name: 'Racing Tires',      description: 'Improves traction by 18%',       baseCost: 400, boost: 0.18 },
  { kind: 'fuelEfficiency', name: 'Fuel Tank',         description: 'Better fuel efficiency by 22%',  baseCost: 600, boost: 0.22 },
  { kind: 'suspension',     name: 'Suspension System', description: 'Smoother ride and better stability', baseCost: 700, boost: 0.25 },
];

export function findShopItem(kind: UpgradeKind): ShopItem {
  const item = SHOP_ITEMS.find((i) => i.kind === kind);
  if (!item) {
    throw new Error(`No shop item for upgrade "${kind}"`);
  }
  return item;
}

/** Highest level whose multiplier stays within MAX_MULTIPLIER. */
export function maxLevel(item: ShopItem): number {
  // Epsilon keeps exact quotients like 2 / 0.2 from flooring to 9.
  return Math.floor((MAX_MULTIPLIER - MIN_MULTIPLIER) / item.boost + 1e-9);
}

/** Price of buying the level after `currentLevel`. */
export function upgradeCost(item: ShopItem, currentLevel: number): number {
  return item.baseCost * (currentLevel + 1);
}

export function multiplierFor(item: ShopItem, level: number): number {
  return Math.min(MAX_MULTIPLIER, MIN_MULTIPLIER + item.boost * level);
}

export function createUpgradeLevels(): UpgradeLevels {
  return { acceleration: 0, topSpeed: 0, traction: 0, fuelEfficiency: 0, suspension: 0 };
}

/** Multipliers the engine runs with for the given purchase levels. */
export function multipliersFor(levels: UpgradeLevels): UpgradeMultipliers {
  const result = { ...levels };
  for (const kind of UPGRADE_KINDS) {
    result[kind] = multiplierFor(findShopItem(kind), levels[kind]);
  }
  return result;
}
