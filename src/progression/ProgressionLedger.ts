/**
 * ProgressionLedger — the player's persistent progress.
 *
 * Consumes the engine's event stream and run summaries; owns the coin
 * balance, upgrade purchases, achievements and per-level bests. Reads the
 * engine only through GameEvent and RunSummary, never its internals.
 */

import type { GameEvent, UpgradeKind, UpgradeMultipliers } from '../engine/types';
import type { RunSummary } from '../engine/GameSession';
import {
  findShopItem,
  maxLevel,
  multipliersFor,
  upgradeCost,
  createUpgradeLevels,
  type UpgradeLevels,
} from './shop';
import { earnedAchievements, type AchievementId, type AchievementInfo } from './achievements';

export const PROFILE_VERSION = 1;

export interface PlayerProfile {
  version: number;
  coins: number;
  upgradeLevels: UpgradeLevels;
  achievements: AchievementId[];
  /** Best single-run distance per level id, m */
  bestDistances: Record<string, number>;
  totalDistance: number;
  runs: number;
}

/** A purchase or profile operation the player's state does not allow. */
export class ProgressionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProgressionError';
  }
}

export function createProfile(): PlayerProfile {
  return {
    version: PROFILE_VERSION,
    coins: 0,
    upgradeLevels: createUpgradeLevels(),
    achievements: [],
    bestDistances: {},
    totalDistance: 0,
    runs: 0,
  };
}

export class ProgressionLedger {
  private _profile: PlayerProfile;

  constructor(profile: PlayerProfile = createProfile()) {
    this._profile = profile;
  }

  get profile(): Readonly<PlayerProfile> { return this._profile; }

  get coins(): number { return this._profile.coins; }

  /** Credit coin pickups as they happen. Other events carry no currency. */
  applyEvents(events: readonly GameEvent[]): void {
    let earned = 0;
    for (const event of events) {
      if (event.type === 'coinCollected') earned += event.value;
    }
    if (earned > 0) {
      this._profile = { ...this._profile, coins: this._profile.coins + earned };
    }
  }

  /**
   * Fold a finished run into lifetime totals and unlock achievements.
   * Coins from the run were already credited by applyEvents.
   * @returns Achievements unlocked by this run (rewards already paid)
   */
  recordRun(run: RunSummary): AchievementInfo[] {
    const p = this._profile;
    const runs = p.runs + 1;
    const totalDistance = p.totalDistance + run.distance;

    const bestDistances = { ...p.bestDistances };
    if (run.levelId !== null) {
      const best = bestDistances[run.levelId] ?? 0;
      bestDistances[run.levelId] = Math.max(best, run.distance);
    }

    const unlocked = earnedAchievements({ run, totalDistance, runs })
      .filter((a) => !p.achievements.includes(a.id));
    const reward = unlocked.reduce((sum, a) => sum + a.reward, 0);

    this._profile = {
      ...p,
      runs,
      totalDistance,
      bestDistances,
      coins: p.coins + reward,
      achievements: [...p.achievements, ...unlocked.map((a) => a.id)],
    };
    return unlocked;
  }

  levelOf(kind: UpgradeKind): number {
    return this._profile.upgradeLevels[kind];
  }

  /** Price of the next level, or null when the upgrade is maxed. */
  priceOf(kind: UpgradeKind): number | null {
    const item = findShopItem(kind);
    const level = this.levelOf(kind);
    return level >= maxLevel(item) ? null : upgradeCost(item, level);
  }

  /**
   * Buy one level of an upgrade.
   * @returns The new level
   */
  purchase(kind: UpgradeKind): number {
    const item = findShopItem(kind);
    const level = this.levelOf(kind);
    if (level >= maxLevel(item)) {
      throw new ProgressionError(`${item.name} is already at max level ${level}`);
    }
    const cost = upgradeCost(item, level);
    if (this._profile.coins < cost) {
      throw new ProgressionError(`${item.name} costs ${cost} coins, balance is ${this._profile.coins}`);
    }

    this._profile = {
      ...this._profile,
      coins: this._profile.coins - cost,
      upgradeLevels: { ...this._profile.upgradeLevels, [kind]: level + 1 },
    };
    return level + 1;
  }

  /** Multipliers to pass to createLevelParams. */
  multipliers(): UpgradeMultipliers {
    return multipliersFor(this._profile.upgradeLevels);
  }

  bestDistance(levelId: string): number {
    return this._profile.bestDistances[levelId] ?? 0;
  }
}
