/**
 * Player profile persisted as a JSON file.
 *
 * Loading is lenient: fields that fail validation fall back to their fresh
 * value and a file that is not JSON at all gives a fresh profile with a
 * warning. Writing errors propagate to the caller.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { UPGRADE_KINDS } from '../engine/config';
import { findShopItem, maxLevel } from './shop';
import { isAchievementId, type AchievementId } from './achievements';
import { createProfile, PROFILE_VERSION, type PlayerProfile } from './ProgressionLedger';

export const DEFAULT_SAVE_FILE = 'hill-drive-save.json';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonNegative(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : fallback;
}

/**
 * Build a profile from parsed JSON, keeping every valid field.
 * Unknown keys are dropped; out-of-range levels are clamped to the shop's max.
 */
export function parseProfile(raw: unknown): PlayerProfile {
  const profile = createProfile();
  if (!isRecord(raw)) return profile;

  profile.coins = Math.floor(nonNegative(raw.coins, 0));
  profile.totalDistance = nonNegative(raw.totalDistance, 0);
  profile.runs = Math.floor(nonNegative(raw.runs, 0));

  if (isRecord(raw.upgradeLevels)) {
    for (const kind of UPGRADE_KINDS) {
      const level = Math.floor(nonNegative(raw.upgradeLevels[kind], 0));
      profile.upgradeLevels[kind] = Math.min(level, maxLevel(findShopItem(kind)));
    }
  }

  if (Array.isArray(raw.achievements)) {
    const ids: AchievementId[] = [];
    for (const id of raw.achievements) {
      if (isAchievementId(id) && !ids.includes(id)) ids.push(id);
    }
    profile.achievements = ids;
  }

  if (isRecord(raw.bestDistances)) {
    for (const [levelId, distance] of Object.entries(raw.bestDistances)) {
      if (typeof distance === 'number' && Number.isFinite(distance) && distance > 0) {
        profile.bestDistances[levelId] = distance;
      }
    }
  }

  return profile;
}

export class SaveStore {
  constructor(readonly filePath: string = DEFAULT_SAVE_FILE) {}

  /** Read the profile. A missing file is a new player. */
  load(): PlayerProfile {
    if (!existsSync(this.filePath)) {
      return createProfile();
    }

    const text = readFileSync(this.filePath, 'utf8');
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[save] ${this.filePath} is not valid JSON (${message}), starting a fresh profile`);
      return createProfile();
    }

    if (!isRecord(raw) || raw.version !== PROFILE_VERSION) {
      console.warn(`[save] ${this.filePath} has no version ${PROFILE_VERSION} profile, recovering what is readable`);
    }
    return parseProfile(raw);
  }

  save(profile: PlayerProfile): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, JSON.stringify(profile, null, 2) + '\n', 'utf8');
  }
}
