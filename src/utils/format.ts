/**
 * Formatting helpers for logs and results screens.
 *
 * - formatRunTime: M:SS.mmm from a tick count
 * - formatDistance: whole metres below 1 km, kilometres with two decimals above
 */

import { DT } from '../engine/constants';

const TICKS_PER_SECOND = Math.round(1 / DT);

/** Format ticks into M:SS.mmm string. Returns '--:--.---' if ticks <= 0. */
export function formatRunTime(ticks: number): string {
  if (ticks <= 0) return '--:--.---';
  const totalMs = Math.floor((ticks * 1000) / TICKS_PER_SECOND);
  const ms  = totalMs % 1000;
  const sec = Math.floor(totalMs / 1000) % 60;
  const min = Math.floor(totalMs / 60000);
  return `${min}:${String(sec).padStart(2, '0')}.${String(ms).padStart(3, '0')}`;
}

/** e.g. "0 m", "742 m", "1.25 km" */
export function formatDistance(metres: number): string {
  const m = Math.max(0, metres);
  if (m < 1000) return `${Math.floor(m)} m`;
  return `${(m / 1000).toFixed(2)} km`;
}
