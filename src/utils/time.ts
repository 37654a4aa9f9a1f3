/**
 * Time formatting helpers shared by conflict detection and the status bar.
 */

import { t } from "../i18n/index.js";

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/**
 * Formats a date as `YYYY-MM-DD HH:mm:ss` in the local time zone.
 * Sub-second precision is dropped, so two instants inside the same second
 * format identically.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Formats a Unix epoch value given in seconds.
 */
export function formatEpochSeconds(seconds: number): string {
  return formatTimestamp(new Date(seconds * 1000));
}

/**
 * Formats a date relative to now ("just now", "5 minutes ago").
 */
export function formatRelativeTime(date: Date, now: Date = new Date()): string {
  const diffSec = Math.max(0, Math.floor((now.getTime() - date.getTime()) / 1000));
  const diffMin = Math.floor(diffSec / 60);
  const diffHour = Math.floor(diffMin / 60);
  const diffDay = Math.floor(diffHour / 24);

  if (diffSec < 60) {
    return t("common:time.just_now");
  } else if (diffMin < 60) {
    return t("common:time.minutes_ago", { count: diffMin });
  } else if (diffHour < 24) {
    return t("common:time.hours_ago", { count: diffHour });
  }
  return t("common:time.days_ago", { count: diffDay });
}
