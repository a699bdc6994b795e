const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'} ago`;
}

export function describeLastActivity(
  lastActivity: Date | null,
  now: Date = new Date()
): string {
  if (lastActivity === null) {
    return 'Never';
  }
  const elapsed = now.getTime() - lastActivity.getTime();
  if (elapsed < HOUR_MS) {
    return 'Within last hour';
  }
  const days = Math.floor(elapsed / DAY_MS);
  if (days === 0) {
    return 'Today';
  }
  if (days === 1) {
    return 'Yesterday';
  }
  if (days < 7) {
    return plural(days, 'day');
  }
  const weeks = Math.floor(days / 7);
  if (weeks < 4) {
    return plural(weeks, 'week');
  }
  // Days 28 and 29 fall between the week and month buckets.
  const months = Math.max(1, Math.floor(days / 30));
  if (months < 12) {
    return plural(months, 'month');
  }
  return plural(Math.max(1, Math.floor(days / 365)), 'year');
}
