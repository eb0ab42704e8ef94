const DAY_MS = 24 * 60 * 60 * 1000;

export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', {timeZone: timezone});
    return true;
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
}

/**
 * Calendar day of `date` in `timezone`, as YYYY-MM-DD.
 */
export function formatDay(date: Date, timezone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find(p => p.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
}

export function dayWindow(now: number, timezone: string, days: number): {from: string; to: string} {
  return {
    from: formatDay(new Date(now - days * DAY_MS), timezone),
    to: formatDay(new Date(now + days * DAY_MS), timezone),
  };
}
