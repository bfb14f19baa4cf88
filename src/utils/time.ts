export interface ZonedClock {
  /** YYYY-MM-DD */
  date: string;
  /** HH:MM, 24h */
  time: string;
}

/** Wall-clock date and time of `at` in an IANA timezone. */
export function zonedClock(at: Date, timeZone: string): ZonedClock {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(at);

  const get = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find(p => p.type === type)?.value ?? '00';

  return {
    date: `${get('year')}-${get('month')}-${get('day')}`,
    time: `${get('hour')}:${get('minute')}`,
  };
}

/** "18:30" → cron expression firing daily at 18:30. */
export function dailyCronExpression(hhmm: string): string {
  const [hour = '0', minute = '0'] = hhmm.split(':');
  return `${Number(minute)} ${Number(hour)} * * *`;
}

/** Shortest distance between two HH:MM times of day, across midnight too. */
export function minutesApart(a: string, b: string): number {
  const toMinutes = (hhmm: string) => {
    const [hour = '0', minute = '0'] = hhmm.split(':');
    return Number(hour) * 60 + Number(minute);
  };
  const diff = Math.abs(toMinutes(a) - toMinutes(b));
  return Math.min(diff, 24 * 60 - diff);
}
