const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];
const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December'
];

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const pad = (value: number): string => String(value).padStart(2, '0');

/** `[Current date and time: 2024-01-15 14:30:00 UTC (Monday, January 15, 2024)]` */
export function formatTemporalContext(now: Date): string {
  const date = `${now.getUTCFullYear()}-${pad(now.getUTCMonth() + 1)}-${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}:${pad(now.getUTCMinutes())}:${pad(now.getUTCSeconds())}`;
  const long = `${WEEKDAYS[now.getUTCDay()]}, ${MONTHS[now.getUTCMonth()]} ${pad(now.getUTCDate())}, ${now.getUTCFullYear()}`;
  return `[Current date and time: ${date} ${time} UTC (${long})]`;
}

export function withTemporalContext(query: string, clock: Clock = systemClock): string {
  return `${formatTemporalContext(clock())}\n\n${query}`;
}
