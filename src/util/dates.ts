// src/util/dates.ts

const DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad2(n: number): string {
   return String(n).padStart(2, '0');
}

/**
 * Parse "YYYY-MM-DD" as midnight UTC.
 */
export function parseIsoDate(value: string): Date {
   const match = ISO_DATE.exec(value);
   if (!match) {
      throw new Error(`Invalid date "${value}", expected YYYY-MM-DD`);
   }
   const [, y, m, d] = match;
   const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
   if (date.getUTCMonth() !== Number(m) - 1 || date.getUTCDate() !== Number(d)) {
      throw new Error(`Invalid date "${value}"`);
   }
   return date;
}

function toDate(value: Date | string): Date {
   return typeof value === 'string' ? parseIsoDate(value) : value;
}

/**
 * "Fri, 01 Mar 2024 00:00:00 +0000", always in UTC.
 */
export function rfc2822(value: Date | string): string {
   const date = toDate(value);
   return (
      `${DAYS[date.getUTCDay()]}, ${pad2(date.getUTCDate())} ${MONTHS[date.getUTCMonth()]} ` +
      `${date.getUTCFullYear()} ${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:` +
      `${pad2(date.getUTCSeconds())} +0000`
   );
}

function ordinalSuffix(day: number): string {
   if (day === 1 || day === 21 || day === 31) return 'st';
   if (day === 2 || day === 22) return 'nd';
   if (day === 3 || day === 23) return 'rd';
   return 'th';
}

/**
 * "Mar 1st, 2024".
 */
export function prettyDate(value: Date | string): string {
   const date = toDate(value);
   const day = date.getUTCDate();
   return `${MONTHS[date.getUTCMonth()]} ${day}${ordinalSuffix(day)}, ${date.getUTCFullYear()}`;
}

/**
 * Compact numeric form used for reverse-date weights: 2024-03-01 → 20240301.
 */
export function dateNumber(value: Date | string): number {
   const date = toDate(value);
   return (
      date.getUTCFullYear() * 10000 + (date.getUTCMonth() + 1) * 100 + date.getUTCDate()
   );
}
