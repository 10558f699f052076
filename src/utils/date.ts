const SHEET_DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

/**
 * Parse a `DD/MM/YYYY` cell into a UTC-midnight Date.
 * Returns null for anything else, including impossible days like 31/02/2024.
 */
export function parseSheetDate(value: string): Date | null {
  const match = SHEET_DATE_PATTERN.exec(value.trim());
  if (!match) return null;

  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

export function formatSheetDate(date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  return `${day}/${month}/${date.getUTCFullYear()}`;
}

export function monthKey(date: Date): string {
  return `${date.getUTCFullYear()}-${String(date.getUTCMonth() + 1).padStart(2, '0')}`;
}

/** Calendar day of a local timestamp, as a UTC-midnight Date. */
export function toCalendarDate(moment: Date): Date {
  return new Date(Date.UTC(moment.getFullYear(), moment.getMonth(), moment.getDate()));
}

/** `YYYYMMDD_HHMM` in local time, used in export file names. */
export function fileTimestamp(moment: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${moment.getFullYear()}${pad(moment.getMonth() + 1)}${pad(moment.getDate())}` +
    `_${pad(moment.getHours())}${pad(moment.getMinutes())}`
  );
}

/** `DD/MM/YYYY HH:MM` in local time. */
export function formatDateTime(moment: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${pad(moment.getDate())}/${pad(moment.getMonth() + 1)}/${moment.getFullYear()} ` +
    `${pad(moment.getHours())}:${pad(moment.getMinutes())}`
  );
}
