const MS_PER_DAY = 24 * 60 * 60 * 1000;
/** 1899-12-30, the day before serial 1 once the 1900 leap-year bug is accounted for */
const EXCEL_EPOCH_1900 = Date.UTC(1899, 11, 30);
const EXCEL_EPOCH_1904 = Date.UTC(1904, 0, 1);

/** Built-in number format ids Excel treats as dates or times */
const BUILTIN_DATE_FORMAT_IDS = new Set([14, 15, 16, 17, 18, 19, 20, 21, 22, 45, 46, 47]);

/**
 * Whether an Excel number format renders its value as a date or time.
 * Quoted literals, escapes, colour/condition brackets and elapsed-time
 * markers are stripped before looking for date tokens.
 */
export function isDateNumberFormat(format: string | number | undefined): boolean {
  if (format === undefined) return false;
  if (typeof format === 'number') return BUILTIN_DATE_FORMAT_IDS.has(format);

  const stripped = format
    .replace(/"[^"]*"/g, '')
    .replace(/\\./g, '')
    .replace(/\[(?!h\]|m\]|s\]|hh\]|mm\]|ss\])[^\]]*\]/gi, '')
    .replace(/_.|\*./g, '');

  if (stripped.trim() === '' || /^general$/i.test(stripped.trim())) return false;
  return /[dmyhs]/i.test(stripped) && !/[#0?]/.test(stripped.replace(/[.,]0+/g, ''));
}

/** Convert an Excel serial day number to a Date holding the wall-clock time in UTC fields */
export function excelSerialToDate(serial: number, date1904 = false): Date {
  const epoch = date1904 ? EXCEL_EPOCH_1904 : EXCEL_EPOCH_1900;
  return new Date(epoch + Math.round(serial * MS_PER_DAY));
}

/** Convert a Date (wall-clock time in UTC fields) to an Excel serial day number */
export function dateToExcelSerial(date: Date, date1904 = false): number {
  const epoch = date1904 ? EXCEL_EPOCH_1904 : EXCEL_EPOCH_1900;
  return (date.getTime() - epoch) / MS_PER_DAY;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Render a date cell: `yyyy-MM-dd` at exactly midnight, otherwise
 * `yyyy-MM-dd HH:mm:ss`. Reads UTC fields, which is how spreadsheet
 * readers hand back zone-less wall-clock values.
 */
export function formatDateValue(date: Date): string {
  if (Number.isNaN(date.getTime())) return '';

  const day = `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  const h = date.getUTCHours();
  const m = date.getUTCMinutes();
  const s = date.getUTCSeconds();
  if (h === 0 && m === 0 && s === 0) return day;
  return `${day} ${pad(h)}:${pad(m)}:${pad(s)}`;
}
