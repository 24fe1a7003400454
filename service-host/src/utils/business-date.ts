/**
 * Business Date Utility Functions
 *
 * The business date is the operating day a timestamp belongs to. With a
 * 04:00 rollover, a payment taken at 02:00 on Tuesday belongs to Monday.
 * Order and payment numbers, and the daily reports, are keyed by it.
 */

export interface BusinessDateSettings {
  timezone: string;
  /** HH:MM, local to `timezone` */
  rolloverTime: string;
}

export const DEFAULT_BUSINESS_DATE_SETTINGS: BusinessDateSettings = {
  timezone: 'UTC',
  rolloverTime: '00:00',
};

const BUSINESS_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const ROLLOVER_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function isValidBusinessDateFormat(dateStr: string | null | undefined): boolean {
  if (!dateStr || !BUSINESS_DATE_PATTERN.test(dateStr)) return false;
  const parsed = new Date(`${dateStr}T00:00:00Z`);
  return !isNaN(parsed.getTime()) && parsed.toISOString().startsWith(dateStr);
}

export function isValidRolloverTime(value: string): boolean {
  return ROLLOVER_PATTERN.test(value);
}

export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

function localParts(date: Date, timezone: string): { year: number; month: number; day: number; hour: number; minute: number } {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);

  const pick = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find(p => p.type === type);
    return part ? Number(part.value) : 0;
  };

  return {
    year: pick('year'),
    month: pick('month'),
    day: pick('day'),
    hour: pick('hour'),
    minute: pick('minute'),
  };
}

/**
 * Resolves the YYYY-MM-DD business date of a timestamp.
 *
 * Before the rollover time the business date is the previous calendar day;
 * at or after it, the current one.
 */
export function resolveBusinessDate(
  timestamp: Date | string,
  settings: BusinessDateSettings = DEFAULT_BUSINESS_DATE_SETTINGS
): string {
  const date = typeof timestamp === 'string' ? new Date(timestamp) : timestamp;
  const [rolloverHour, rolloverMinute] = settings.rolloverTime.split(':').map(Number);
  const local = localParts(date, settings.timezone);

  const currentMinutes = local.hour * 60 + local.minute;
  const rolloverMinutes = rolloverHour * 60 + rolloverMinute;

  // calendar arithmetic in UTC so the host's own zone never leaks in
  const businessDate = new Date(Date.UTC(local.year, local.month - 1, local.day));
  if (currentMinutes < rolloverMinutes) {
    businessDate.setUTCDate(businessDate.getUTCDate() - 1);
  }

  return businessDate.toISOString().slice(0, 10);
}

/** `2024-03-15` → `20240315`, the form used inside order and payment numbers. */
export function toDayKey(businessDate: string): string {
  return businessDate.replace(/-/g, '');
}

/** `ORD`, `2024-03-15`, 7 → `ORD-20240315-0007` */
export function formatDailyNumber(prefix: string, businessDate: string, sequence: number): string {
  return `${prefix}-${toDayKey(businessDate)}-${String(sequence).padStart(4, '0')}`;
}
