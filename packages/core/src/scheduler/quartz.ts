/**
 * Quartz Cron Expressions
 *
 * Job schedules use the Quartz dialect: six fields, seconds first, with an
 * optional seventh year field.
 *
 *   seconds minutes hours day-of-month month day-of-week [year]
 *
 * Exactly one of day-of-month / day-of-week must be `?`.
 *
 * @module @jobgraph/core/scheduler/quartz
 */

// =============================================================================
// Cron Parts
// =============================================================================

export interface QuartzCronParts {
  seconds: string;
  minutes: string;
  hours: string;
  dayOfMonth: string;
  month: string;
  dayOfWeek: string;
  year?: string;
}

interface FieldSpec {
  min: number;
  max: number;
  names?: readonly string[];
}

const MONTH_NAMES = ['JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN', 'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC'] as const;
const DAY_NAMES = ['SUN', 'MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT'] as const;

const SECONDS: FieldSpec = { min: 0, max: 59 };
const MINUTES: FieldSpec = { min: 0, max: 59 };
const HOURS: FieldSpec = { min: 0, max: 23 };
const DAY_OF_MONTH: FieldSpec = { min: 1, max: 31 };
const MONTH: FieldSpec = { min: 1, max: 12, names: MONTH_NAMES };
const DAY_OF_WEEK: FieldSpec = { min: 1, max: 7, names: DAY_NAMES };
const YEAR: FieldSpec = { min: 1970, max: 2099 };

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a Quartz cron expression into its parts.
 * Returns null if the field count is wrong or any field is out of range.
 */
export function parseQuartzCron(expression: string): QuartzCronParts | null {
  const parts = expression.trim().split(/\s+/);
  if (parts.length !== 6 && parts.length !== 7) {
    return null;
  }

  const [seconds, minutes, hours, dayOfMonth, month, dayOfWeek, year] = parts;

  if (
    !isValidField(seconds, SECONDS) ||
    !isValidField(minutes, MINUTES) ||
    !isValidField(hours, HOURS) ||
    !isValidDayOfMonth(dayOfMonth) ||
    !isValidField(month, MONTH) ||
    !isValidDayOfWeek(dayOfWeek) ||
    (year !== undefined && !isValidField(year, YEAR))
  ) {
    return null;
  }

  // Exactly one of the two day fields is left unspecified
  if ((dayOfMonth === '?') === (dayOfWeek === '?')) {
    return null;
  }

  return {
    seconds,
    minutes,
    hours,
    dayOfMonth,
    month,
    dayOfWeek,
    ...(year !== undefined ? { year } : {}),
  };
}

/**
 * Check whether an expression is a valid Quartz cron expression
 */
export function isValidQuartzCron(expression: string): boolean {
  return parseQuartzCron(expression) !== null;
}

// =============================================================================
// Field Validation
// =============================================================================

function isValidField(field: string, spec: FieldSpec): boolean {
  if (field === '*') return true;
  return field.split(',').every(part => isValidListItem(part, spec));
}

function isValidListItem(item: string, spec: FieldSpec): boolean {
  // Steps (e.g., "*/5", "0/15", "10-40/10")
  if (item.includes('/')) {
    const [range, step, ...rest] = item.split('/');
    if (rest.length > 0 || !isInteger(step) || Number(step) < 1) return false;
    if (range === '*') return true;
    return range.includes('-') ? isValidRange(range, spec) : isValidValue(range, spec);
  }

  // Ranges (e.g., "1-5", "MON-FRI")
  if (item.includes('-')) {
    return isValidRange(item, spec);
  }

  return isValidValue(item, spec);
}

function isValidRange(range: string, spec: FieldSpec): boolean {
  const bounds = range.split('-');
  if (bounds.length !== 2) return false;
  return isValidValue(bounds[0], spec) && isValidValue(bounds[1], spec);
}

function isValidValue(value: string, spec: FieldSpec): boolean {
  if (spec.names?.includes(value.toUpperCase())) return true;
  if (!isInteger(value)) return false;
  const n = Number(value);
  return n >= spec.min && n <= spec.max;
}

function isValidDayOfMonth(field: string): boolean {
  if (field === '?' || field === 'L' || field === 'LW') return true;

  // Offset from last day (e.g., "L-3")
  const lastOffset = /^L-(\d{1,2})$/.exec(field);
  if (lastOffset) return Number(lastOffset[1]) <= 30;

  // Nearest weekday (e.g., "15W")
  const weekday = /^(\d{1,2})W$/.exec(field);
  if (weekday) return isValidValue(weekday[1], DAY_OF_MONTH);

  return isValidField(field, DAY_OF_MONTH);
}

function isValidDayOfWeek(field: string): boolean {
  if (field === '?' || field === 'L') return true;

  // Last given weekday of the month (e.g., "6L", "FRIL")
  const last = /^([A-Za-z]{3}|\d)L$/.exec(field);
  if (last) return isValidValue(last[1], DAY_OF_WEEK);

  // Nth weekday of the month (e.g., "6#3")
  const nth = /^([A-Za-z]{3}|\d)#([1-5])$/.exec(field);
  if (nth) return isValidValue(nth[1], DAY_OF_WEEK);

  return isValidField(field, DAY_OF_WEEK);
}

function isInteger(value: string | undefined): value is string {
  return value !== undefined && /^\d+$/.test(value);
}
