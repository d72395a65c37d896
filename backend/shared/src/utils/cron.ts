import { ValidationError } from './validators';

interface FieldSpec {
  name: string;
  min: number;
  max: number;
}

const FIELDS: FieldSpec[] = [
  { name: 'minute', min: 0, max: 59 },
  { name: 'hour', min: 0, max: 23 },
  { name: 'day of month', min: 1, max: 31 },
  { name: 'month', min: 1, max: 12 },
  { name: 'day of week', min: 0, max: 7 },
];

const DAY_NAMES = ['SUN', 'MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT', 'SUN'];

const PART_PATTERN = /^(\*|\d+(-\d+)?)(\/\d+)?$/;

function validatePart(part: string, field: FieldSpec, expression: string): void {
  const match = PART_PATTERN.exec(part);
  if (!match) {
    throw new ValidationError(`Invalid ${field.name} field in cron expression "${expression}"`, 'cron', expression);
  }

  const step = match[3] ? Number(match[3].slice(1)) : undefined;
  if (step !== undefined && step < 1) {
    throw new ValidationError(`Step must be at least 1 in "${expression}"`, 'cron', expression);
  }

  if (match[1] === '*') {
    return;
  }

  const [start, end = start] = match[1].split('-').map(Number);
  if (start < field.min || end > field.max || start > end) {
    throw new ValidationError(
      `${field.name} must be between ${field.min} and ${field.max} in "${expression}"`,
      'cron',
      expression
    );
  }
}

/**
 * Check a standard five-field cron expression (minute hour day month weekday).
 * Supports `*`, single values, ranges, lists and steps.
 */
export function validateCronExpression(expression: string): string[] {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== FIELDS.length) {
    throw new ValidationError(
      `Cron expression must have ${FIELDS.length} fields: "${expression}"`,
      'cron',
      expression
    );
  }

  fields.forEach((field, index) => {
    for (const part of field.split(',')) {
      validatePart(part, FIELDS[index], expression);
    }
  });

  return fields;
}

function toEventBridgeStep(field: string, start: number): string {
  return field.replace(/^\*\//, `${start}/`);
}

function toEventBridgeWeekday(field: string, expression: string): string {
  if (field.includes('/')) {
    throw new ValidationError(`Weekday steps are not supported: "${expression}"`, 'cron', expression);
  }

  return field
    .split(',')
    .map((part) => part.split('-').map((day) => DAY_NAMES[Number(day)]).join('-'))
    .join(',');
}

/**
 * Convert a five-field cron expression into an EventBridge schedule
 * expression. EventBridge takes a sixth year field and needs `?` in either
 * the day-of-month or the day-of-week position.
 *
 * @example toEventBridgeSchedule('0 6 * * 1') // 'cron(0 6 ? * MON *)'
 */
export function toEventBridgeSchedule(expression: string): string {
  const [minute, hour, dayOfMonth, month, dayOfWeek] = validateCronExpression(expression);

  let eventBridgeDayOfMonth: string;
  let eventBridgeDayOfWeek: string;

  if (dayOfWeek === '*') {
    eventBridgeDayOfMonth = toEventBridgeStep(dayOfMonth, 1);
    eventBridgeDayOfWeek = '?';
  } else if (dayOfMonth === '*') {
    eventBridgeDayOfMonth = '?';
    eventBridgeDayOfWeek = toEventBridgeWeekday(dayOfWeek, expression);
  } else {
    throw new ValidationError(
      `EventBridge cannot restrict both day of month and day of week: "${expression}"`,
      'cron',
      expression
    );
  }

  return `cron(${[
    toEventBridgeStep(minute, 0),
    toEventBridgeStep(hour, 0),
    eventBridgeDayOfMonth,
    toEventBridgeStep(month, 1),
    eventBridgeDayOfWeek,
    '*',
  ].join(' ')})`;
}
