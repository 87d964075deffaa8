import { CronTime } from 'cron';
import { ConfigurationError, toErrorMessage } from '../common/errors';

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

const PART = /^(\*|\d+|[a-z]{3})(?:-(\d+|[a-z]{3}))?(?:\/(\d+))?$/i;

function checkField(value: string, field: FieldSpec): string | null {
  for (const part of value.split(',')) {
    const match = PART.exec(part);
    if (!match) return `invalid ${field.name} "${part}"`;

    const [, from, to, step] = match;
    if (step !== undefined && Number(step) < 1) return `invalid ${field.name} step "${part}"`;
    if (from === '*' && to !== undefined) return `invalid ${field.name} range "${part}"`;

    for (const bound of [from, to]) {
      if (bound === undefined || !/^\d+$/.test(bound)) continue;
      const n = Number(bound);
      if (n < field.min || n > field.max) {
        return `${field.name} ${n} outside ${field.min}-${field.max}`;
      }
    }
  }
  return null;
}

/** Throws ConfigurationError unless `expression` is a valid five-field cron expression. */
export function assertCronExpression(expression: string): void {
  const fields = expression.trim().split(/\s+/).filter(Boolean);
  if (fields.length !== 5) {
    throw new ConfigurationError(
      `Schedule "${expression}" must have 5 fields, found ${fields.length}`,
      { schedule: expression },
    );
  }

  fields.forEach((field, index) => {
    const problem = checkField(field, FIELDS[index]);
    if (problem) {
      throw new ConfigurationError(`Schedule "${expression}": ${problem}`, {
        schedule: expression,
      });
    }
  });

  try {
    new CronTime(expression, 'UTC');
  } catch (err) {
    throw new ConfigurationError(`Schedule "${expression}": ${toErrorMessage(err)}`, {
      schedule: expression,
    });
  }
}
