export interface RangeCheck {
  valid: boolean;
  error?: string;
}

export function validateNumericRange(value: number, min: number, max: number, name: string): RangeCheck {
  if (isNaN(value)) {
    return { valid: false, error: `${name} must be a valid number` };
  }

  if (value < min) {
    return { valid: false, error: `${name} must be at least ${min}` };
  }

  if (value > max) {
    return { valid: false, error: `${name} must not exceed ${max}` };
  }

  return { valid: true };
}

export function validateInteger(value: number, name: string): RangeCheck {
  if (!Number.isInteger(value)) {
    return { valid: false, error: `${name} must be a whole number` };
  }
  return { valid: true };
}

/** Empty or missing values fall back; anything unparsable comes back as NaN. */
export function parseNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  return Number(raw.trim());
}

export function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  return ['true', '1', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

export function isValidChatId(value: string): boolean {
  return /^-?\d+$/.test(value.trim()) || /^@[A-Za-z0-9_]{5,}$/.test(value.trim());
}

/**
 * A cron step only ticks evenly when it divides its field: seconds below a
 * minute must divide 60, longer intervals must be whole minutes dividing 60.
 */
export function validateCronCadence(seconds: number, name: string): RangeCheck {
  const even = seconds < 60
    ? Number.isInteger(seconds) && seconds > 0 && 60 % seconds === 0
    : seconds % 60 === 0 && 60 % (seconds / 60) === 0;
  if (!even) {
    return { valid: false, error: `${name} must divide a minute or an hour evenly` };
  }
  return { valid: true };
}
