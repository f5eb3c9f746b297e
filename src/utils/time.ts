type ZonedParts = {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
  // 0 = Monday ... 6 = Sunday
  weekday: number;
};

const WEEKDAYS = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'];

const formatters = new Map<string, Intl.DateTimeFormat>();

function resolveFormatter(timezone: string): Intl.DateTimeFormat {
  const cached = formatters.get(timezone);
  if (cached) {
    return cached;
  }

  let formatter: Intl.DateTimeFormat;
  try {
    formatter = createFormatter(timezone);
  } catch (error) {
    if (!(error instanceof RangeError)) {
      throw error;
    }
    formatter = createFormatter('UTC');
  }
  formatters.set(timezone, formatter);
  return formatter;
}

function createFormatter(timeZone: string) {
  return new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    weekday: 'short',
    hourCycle: 'h23'
  });
}

export function isValidTimezone(timezone: string): boolean {
  try {
    createFormatter(timezone);
    return true;
  } catch {
    return false;
  }
}

export function getZonedParts(timezone: string, date: Date = new Date()): ZonedParts {
  const parts: Record<string, string> = {};
  for (const part of resolveFormatter(timezone).formatToParts(date)) {
    parts[part.type] = part.value;
  }

  return {
    year: parts.year ?? '0000',
    month: parts.month ?? '01',
    day: parts.day ?? '01',
    hour: parts.hour ?? '00',
    minute: parts.minute ?? '00',
    second: parts.second ?? '00',
    weekday: Math.max(0, WEEKDAYS.indexOf(parts.weekday ?? 'Mon'))
  };
}

export function formatTimestamp(timezone: string, date: Date = new Date()): string {
  const p = getZonedParts(timezone, date);
  return `${p.year}-${p.month}-${p.day} ${p.hour}:${p.minute}:${p.second}`;
}

export function formatFileTimestamp(timezone: string, date: Date = new Date()): string {
  const p = getZonedParts(timezone, date);
  return `${p.year}${p.month}${p.day}_${p.hour}${p.minute}${p.second}`;
}
