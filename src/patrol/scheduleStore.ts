import { randomUUID } from 'node:crypto';
import loggerModule, { type Logger } from '../logger.js';
import type { ScheduleEntry } from '../types.js';
import { readJsonFile, writeJsonAtomic } from '../utils/files.js';

export const ALL_DAYS = [0, 1, 2, 3, 4, 5, 6];

const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

export type SchedulePatch = {
  time?: string;
  days?: number[];
  enabled?: boolean;
};

function assertTime(time: string) {
  if (!TIME_PATTERN.test(time)) {
    throw new Error(`Invalid schedule time "${time}", expected HH:MM`);
  }
}

// An empty day list means every day.
function normalizeDays(days: number[] | undefined): number[] {
  if (!days || days.length === 0) {
    return [...ALL_DAYS];
  }
  for (const day of days) {
    if (!Number.isInteger(day) || day < 0 || day > 6) {
      throw new Error(`Invalid schedule day ${day}, expected 0-6`);
    }
  }
  return [...new Set(days)].sort((a, b) => a - b);
}

function readEntry(value: unknown): ScheduleEntry | null {
  if (typeof value !== 'object' || value === null) {
    return null;
  }
  const id = Reflect.get(value, 'id');
  const time = Reflect.get(value, 'time');
  const days = Reflect.get(value, 'days');
  const enabled = Reflect.get(value, 'enabled');
  if (typeof id !== 'string' || typeof time !== 'string' || !TIME_PATTERN.test(time)) {
    return null;
  }
  const dayList = Array.isArray(days)
    ? days.filter((day): day is number => Number.isInteger(day) && day >= 0 && day <= 6)
    : [];
  return {
    id,
    time,
    days: dayList.length > 0 ? dayList : [...ALL_DAYS],
    enabled: typeof enabled === 'boolean' ? enabled : true
  };
}

export class ScheduleStore {
  private entries: ScheduleEntry[] = [];

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = loggerModule
  ) {
    this.reload();
  }

  list(): ScheduleEntry[] {
    return this.entries.map(entry => ({ ...entry, days: [...entry.days] }));
  }

  add(time: string, days?: number[], enabled = true): ScheduleEntry {
    assertTime(time);
    const entry: ScheduleEntry = {
      id: randomUUID().slice(0, 8),
      time,
      days: normalizeDays(days),
      enabled
    };
    this.entries.push(entry);
    this.save();
    this.logger.info({ id: entry.id, time }, 'Added scheduled patrol');
    return { ...entry, days: [...entry.days] };
  }

  update(id: string, patch: SchedulePatch): boolean {
    const entry = this.entries.find(candidate => candidate.id === id);
    if (!entry) {
      return false;
    }
    if (patch.time !== undefined) {
      assertTime(patch.time);
    }
    const days = patch.days !== undefined ? normalizeDays(patch.days) : entry.days;
    entry.time = patch.time ?? entry.time;
    entry.days = days;
    entry.enabled = patch.enabled ?? entry.enabled;
    this.save();
    this.logger.info({ id }, 'Updated scheduled patrol');
    return true;
  }

  remove(id: string): boolean {
    const next = this.entries.filter(entry => entry.id !== id);
    if (next.length === this.entries.length) {
      return false;
    }
    this.entries = next;
    this.save();
    this.logger.info({ id }, 'Removed scheduled patrol');
    return true;
  }

  reload() {
    let raw: unknown;
    try {
      raw = readJsonFile(this.filePath);
    } catch (error) {
      this.logger.error({ err: error, file: this.filePath }, 'Failed to load schedule, keeping previous entries');
      return;
    }
    if (raw === undefined) {
      this.entries = [];
      return;
    }
    if (!Array.isArray(raw)) {
      this.logger.error({ file: this.filePath }, 'Schedule file must contain an array');
      return;
    }
    const entries: ScheduleEntry[] = [];
    for (const value of raw) {
      const entry = readEntry(value);
      if (entry) {
        entries.push(entry);
      } else {
        this.logger.warn({ entry: value }, 'Skipping invalid schedule entry');
      }
    }
    this.entries = entries;
    this.logger.info({ count: entries.length }, 'Loaded scheduled patrols');
  }

  private save() {
    writeJsonAtomic(this.filePath, this.entries);
  }
}
