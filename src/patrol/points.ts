import type { PatrolPoint } from '../types.js';
import { readJsonFile } from '../utils/files.js';

function toNumber(value: unknown, field: string, index: number): number {
  const numeric = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof numeric !== 'number' || !Number.isFinite(numeric)) {
    throw new Error(`Patrol point ${index} has an invalid ${field}`);
  }
  return numeric;
}

export function parsePoint(raw: unknown, index: number): PatrolPoint {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Patrol point ${index} must be an object`);
  }
  const name = Reflect.get(raw, 'name');
  const id = Reflect.get(raw, 'id');
  const prompt = Reflect.get(raw, 'prompt');
  const theta = Reflect.get(raw, 'theta');
  const enabled = Reflect.get(raw, 'enabled');

  const point: PatrolPoint = {
    name: typeof name === 'string' && name.trim() ? name : 'Unknown',
    x: toNumber(Reflect.get(raw, 'x'), 'x', index),
    y: toNumber(Reflect.get(raw, 'y'), 'y', index),
    theta: theta === undefined || theta === null ? 0 : toNumber(theta, 'theta', index),
    enabled: typeof enabled === 'boolean' ? enabled : true
  };
  if (typeof id === 'string' || typeof id === 'number') {
    point.id = String(id);
  }
  if (typeof prompt === 'string' && prompt.trim()) {
    point.prompt = prompt;
  }
  return point;
}

export function loadPatrolPoints(filePath: string): PatrolPoint[] {
  const raw = readJsonFile(filePath);
  if (raw === undefined) {
    return [];
  }
  if (!Array.isArray(raw)) {
    throw new Error(`Patrol points file ${filePath} must contain an array`);
  }
  return raw.map((entry, index) => parsePoint(entry, index));
}
