import fs from 'node:fs';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadPatrolPoints, parsePoint } from '../src/patrol/points.js';
import { createTempDir } from './helpers/config.js';

describe('PatrolPoints', () => {
  it('treats a missing points file as an empty patrol', () => {
    expect(loadPatrolPoints(path.join(createTempDir(), 'points.json'))).toEqual([]);
  });

  it('fills defaults and coerces numeric strings', () => {
    const file = path.join(createTempDir(), 'points.json');
    fs.writeFileSync(
      file,
      JSON.stringify([
        { id: 7, name: 'Gate', x: '1.5', y: 2, prompt: 'Is the gate shut?' },
        { x: 3, y: 4, theta: 1.57, enabled: false, prompt: '   ' }
      ])
    );

    expect(loadPatrolPoints(file)).toEqual([
      { id: '7', name: 'Gate', x: 1.5, y: 2, theta: 0, enabled: true, prompt: 'Is the gate shut?' },
      { name: 'Unknown', x: 3, y: 4, theta: 1.57, enabled: false }
    ]);
  });

  it('rejects points without usable coordinates', () => {
    expect(() => parsePoint({ name: 'Gate', x: 'left', y: 0 }, 0)).toThrow('Patrol point 0 has an invalid x');
    expect(() => parsePoint({ name: 'Gate', x: 0 }, 2)).toThrow('Patrol point 2 has an invalid y');
    expect(() => parsePoint('Gate', 1)).toThrow('Patrol point 1 must be an object');
  });

  it('requires the file to hold an array', () => {
    const file = path.join(createTempDir(), 'points.json');
    fs.writeFileSync(file, JSON.stringify({ name: 'Gate' }));
    expect(() => loadPatrolPoints(file)).toThrow(`Patrol points file ${file} must contain an array`);
  });
});
