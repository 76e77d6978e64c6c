import fs from 'fs';
import path from 'path';

const FIXTURE_DIR = path.join(__dirname, '..', 'fixtures');

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(FIXTURE_DIR, name), 'utf8');
}

export function readJsonFixture(name: string): unknown {
  const parsed: unknown = JSON.parse(readFixture(name));
  return parsed;
}
