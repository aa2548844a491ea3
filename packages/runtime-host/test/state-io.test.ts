/**
 * Bastion Runtime Host — StateIO contract tests
 *
 * Both implementations must agree on:
 *   - absent state reads as undefined
 *   - writeJson/readJson round-trip through JSON
 *   - readLogRaw returns '' before the first append, 'a\nb\n' after two
 *
 * FileStateIO tests use temp directories.
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileStateIO, MemoryStateIO } from '../src/state/state-io.js';
import type { StateIO } from '../src/state/state-io.js';

function tempHome(): string {
  return mkdtempSync(join(tmpdir(), 'bastion-sio-'));
}

const implementations: ReadonlyArray<[string, () => StateIO]> = [
  ['MemoryStateIO', () => new MemoryStateIO()],
  ['FileStateIO', () => new FileStateIO(tempHome())],
];

describe.each(implementations)('%s', (_name, make) => {
  it('reads absent state as undefined', () => {
    expect(make().readJson('missing.json')).toBeUndefined();
  });

  it('round-trips JSON and drops undefined fields', () => {
    const io = make();
    io.writeJson('doc.json', { a: 1, b: undefined, list: ['x'] });
    expect(io.readJson('doc.json')).toEqual({ a: 1, list: ['x'] });
  });

  it('returns an empty string for a log that was never written', () => {
    const io = make();
    io.appendLine('other.jsonl', 'x');
    expect(io.readLogRaw('audit.jsonl')).toBe('');
  });

  it('returns appended lines with a terminal newline', () => {
    const io = make();
    io.appendLine('audit.jsonl', '{"event_id":"A"}');
    io.appendLine('audit.jsonl', '{"event_id":"B"}');
    expect(io.readLogRaw('audit.jsonl')).toBe('{"event_id":"A"}\n{"event_id":"B"}\n');
  });
});

describe('FileStateIO layout', () => {
  it('writes state under state/ and logs under logs/', () => {
    const home = tempHome();
    const io = new FileStateIO(home);
    io.writeJson('doc.json', { ok: true });
    io.appendLine('audit.jsonl', 'line');

    expect(JSON.parse(readFileSync(join(home, 'state', 'doc.json'), 'utf-8'))).toEqual({ ok: true });
    expect(readFileSync(join(home, 'logs', 'audit.jsonl'), 'utf-8')).toBe('line\n');
  });

  it('treats a corrupt state file as absent', () => {
    const home = tempHome();
    mkdirSync(join(home, 'state'), { recursive: true });
    writeFileSync(join(home, 'state', 'doc.json'), '{not json', 'utf-8');
    expect(new FileStateIO(home).readJson('doc.json')).toBeUndefined();
  });
});

describe('MemoryStateIO isolation', () => {
  it('keeps instances apart', () => {
    const a = new MemoryStateIO();
    const b = new MemoryStateIO();
    a.writeJson('doc.json', { owner: 'a' });
    a.appendLine('audit.jsonl', 'x');
    expect(b.readJson('doc.json')).toBeUndefined();
    expect(b.readLines('audit.jsonl')).toEqual([]);
    expect(a.readLines('audit.jsonl')).toEqual(['x']);
  });
});
