import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { buildExport, formatRecordLine, writeExport } from '../src/reporting/export';

const records = [
  { dateTaken: '2024-01-01', morning: 36.5, evening: 37.0 },
  { dateTaken: '2024-01-02', morning: 36.8, evening: 37.1 },
];

const expected =
  'Date;Morning temperature;Evening temperature\n' +
  'Mon 01 Jan 2024;36.5;37.0\n' +
  'Tue 02 Jan 2024;36.8;37.1\n';

describe('export', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('builds a header plus one semicolon-delimited line per record', () => {
    expect(buildExport(records)).toBe(expected);
  });

  it('leaves missing observations empty', () => {
    expect(buildExport([{ dateTaken: '2024-01-03', morning: null, evening: 36.9 }])).toBe(
      'Date;Morning temperature;Evening temperature\nWed 03 Jan 2024;;36.9\n'
    );
  });

  it('writes the file as utf-8', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'temperature-export-'));
    const file = path.join(dir, 'out.csv');

    writeExport(file, records);

    expect(fs.readFileSync(file, 'utf-8')).toBe(expected);
  });

  it('formats console lines', () => {
    expect(formatRecordLine({ dateTaken: '2024-01-02', morning: 36.8, evening: null })).toBe(
      'Date: Tue 02 Jan 2024 ; Morning: 36.8 ; Evening: -'
    );
  });
});
