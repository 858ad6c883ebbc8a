import { describe, it, expect, beforeEach, afterEach, vi, Mock } from 'vitest';
import { buildProgram } from '../src/cli/program';
import { ImageOpener } from '../src/charts/viewer';
import { listRecords } from '../src/commands/list';
import { createTestContext, TestContext } from './support';

describe('cli program', () => {
  let t: TestContext;
  let opener: Mock<ImageOpener>;

  async function run(...args: string[]): Promise<void> {
    await buildProgram(t.ctx, { opener, exitOverride: true }).parseAsync(args, { from: 'user' });
  }

  beforeEach(async () => {
    t = createTestContext();
    opener = vi.fn<ImageOpener>().mockResolvedValue(undefined);
    await run('initiate');
    t.lines.length = 0;
  });

  afterEach(() => {
    t.cleanup();
  });

  it('adds positional values', async () => {
    await run('add', '36.5', '37.2', '2024-01-01');

    expect(t.lines).toEqual(['Inserted record for 2024-01-01 (1 row affected)']);
    expect(listRecords(t.ctx)).toEqual([{ dateTaken: '2024-01-01', morning: 36.5, evening: 37.2 }]);
  });

  it('adds values given as options', async () => {
    await run('add', '--morning', '36.4', '--date', '2024-01-02');
    await run('add', '-', '37,1', '2024-01-03');

    expect(listRecords(t.ctx, { direction: 'asc' })).toEqual([
      { dateTaken: '2024-01-02', morning: 36.4, evening: null },
      { dateTaken: '2024-01-03', morning: null, evening: 37.1 },
    ]);
  });

  it('takes a lone argument as the date when temperatures come as options', async () => {
    await run('add', '-m', '36.5', '-e', '-', '2024-01-01');
    await run('add', '--evening', '37.4', '3d');

    const records = listRecords(t.ctx, { direction: 'asc' });
    expect(records[0]).toEqual({ dateTaken: '2024-01-01', morning: 36.5, evening: null });
    expect(records[1].evening).toBe(37.4);
    expect(records).toHaveLength(2);
  });

  it('refuses temperatures both as options and as arguments', async () => {
    await expect(run('add', '-m', '36.5', '37.0', '2024-01-01')).rejects.toThrow(
      'with --morning or --evening give at most a date as argument'
    );
  });

  it('rejects an invalid date before touching the store', async () => {
    await expect(run('add', '36.5', '37.2', 'tomorrow')).rejects.toThrow('Invalid date "tomorrow"');
    expect(listRecords(t.ctx)).toEqual([]);
  });

  it('rejects an invalid temperature', async () => {
    await expect(run('add', 'warm', '37.2', '2024-01-01')).rejects.toThrow('Invalid temperature "warm"');
  });

  it('requires at least one temperature', async () => {
    await expect(run('add')).rejects.toThrow('give at least a morning or an evening temperature');
  });

  it('lists sorted ascending by a column', async () => {
    await run('add', '36.9', '37.0', '2024-01-01');
    await run('add', '36.4', '37.3', '2024-01-02');
    t.lines.length = 0;

    await run('list', '--sort', 'morning', '--asc');

    expect(t.lines).toEqual([
      'Date: Tue 02 Jan 2024 ; Morning: 36.4 ; Evening: 37.3',
      'Date: Mon 01 Jan 2024 ; Morning: 36.9 ; Evening: 37.0',
    ]);
  });

  it('rejects an unknown sort column', async () => {
    await expect(run('list', '--sort', 'weight')).rejects.toThrow(/Allowed choices are date, morning, evening/);
  });

  it('deletes by date', async () => {
    await run('add', '36.9', '37.0', '2024-01-01');
    t.lines.length = 0;

    await run('delete', '2024-01-01');
    await run('delete', '--date', '2024-01-01');

    expect(t.lines).toEqual([
      'Deleted record for 2024-01-01 (1 row affected)',
      'No record found for 2024-01-01',
    ]);
  });

  it('plots to the viewer', async () => {
    await run('add', '36.9', '37.0', '2024-01-01');

    await run('plot');

    expect(opener).toHaveBeenCalledTimes(1);
  });
});
