import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CommandContext } from './context';
import { TemperatureRecord, withDatabase } from '../storage/database';
import { TemperatureLineChart, LineSeries } from '../charts/line-chart';
import { convertSvgToPng } from '../charts/svg-to-png';
import { ImageOpener, openImage } from '../charts/viewer';
import { parseIsoDate, todayIsoDate } from '../utils/dates';

export interface PlotOptions {
  save?: boolean;
  now?: Date;
  opener?: ImageOpener;
}

export function chartFileName(now: Date = new Date()): string {
  return `temperature_${todayIsoDate(now)}.png`;
}

export function buildSeries(records: TemperatureRecord[]): LineSeries[] {
  const dated = records.map(r => ({ date: parseIsoDate(r.dateTaken), record: r }));
  return [
    {
      name: 'Morning',
      color: '#658DCD',
      points: dated.map(({ date, record }) => ({ date, value: record.morning })),
    },
    {
      name: 'Evening',
      color: '#CF7280',
      points: dated.map(({ date, record }) => ({ date, value: record.evening })),
    },
  ];
}

export function renderChart(ctx: CommandContext, records: TemperatureRecord[]): string {
  const { chart } = ctx.config;
  return new TemperatureLineChart(buildSeries(records), {
    width: chart.width,
    height: chart.height,
    title: 'Body temperature',
    yLabel: 'Temperature',
    referenceValue: chart.referenceTemperature,
  }).render();
}

/**
 * Draws every record ordered by date. Returns the PNG path, or null when
 * there was nothing to draw.
 */
export async function plotRecords(ctx: CommandContext, options: PlotOptions = {}): Promise<string | null> {
  const { config, logger, print } = ctx;

  const records = withDatabase(config.database.path, (database) => database.list('date', 'asc'));
  if (records.length === 0) {
    print('No records to plot');
    return null;
  }

  const png = convertSvgToPng(renderChart(ctx, records), { width: config.chart.width });
  const fileName = chartFileName(options.now);

  if (options.save) {
    const outputPath = path.join(config.chart.outputDirectory, fileName);
    fs.writeFileSync(outputPath, png);
    logger.info('plot', 'Saved chart', { path: outputPath, records: records.length });
    print(`Chart saved to ${fileName}`);
    return outputPath;
  }

  const tempPath = path.join(os.tmpdir(), `temperature_${Date.now()}.png`);
  fs.writeFileSync(tempPath, png);
  logger.debug('plot', 'Opening chart', { path: tempPath });
  await (options.opener ?? openImage)(tempPath);
  return tempPath;
}
