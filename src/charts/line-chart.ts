/**
 * TemperatureLineChart - renders dated temperature series to an SVG string
 */

import { extent } from 'd3-array';
import { scaleLinear, scaleTime, ScaleLinear, ScaleTime } from 'd3-scale';
import { addDays, format } from 'date-fns';

export interface Margin {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export interface SeriesPoint {
  date: Date;
  value: number | null;
}

export interface LineSeries {
  name: string;
  color: string;
  points: SeriesPoint[];
}

export interface LineChartOptions {
  width?: number;
  height?: number;
  margin?: Margin;
  title?: string;
  yLabel?: string;
  referenceValue?: number | null;
  maxXTicks?: number;
  yticks?: number;
}

interface ChartDimensions {
  width: number;
  height: number;
  innerWidth: number;
  innerHeight: number;
  margin: Margin;
}

const COLORS = {
  background: '#ffffff',
  text: '#333333',
  axis: '#333333',
  grid: '#c8c8c8',
  reference: '#8c8c8c',
};

const DEFAULT_OPTIONS: Required<LineChartOptions> = {
  width: 1000,
  height: 500,
  margin: { top: 50, right: 140, bottom: 50, left: 60 },
  title: '',
  yLabel: '',
  referenceValue: null,
  maxXTicks: 14,
  yticks: 6,
};

// Keeps path data short and stable across platforms
function px(value: number): number {
  return Math.round(value * 100) / 100;
}

export class TemperatureLineChart {
  private options: Required<LineChartOptions>;
  private dimensions: ChartDimensions;
  private xScale: ScaleTime<number, number>;
  private yScale: ScaleLinear<number, number>;
  private svgElements: string[] = [];

  constructor(private series: LineSeries[], options: LineChartOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    const { width, height, margin } = this.options;
    this.dimensions = {
      width,
      height,
      margin,
      innerWidth: width - margin.left - margin.right,
      innerHeight: height - margin.top - margin.bottom,
    };
    this.xScale = this.createXScale();
    this.yScale = this.createYScale();
  }

  render(): string {
    this.svgElements = [];

    this.renderBackground();
    this.renderTitle();
    this.svgElements.push(
      `<g transform="translate(${this.dimensions.margin.left},${this.dimensions.margin.top})">`
    );
    this.renderGridAndYAxis();
    this.renderXAxis();
    this.renderAxisLines();
    this.renderReferenceLine();
    this.renderSeries();
    this.svgElements.push('</g>');
    this.renderLegend();
    this.renderYLabel();

    const { width, height } = this.dimensions;
    return [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
      ...this.svgElements,
      '</svg>',
    ].join('\n');
  }

  /**
   * Distinct dates carried by any series, thinned to at most maxXTicks.
   */
  tickDates(): Date[] {
    const seen = new Map<number, Date>();
    for (const s of this.series) {
      for (const point of s.points) {
        seen.set(point.date.getTime(), point.date);
      }
    }

    const dates = [...seen.values()].sort((a, b) => a.getTime() - b.getTime());
    const step = Math.max(1, Math.ceil(dates.length / this.options.maxXTicks));
    return dates.filter((_, i) => i % step === 0);
  }

  private createXScale(): ScaleTime<number, number> {
    const [min, max] = extent(this.series.flatMap(s => s.points), p => p.date);
    const start = min ?? new Date();
    let end = max ?? start;

    // A single day still needs a non-empty domain
    if (end.getTime() === start.getTime()) {
      end = addDays(start, 1);
    }

    return scaleTime().domain([start, end]).range([0, this.dimensions.innerWidth]);
  }

  private createYScale(): ScaleLinear<number, number> {
    const values = this.series
      .flatMap(s => s.points.map(p => p.value))
      .filter((v): v is number => v !== null);
    if (this.options.referenceValue !== null) {
      values.push(this.options.referenceValue);
    }

    const [min, max] = extent(values);
    let low = min ?? 0;
    let high = max ?? 1;
    if (low === high) {
      low -= 1;
      high += 1;
    }

    return scaleLinear()
      .domain([low, high])
      .nice(this.options.yticks)
      .range([this.dimensions.innerHeight, 0]);
  }

  private renderBackground(): void {
    const { width, height } = this.dimensions;
    this.svgElements.push(`<rect width="${width}" height="${height}" fill="${COLORS.background}"/>`);
  }

  private renderTitle(): void {
    if (!this.options.title) return;
    const { width, margin } = this.dimensions;
    this.svgElements.push(
      `<text class="title" x="${width / 2}" y="${margin.top / 2 + 6}" text-anchor="middle" fill="${COLORS.text}" font-size="18px" font-weight="bold">${this.options.title}</text>`
    );
  }

  private renderGridAndYAxis(): void {
    const { innerWidth } = this.dimensions;

    this.yScale.ticks(this.options.yticks).forEach(tick => {
      const y = px(this.yScale(tick));
      this.svgElements.push(
        `<line class="grid" x1="0" y1="${y}" x2="${innerWidth}" y2="${y}" stroke="${COLORS.grid}" stroke-width="1" stroke-dasharray="4 4"/>`
      );
      this.svgElements.push(
        `<line x1="-6" y1="${y}" x2="0" y2="${y}" stroke="${COLORS.axis}" stroke-width="1"/>`
      );
      this.svgElements.push(
        `<text class="y-tick" x="-10" y="${px(y + 4)}" text-anchor="end" fill="${COLORS.text}" font-size="12px">${tick.toFixed(1)}</text>`
      );
    });
  }

  private renderXAxis(): void {
    const { innerHeight } = this.dimensions;

    this.tickDates().forEach(date => {
      const x = px(this.xScale(date));
      this.svgElements.push(
        `<line class="grid" x1="${x}" y1="0" x2="${x}" y2="${innerHeight}" stroke="${COLORS.grid}" stroke-width="1" stroke-dasharray="4 4"/>`
      );
      this.svgElements.push(
        `<line x1="${x}" y1="${innerHeight}" x2="${x}" y2="${innerHeight + 6}" stroke="${COLORS.axis}" stroke-width="1"/>`
      );
      this.svgElements.push(
        `<text class="x-tick" x="${x}" y="${innerHeight + 20}" text-anchor="middle" fill="${COLORS.text}" font-size="12px">${format(date, 'EEE')}</text>`
      );
    });
  }

  private renderAxisLines(): void {
    const { innerWidth, innerHeight } = this.dimensions;
    this.svgElements.push(
      `<line x1="0" y1="${innerHeight}" x2="${innerWidth}" y2="${innerHeight}" stroke="${COLORS.axis}" stroke-width="1"/>`,
      `<line x1="0" y1="0" x2="0" y2="${innerHeight}" stroke="${COLORS.axis}" stroke-width="1"/>`
    );
  }

  private renderReferenceLine(): void {
    const { referenceValue } = this.options;
    if (referenceValue === null) return;

    const { innerWidth } = this.dimensions;
    const y = px(this.yScale(referenceValue));
    this.svgElements.push(
      `<line class="reference-line" x1="0" y1="${y}" x2="${innerWidth}" y2="${y}" stroke="${COLORS.reference}" stroke-width="1.5" stroke-dasharray="8 4"/>`,
      `<text x="${innerWidth - 4}" y="${px(y - 6)}" text-anchor="end" fill="${COLORS.reference}" font-size="11px">${referenceValue}</text>`
    );
  }

  private renderSeries(): void {
    this.series.forEach(s => {
      const className = `series-${s.name.toLowerCase()}`;

      // A missing observation breaks the line
      for (const segment of this.segments(s.points)) {
        if (segment.length < 2) continue;
        const linePoints = segment.map(p => `${px(this.xScale(p.date))},${px(this.yScale(p.value))}`);
        this.svgElements.push(
          `<path class="${className}" d="M${linePoints.join('L')}" fill="none" stroke="${s.color}" stroke-width="2"/>`
        );
      }

      s.points.forEach(p => {
        if (p.value === null) return;
        this.svgElements.push(
          `<circle class="${className}" cx="${px(this.xScale(p.date))}" cy="${px(this.yScale(p.value))}" r="3" fill="${s.color}"/>`
        );
      });
    });
  }

  private segments(points: SeriesPoint[]): { date: Date; value: number }[][] {
    const result: { date: Date; value: number }[][] = [];
    let current: { date: Date; value: number }[] = [];

    for (const p of points) {
      if (p.value === null) {
        if (current.length > 0) result.push(current);
        current = [];
      } else {
        current.push({ date: p.date, value: p.value });
      }
    }
    if (current.length > 0) result.push(current);

    return result;
  }

  private renderLegend(): void {
    const { width, margin } = this.dimensions;
    const x = width - margin.right + 20;

    this.series.forEach((s, i) => {
      const y = margin.top + 10 + i * 22;
      this.svgElements.push(
        `<line x1="${x}" y1="${y}" x2="${x + 24}" y2="${y}" stroke="${s.color}" stroke-width="2"/>`,
        `<text class="legend" x="${x + 30}" y="${y + 4}" fill="${COLORS.text}" font-size="12px">${s.name}</text>`
      );
    });
  }

  private renderYLabel(): void {
    if (!this.options.yLabel) return;
    const { margin, innerHeight } = this.dimensions;
    const cy = margin.top + innerHeight / 2;
    this.svgElements.push(
      `<text x="16" y="${cy}" text-anchor="middle" fill="${COLORS.text}" font-size="12px" transform="rotate(-90 16 ${cy})">${this.options.yLabel}</text>`
    );
  }
}
