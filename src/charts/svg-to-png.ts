/**
 * SVG to PNG conversion using @resvg/resvg-js
 */

import { Resvg, ResvgRenderOptions } from '@resvg/resvg-js';

export interface ConversionOptions {
  width?: number;
  background?: string;
}

// Larger renders overflow resvg's stack
const MAX_DIMENSION = 4096;

export function convertSvgToPng(svgString: string, options: ConversionOptions = {}): Buffer {
  const opts: ResvgRenderOptions = {
    font: {
      loadSystemFonts: true,
      defaultFontFamily: 'Arial',
    },
    background: options.background ?? 'white',
  };

  if (options.width !== undefined) {
    opts.fitTo = { mode: 'width', value: Math.min(options.width, MAX_DIMENSION) };
  }

  let cleanSvg = svgString.trim();

  // Ensure text elements have a font-family when the chart did not set one
  if (!cleanSvg.includes('font-family')) {
    cleanSvg = cleanSvg.replace(
      /(<svg[^>]*>)/,
      '$1<style>text { font-family: Arial, sans-serif; } .title { font-weight: bold; }</style>'
    );
  }

  try {
    const resvg = new Resvg(cleanSvg, opts);
    return resvg.render().asPng();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`PNG conversion failed: ${message}`);
  }
}
