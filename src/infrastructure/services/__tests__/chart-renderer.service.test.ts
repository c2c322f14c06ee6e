import { describe, it, expect } from 'vitest';
import { ChartRendererService } from '../chart-renderer.service';
import { plotPoints } from '../../charts/line-chart.svg';
import { createSample, type IndicatorId } from '../../../domain/entities/indicator-sample.entity';
import { RenderError } from '../../../shared/errors';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

function series(id: IndicatorId, values: number[]) {
  return values.map((value, i) => createSample(id, value, new Date(Date.UTC(2024, 0, i + 1))));
}

function polylinePoints(svg: string): string[] {
  const match = /points="([^"]*)"/.exec(svg);
  return match ? match[1].split(' ') : [];
}

describe('ChartRendererService', () => {
  it('draws the series with an escaped title and date range', () => {
    const svg = new ChartRendererService(90).buildSvg('fear_greed', series('fear_greed', [20, 80, 50]));

    expect(svg).toContain('>Fear &amp; Greed index</text>');
    expect(svg).toContain('>2024-01-01</text>');
    expect(svg).toContain('>2024-01-03</text>');
    expect(polylinePoints(svg)).toHaveLength(3);
  });

  it('keeps only the newest points', () => {
    const svg = new ChartRendererService(3).buildSvg('btc_dominance', series('btc_dominance', [50, 51, 52, 53, 54]));

    expect(polylinePoints(svg)).toHaveLength(3);
    expect(svg).toContain('>2024-01-03</text>');
  });

  it('needs at least two samples', async () => {
    const renderer = new ChartRendererService(90);

    await expect(renderer.render('m2_supply', series('m2_supply', [20000]))).rejects.toThrow(
      'Cannot render chart for m2_supply: need at least 2 samples, have 1',
    );
    await expect(renderer.render('m2_supply', [])).rejects.toBeInstanceOf(RenderError);
  });

  it('rasterizes to PNG', async () => {
    const chart = await new ChartRendererService(90).render('altcoin_share', series('altcoin_share', [0.3, 0.32]));

    expect(chart.filename).toBe('altcoin_share.png');
    expect(chart.contentType).toBe('image/png');
    expect([...chart.content.subarray(0, 8)]).toEqual(PNG_SIGNATURE);
  });
});

describe('plotPoints', () => {
  it('maps the lowest value to the bottom and the highest to the top', () => {
    expect(plotPoints([0, 10], 640, 320)).toBe('72.00,284.00 616.00,40.00');
  });

  it('centres a flat series', () => {
    expect(plotPoints([5, 5], 640, 320)).toBe('72.00,162.00 616.00,162.00');
  });
});
