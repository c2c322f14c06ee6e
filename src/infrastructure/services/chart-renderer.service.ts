import sharp from 'sharp';
import {
  INDICATOR_LABELS,
  type IndicatorId,
  type IndicatorSample,
} from '../../domain/entities/indicator-sample.entity';
import type { IChartRenderer, RenderedChart } from '../../domain/interfaces/services.interface';
import { RenderError, describeError } from '../../shared/errors';
import { Logger } from '../../shared/logger';
import { buildLineChartSvg } from '../charts/line-chart.svg';

/** Draws the newest `maxPoints` samples of an indicator as a PNG line chart. */
export class ChartRendererService implements IChartRenderer {
  private readonly logger = new Logger(ChartRendererService.name);

  constructor(private readonly maxPoints: number) {}

  buildSvg(indicatorId: IndicatorId, samples: readonly IndicatorSample[]): string {
    const points = samples.slice(-this.maxPoints);
    if (points.length < 2) {
      throw new RenderError(indicatorId, `need at least 2 samples, have ${points.length}`);
    }
    return buildLineChartSvg(points, { title: INDICATOR_LABELS[indicatorId] });
  }

  async render(indicatorId: IndicatorId, samples: readonly IndicatorSample[]): Promise<RenderedChart> {
    const svg = this.buildSvg(indicatorId, samples);

    let content: Buffer;
    try {
      content = await sharp(Buffer.from(svg)).png().toBuffer();
    } catch (error) {
      throw new RenderError(indicatorId, describeError(error), { cause: error });
    }

    this.logger.debug(`Rendered ${indicatorId} chart (${content.length} bytes)`);
    return {
      indicatorId,
      filename: `${indicatorId}.png`,
      contentType: 'image/png',
      content,
    };
  }
}
