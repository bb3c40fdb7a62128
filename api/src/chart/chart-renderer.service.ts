import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createCanvas, type SKRSContext2D } from '@napi-rs/canvas';
import type { AppConfig } from '../config/configuration';
import { buildChartLayout, type ChartInput, type ChartLayout } from './chart-layout';

export const PNG_CONTENT_TYPE = 'image/png';

const LINE_COLOR = '#1f77b4';
const GRID_COLOR = '#e5e7eb';
const AXIS_COLOR = '#9ca3af';
const LABEL_COLOR = '#4b5563';
const TITLE_COLOR = '#111827';
const FONT_FAMILY = 'sans-serif';

export interface ChartImage {
  data: Buffer;
  contentType: typeof PNG_CONTENT_TYPE;
}

/**
 * Chart Renderer
 * Lays out the series with {@link buildChartLayout} and paints it at the
 * requested pixel size. `CHART_STYLE` picks the labelled chart (default) or
 * the bare transparent spark line.
 */
@Injectable()
export class ChartRendererService {
  constructor(private readonly config: ConfigService<AppConfig, true>) {}

  async render(input: ChartInput): Promise<ChartImage> {
    const { style, timeZone } = this.config.get('chart', { infer: true });
    const layout = buildChartLayout(input, { style, timeZone });

    const canvas = createCanvas(layout.width, layout.height);
    const ctx = canvas.getContext('2d');

    if (layout.style === 'minimal') {
      drawMinimal(ctx, layout);
    } else {
      drawDetailed(ctx, layout);
    }

    const data = await canvas.encode('png');
    return { data, contentType: PNG_CONTENT_TYPE };
  }
}

/* ------------------------------ Painters ----------------------------- */

function tracePath(ctx: SKRSContext2D, layout: ChartLayout): void {
  const [head, ...rest] = layout.points;
  ctx.moveTo(head.x, head.y);
  for (const p of rest) ctx.lineTo(p.x, p.y);
}

// Area from the line down to the bottom of the price range
function fillArea(ctx: SKRSContext2D, layout: ChartLayout, alpha: number): void {
  const { points, baselineY } = layout;
  const first = points[0];
  const last = points[points.length - 1];

  ctx.save();
  ctx.globalAlpha = alpha;
  ctx.fillStyle = LINE_COLOR;
  ctx.beginPath();
  ctx.moveTo(first.x, baselineY);
  ctx.lineTo(first.x, first.y);
  for (let i = 1; i < points.length; i++) ctx.lineTo(points[i].x, points[i].y);
  ctx.lineTo(last.x, baselineY);
  ctx.closePath();
  ctx.fill();
  ctx.restore();
}

function strokeLine(ctx: SKRSContext2D, layout: ChartLayout, lineWidth: number): void {
  ctx.save();
  ctx.strokeStyle = LINE_COLOR;
  ctx.fillStyle = LINE_COLOR;
  ctx.lineWidth = lineWidth;
  ctx.lineJoin = 'round';
  ctx.lineCap = 'round';

  if (layout.points.length === 1) {
    const p = layout.points[0];
    ctx.beginPath();
    ctx.arc(p.x, p.y, lineWidth * 1.5, 0, Math.PI * 2);
    ctx.fill();
  } else {
    ctx.beginPath();
    tracePath(ctx, layout);
    ctx.stroke();
  }
  ctx.restore();
}

function drawMinimal(ctx: SKRSContext2D, layout: ChartLayout): void {
  // transparent background: nothing to clear
  ctx.save();
  ctx.strokeStyle = GRID_COLOR;
  ctx.globalAlpha = 0.4;
  ctx.lineWidth = 0.5;
  for (const tick of layout.yTicks) {
    ctx.beginPath();
    ctx.moveTo(layout.plot.left, tick.at);
    ctx.lineTo(layout.plot.left + layout.plot.width, tick.at);
    ctx.stroke();
  }
  ctx.restore();

  fillArea(ctx, layout, 0.3);
  strokeLine(ctx, layout, 2);
}

function drawDetailed(ctx: SKRSContext2D, layout: ChartLayout): void {
  const { plot, typography } = layout;
  const labelFont = `${typography.labelSize}px ${FONT_FAMILY}`;

  ctx.fillStyle = '#ffffff';
  ctx.fillRect(0, 0, layout.width, layout.height);

  // horizontal grid + price labels
  ctx.save();
  ctx.strokeStyle = GRID_COLOR;
  ctx.lineWidth = 1;
  ctx.fillStyle = LABEL_COLOR;
  ctx.font = labelFont;
  ctx.textAlign = 'right';
  ctx.textBaseline = 'middle';
  for (const tick of layout.yTicks) {
    ctx.beginPath();
    ctx.moveTo(plot.left, tick.at);
    ctx.lineTo(plot.left + plot.width, tick.at);
    ctx.stroke();
    ctx.fillText(tick.label, plot.left - typography.labelSize * 0.5, tick.at);
  }
  ctx.restore();

  fillArea(ctx, layout, 0.15);
  strokeLine(ctx, layout, 1.5);

  // axes
  ctx.save();
  ctx.strokeStyle = AXIS_COLOR;
  ctx.lineWidth = 1;
  ctx.beginPath();
  ctx.moveTo(plot.left, plot.top);
  ctx.lineTo(plot.left, plot.top + plot.height);
  ctx.lineTo(plot.left + plot.width, plot.top + plot.height);
  ctx.stroke();

  // time ticks, then the labels that fit
  const axisY = plot.top + plot.height;
  const tickLen = Math.round(typography.labelSize * 0.4);
  for (const x of layout.xTickMarks) {
    ctx.beginPath();
    ctx.moveTo(x, axisY);
    ctx.lineTo(x, axisY + tickLen);
    ctx.stroke();
  }

  ctx.fillStyle = LABEL_COLOR;
  ctx.font = labelFont;
  ctx.textBaseline = 'top';
  layout.xTicks.forEach((tick, i) => {
    // keep the outermost labels inside the canvas
    ctx.textAlign = i === 0 ? 'left' : i === layout.xTicks.length - 1 ? 'right' : 'center';
    ctx.fillText(tick.label, tick.at, axisY + tickLen + 2);
  });
  ctx.restore();

  // title + latest price / change
  const titleY = Math.round(typography.titleSize * 0.4);
  ctx.save();
  ctx.textBaseline = 'top';
  ctx.textAlign = 'left';
  ctx.fillStyle = TITLE_COLOR;
  ctx.font = `bold ${typography.titleSize}px ${FONT_FAMILY}`;
  ctx.fillText(layout.title, plot.left, titleY, layout.width - plot.left - 4);

  const annotationY = titleY + Math.round(typography.titleSize * 1.3);
  ctx.font = `bold ${typography.labelSize + 2}px ${FONT_FAMILY}`;
  ctx.fillText(layout.annotation.price, plot.left, annotationY);
  const priceWidth = ctx.measureText(`${layout.annotation.price}  `).width;
  ctx.fillStyle = layout.annotation.color;
  ctx.font = `${typography.labelSize + 2}px ${FONT_FAMILY}`;
  ctx.fillText(layout.annotation.change, plot.left + priceWidth, annotationY);
  ctx.restore();
}
