/**
 * Chart rendering
 *
 * recharts draws the plot area (axes, grid, lines, markers) through
 * react-dom/server. The title and legend are drawn here around it, because
 * recharts puts its legend in an HTML <div> outside the SVG, and the
 * rasterizer only sees the SVG. The PNG comes from resvg and the HTML page
 * from a second static render.
 */

import { Resvg } from "@resvg/resvg-js";
import { renderToStaticMarkup } from "react-dom/server";
import ChartDocument from "@/components/ChartDocument";
import StatsChart from "@/components/StatsChart";
import { CHART_HEIGHT, CHART_WIDTH } from "@/config/charts";
import type { Artifact } from "@/lib/artifacts";
import type { ChartModel, ChartSeries } from "@/lib/charts";
import { RenderError } from "@/lib/errors";

const TITLE_BAND = 36;
const LEGEND_START_X = 80;
const LEGEND_MARGIN = 16;
const LEGEND_ROW_HEIGHT = 20;
const LEGEND_PADDING = 10;
const FONT_FAMILY = "DejaVu Sans, Arial, Helvetica, sans-serif";

function escapeXml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

/**
 * Pull the <svg> element out of recharts' wrapper <div>. Its inline style is
 * dropped so the nested plot keeps its pixel size inside the outer document.
 */
export function extractSvg(markup: string): string | null {
  const start = markup.indexOf("<svg");
  const end = markup.lastIndexOf("</svg>");
  if (start === -1 || end === -1 || end < start) return null;
  return markup.slice(start, end + "</svg>".length).replace(/^<svg([^>]*?)\sstyle="[^"]*"/, "<svg$1");
}

function legendMarker(s: ChartSeries, x: number, y: number): string {
  const r = 4;
  switch (s.marker) {
    case "square":
      return `<rect x="${x - r}" y="${y - r}" width="${r * 2}" height="${r * 2}" fill="${s.color}"/>`;
    case "cross":
      return `<path d="M${x - r},${y - r}L${x + r},${y + r}M${x - r},${y + r}L${x + r},${y - r}" stroke="${s.color}" stroke-width="2" fill="none"/>`;
    default:
      return `<circle cx="${x}" cy="${y}" r="${r}" fill="${s.color}"/>`;
  }
}

interface LegendSlot {
  series: ChartSeries;
  x: number;
  row: number;
}

// Entries flow left to right and wrap onto a new row at the right margin
function layoutLegend(series: ChartSeries[]): LegendSlot[] {
  const slots: LegendSlot[] = [];
  let x = LEGEND_START_X;
  let row = 0;
  for (const s of series) {
    const width = 36 + s.label.length * 7;
    if (x > LEGEND_START_X && x + width > CHART_WIDTH - LEGEND_MARGIN) {
      row += 1;
      x = LEGEND_START_X;
    }
    slots.push({ series: s, x, row });
    x += width + 24;
  }
  return slots;
}

function legendHeight(slots: LegendSlot[]): number {
  const rows = slots.reduce((max, slot) => Math.max(max, slot.row + 1), 1);
  return rows * LEGEND_ROW_HEIGHT + LEGEND_PADDING;
}

function generateLegend(slots: LegendSlot[], top: number): string {
  return slots
    .map(({ series: s, x, row }) => {
      const y = top + LEGEND_PADDING / 2 + row * LEGEND_ROW_HEIGHT + LEGEND_ROW_HEIGHT / 2;
      const dash = s.dash ? ` stroke-dasharray="${s.dash}"` : "";
      return `<g class="legend-item">
    <line x1="${x}" y1="${y}" x2="${x + 28}" y2="${y}" stroke="${s.color}" stroke-width="2"${dash}/>
    ${legendMarker(s, x + 14, y)}
    <text x="${x + 36}" y="${y + 4}" font-size="12" fill="#1f2937">${escapeXml(s.label)}</text>
  </g>`;
    })
    .join("\n  ");
}

/**
 * Render a chart model to a standalone SVG document.
 */
export function renderChartSvg(model: ChartModel): string {
  const { config } = model;
  const legend = layoutLegend(model.series);
  const legendTop = CHART_HEIGHT - legendHeight(legend);
  const plotHeight = legendTop - TITLE_BAND;

  let markup: string;
  try {
    markup = renderToStaticMarkup(<StatsChart model={model} width={CHART_WIDTH} height={plotHeight} />);
  } catch (error) {
    throw new RenderError(`Chart ${config.id} failed to render: ${errorMessage(error)}`, config.id, { cause: error });
  }

  const plot = extractSvg(markup);
  if (!plot) {
    throw new RenderError(`Chart ${config.id} produced no SVG`, config.id);
  }

  return `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${CHART_WIDTH} ${CHART_HEIGHT}" width="${CHART_WIDTH}" height="${CHART_HEIGHT}" font-family="${FONT_FAMILY}">
  <rect width="100%" height="100%" fill="#ffffff"/>
  <text x="${CHART_WIDTH / 2}" y="24" text-anchor="middle" font-size="16" font-weight="bold" fill="#111827">${escapeXml(config.title)}</text>
  <g transform="translate(0, ${TITLE_BAND})">${plot}</g>
  ${generateLegend(legend, legendTop)}
</svg>`;
}

export function renderChartPng(model: ChartModel, svg: string): Buffer {
  try {
    const resvg = new Resvg(svg, {
      background: "#ffffff",
      fitTo: { mode: "original" },
      font: { loadSystemFonts: true, defaultFontFamily: "DejaVu Sans" },
    });
    return resvg.render().asPng();
  } catch (error) {
    throw new RenderError(`Chart ${model.config.id} could not be rasterized: ${errorMessage(error)}`, model.config.id, {
      cause: error,
    });
  }
}

export function renderChartHtml(model: ChartModel, svg: string): string {
  try {
    return `<!DOCTYPE html>\n${renderToStaticMarkup(<ChartDocument model={model} svg={svg} />)}\n`;
  } catch (error) {
    throw new RenderError(`Chart ${model.config.id} page failed to render: ${errorMessage(error)}`, model.config.id, {
      cause: error,
    });
  }
}

/**
 * Every file one chart produces: `<id>.png` and `<id>.html`.
 */
export function renderChartArtifacts(model: ChartModel): Artifact[] {
  const svg = renderChartSvg(model);
  return [
    { fileName: `${model.config.id}.png`, contents: renderChartPng(model, svg) },
    { fileName: `${model.config.id}.html`, contents: renderChartHtml(model, svg) },
  ];
}
