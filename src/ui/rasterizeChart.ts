// src/ui/rasterizeChart.ts
import { ExportError } from "../engine/errors";
import type { ChartImage } from "../report/exportReport";

/** The recharts drawing surface inside a chart container; this is what gets rasterized. */
export function findChartSvg(container: ParentNode): SVGSVGElement | null {
  return container.querySelector<SVGSVGElement>("svg.recharts-surface") ?? container.querySelector("svg");
}

export type ImageLoader = (url: string) => Promise<CanvasImageSource>;

function loadImageElement(url: string): Promise<CanvasImageSource> {
  return new Promise((resolve, reject) => {
    const img = new Image();
    img.onload = () => resolve(img);
    img.onerror = () => reject(new Error("chart SVG could not be decoded"));
    img.src = url;
  });
}

function canvasToPng(canvas: HTMLCanvasElement): Promise<Blob> {
  return new Promise((resolve, reject) => {
    canvas.toBlob((blob) => (blob ? resolve(blob) : reject(new Error("canvas produced no PNG"))), "image/png");
  });
}

/**
 * Draws a rendered chart SVG onto a white canvas and returns it as PNG.
 * The intermediate object URL is always revoked before returning or throwing.
 */
export async function rasterizeSvg(
  svg: SVGSVGElement,
  scale = 2,
  loadImage: ImageLoader = loadImageElement
): Promise<ChartImage> {
  const rect = svg.getBoundingClientRect();
  const width = rect.width || Number(svg.getAttribute("width")) || 0;
  const height = rect.height || Number(svg.getAttribute("height")) || 0;

  const xml = new XMLSerializer().serializeToString(svg);
  const url = URL.createObjectURL(new Blob([xml], { type: "image/svg+xml;charset=utf-8" }));

  try {
    const img = await loadImage(url);
    if (width <= 0 || height <= 0) throw new ExportError(`chart has no size (${width}×${height})`);

    const canvas = document.createElement("canvas");
    canvas.width = Math.round(width * scale);
    canvas.height = Math.round(height * scale);

    const ctx = canvas.getContext("2d");
    if (!ctx) throw new ExportError("2D canvas is not available");
    ctx.fillStyle = "#ffffff";
    ctx.fillRect(0, 0, canvas.width, canvas.height);
    ctx.drawImage(img, 0, 0, canvas.width, canvas.height);

    const blob = await canvasToPng(canvas);
    return {
      png: new Uint8Array(await blob.arrayBuffer()),
      widthPx: canvas.width,
      heightPx: canvas.height,
    };
  } catch (e) {
    if (e instanceof ExportError) throw e;
    throw new ExportError(`failed to rasterize chart: ${e instanceof Error ? e.message : String(e)}`, e);
  } finally {
    URL.revokeObjectURL(url);
  }
}
