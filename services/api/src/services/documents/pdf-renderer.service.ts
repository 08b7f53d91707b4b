/**
 * PDF rasterizer
 * Renders PDF pages to PNG buffers with pdf.js on a native canvas
 */

import path from 'node:path';
import {
  DOMMatrix,
  ImageData,
  Path2D,
  createCanvas,
  type Canvas,
  type SKRSContext2D,
} from '@napi-rs/canvas';

type PdfJs = typeof import('pdfjs-dist/legacy/build/pdf');

// pdf.js measures page geometry in PostScript points (1/72 inch)
const POINTS_PER_INCH = 72;

// Base fonts (Helvetica, Times, Courier) that PDFs reference without embedding
const STANDARD_FONT_DATA_URL = `${path.join(
  path.dirname(require.resolve('pdfjs-dist/package.json')),
  'standard_fonts'
)}${path.sep}`;

export interface RenderOptions {
  maxPages: number;
  dpi: number;
}

interface CanvasAndContext {
  canvas: Canvas;
  context: SKRSContext2D;
}

/**
 * Canvas factory handed to pdf.js for page and scratch canvases (images, patterns, masks)
 */
const canvasFactory = {
  create(width: number, height: number): CanvasAndContext {
    const canvas = createCanvas(Math.max(1, width), Math.max(1, height));
    return { canvas, context: canvas.getContext('2d') };
  },
  reset(target: CanvasAndContext, width: number, height: number): void {
    target.canvas.width = Math.max(1, width);
    target.canvas.height = Math.max(1, height);
  },
  destroy(target: CanvasAndContext): void {
    target.canvas.width = 0;
    target.canvas.height = 0;
  },
};

let pdfjsModule: Promise<PdfJs> | null = null;

/**
 * Load pdf.js once, after the canvas globals it draws glyph outlines with are in place
 */
function loadPdfJs(): Promise<PdfJs> {
  if (!pdfjsModule) {
    if (!('DOMMatrix' in globalThis)) {
      Object.assign(globalThis, { DOMMatrix, ImageData, Path2D });
    }
    pdfjsModule = import('pdfjs-dist/legacy/build/pdf');
  }
  return pdfjsModule;
}

/**
 * Render up to maxPages pages, in page order, as PNG buffers.
 * Throws whatever pdf.js throws for unreadable input.
 */
export async function renderPdfPages(pdf: Buffer, options: RenderOptions): Promise<Buffer[]> {
  const pdfjs = await loadPdfJs();
  const document = await pdfjs.getDocument({
    data: new Uint8Array(pdf),
    canvasFactory,
    standardFontDataUrl: STANDARD_FONT_DATA_URL,
    isEvalSupported: false,
    useSystemFonts: false,
    verbosity: 0,
  }).promise;

  try {
    const pageCount = Math.min(document.numPages, options.maxPages);
    const scale = options.dpi / POINTS_PER_INCH;
    const pages: Buffer[] = [];

    for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
      const page = await document.getPage(pageNumber);
      const viewport = page.getViewport({ scale });
      const target = canvasFactory.create(Math.ceil(viewport.width), Math.ceil(viewport.height));

      // PDFs without a painted background would otherwise render transparent
      target.context.fillStyle = '#ffffff';
      target.context.fillRect(0, 0, target.canvas.width, target.canvas.height);

      await page.render({ canvasContext: target.context, viewport }).promise;
      pages.push(target.canvas.toBuffer('image/png'));

      page.cleanup();
      canvasFactory.destroy(target);
    }

    return pages;
  } finally {
    await document.destroy();
  }
}
