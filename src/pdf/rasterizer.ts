/**
 * PDF Rasterizer
 *
 * Renders each page of a PDF to an image buffer with MuPDF.
 * Page order is preserved: element i of the result is page i + 1.
 */

import * as mupdf from "mupdf";
import { PdfDecodeError } from "../errors.js";
import type { PageImageFormat, RenderOptions } from "../types.js";
import { readFileBytes, toPath } from "../utils/files.js";

const PDF_HEADER = Buffer.from("%PDF-", "latin1");
const JPEG_QUALITY = 90;

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  zoom: 0.2,
  format: "png",
};

export function isPdfBytes(data: Uint8Array): boolean {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength)
    .subarray(0, PDF_HEADER.length)
    .equals(PDF_HEADER);
}

function openDocument(data: Uint8Array): mupdf.Document {
  if (!isPdfBytes(data)) {
    throw new PdfDecodeError("document is not a pdf");
  }
  try {
    return mupdf.Document.openDocument(data, "application/pdf");
  } catch (error) {
    throw new PdfDecodeError(errorMessage(error), error);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Renders and encodes one page. MuPDF objects live on the WASM heap, which the
 * JS garbage collector does not track, so each is destroyed once used.
 */
function renderPage(
  doc: mupdf.Document,
  index: number,
  matrix: ReturnType<typeof mupdf.Matrix.scale>,
  format: PageImageFormat,
): Buffer {
  const page = doc.loadPage(index);
  try {
    const pixmap = page.toPixmap(
      matrix,
      mupdf.ColorSpace.DeviceRGB,
      false,
      true,
    );
    try {
      return Buffer.from(
        format === "jpeg" ? pixmap.asJPEG(JPEG_QUALITY, false) : pixmap.asPNG(),
      );
    } finally {
      pixmap.destroy();
    }
  } finally {
    page.destroy();
  }
}

/**
 * Renders every page of a PDF.
 *
 * @param pdf - PDF bytes, or a path / file URL to read them from
 * @returns One encoded image per page, in page order
 */
export function rasterize(
  pdf: string | URL | Uint8Array,
  options: Partial<RenderOptions> = {},
): Buffer[] {
  const { zoom, format } = { ...DEFAULT_RENDER_OPTIONS, ...options };
  const data =
    typeof pdf === "string" || pdf instanceof URL
      ? readFileBytes(toPath(pdf, "pdf"))
      : pdf;

  const doc = openDocument(data);
  try {
    let pageCount: number;
    try {
      pageCount = doc.countPages();
    } catch (error) {
      throw new PdfDecodeError("unable to read page tree", error);
    }
    if (pageCount === 0) {
      throw new PdfDecodeError("document has no pages");
    }

    const matrix = mupdf.Matrix.scale(zoom, zoom);
    const images: Buffer[] = [];
    for (let i = 0; i < pageCount; i++) {
      try {
        images.push(renderPage(doc, i, matrix, format));
      } catch (error) {
        throw new PdfDecodeError(
          `unable to render page ${i + 1}: ${errorMessage(error)}`,
          error,
        );
      }
    }

    console.log(
      `[PdfRasterizer] Rendered ${pageCount} page(s) as ${format} at zoom ${zoom}`,
    );
    return images;
  } finally {
    doc.destroy();
  }
}
