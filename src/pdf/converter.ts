/**
 * PDF / image conversions around the invocation pipeline: assemble images into a
 * PDF with pdf-lib, and write rendered pages or assembled PDFs to disk.
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { PDFDocument } from "pdf-lib";
import { DocumentInvokeError } from "../errors.js";
import { validateAndEncode } from "../image-codec.js";
import type { RenderOptions } from "../types.js";
import { PDF_EMBEDDABLE_MIME_TYPES } from "../utils/mime-types.js";
import { isPdfBytes, rasterize } from "./rasterizer.js";

/**
 * Builds a PDF with one page per image, each page sized to its image.
 */
export async function imagesToPdf(
  images: readonly Uint8Array[],
  allowedMimeTypes: ReadonlySet<string> = PDF_EMBEDDABLE_MIME_TYPES,
): Promise<Buffer> {
  // Validate everything before building anything
  const normalized = images.map((image, index) =>
    validateAndEncode(image, allowedMimeTypes, index),
  );

  const doc = await PDFDocument.create();
  for (const image of normalized) {
    const embedded =
      image.mimeType === "image/png"
        ? await doc.embedPng(image.data)
        : await doc.embedJpg(image.data);
    const page = doc.addPage([embedded.width, embedded.height]);
    page.drawImage(embedded, {
      x: 0,
      y: 0,
      width: embedded.width,
      height: embedded.height,
    });
  }

  const pdfBytes = Buffer.from(await doc.save());
  if (!isPdfBytes(pdfBytes)) {
    throw new DocumentInvokeError(
      "PDF_DECODE",
      "Generated document is not a pdf",
    );
  }
  return pdfBytes;
}

/**
 * Renders a PDF and writes one file per page as `<pdfName>_page_<index>.<ext>`.
 *
 * @returns The output directory
 */
export async function savePdfToImages(
  pdf: string | URL | Uint8Array,
  outputDir: string,
  pdfName: string,
  options?: Partial<RenderOptions>,
): Promise<string> {
  const pages = rasterize(pdf, options);
  const extension = options?.format === "jpeg" ? "jpeg" : "png";

  await mkdir(outputDir, { recursive: true });
  for (const [index, page] of pages.entries()) {
    await writeFile(join(outputDir, `${pdfName}_page_${index}.${extension}`), page);
  }

  console.log(
    `[PdfConverter] Saved ${pages.length} page image(s) to ${outputDir}`,
  );
  return outputDir;
}

/**
 * Assembles images into a PDF and writes it as `<pdfName>.pdf`.
 *
 * @returns Path of the written PDF
 */
export async function saveImagesToPdf(
  images: readonly Uint8Array[],
  outputDir: string,
  pdfName: string,
): Promise<string> {
  const pdfBytes = await imagesToPdf(images);
  const pdfPath = join(outputDir, `${pdfName}.pdf`);

  await mkdir(outputDir, { recursive: true });
  await writeFile(pdfPath, pdfBytes);

  console.log(`[PdfConverter] Saved ${images.length} image(s) to ${pdfPath}`);
  return pdfPath;
}
