import { PDFDocument, StandardFonts } from 'pdf-lib';

/** Builds a PDF with one line of text per page; an empty string leaves the page blank. */
export async function createPdf(pages: string[]): Promise<Buffer> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);
  for (const line of pages) {
    const page = doc.addPage([612, 792]);
    if (line) {
      page.drawText(line, { x: 72, y: 720, size: 12, font });
    }
  }
  return Buffer.from(await doc.save());
}

export const WIDGET_PAGES = [
  'Device: Widget X, Class II',
  'Quality records retained per 21 CFR 820.180',
];
