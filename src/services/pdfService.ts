import { PDFDocument, PDFFont, PDFPage, StandardFonts } from "pdf-lib";

// US Letter, points
const PAGE_WIDTH = 612;
const PAGE_HEIGHT = 792;
const MARGIN = 54;
const CONTENT_WIDTH = PAGE_WIDTH - MARGIN * 2;
const BLANK_LINE_GAP = 7.2;

export type LineStyle = "heading" | "subheading" | "body";

const STYLES: Record<LineStyle, { size: number; leading: number; bold: boolean }> = {
  heading: { size: 14, leading: 20, bold: true },
  subheading: { size: 12, leading: 17, bold: true },
  body: { size: 11, leading: 14, bold: false },
};

export const classifyLine = (line: string): LineStyle => {
  if (line.length < 50 && /[A-Z]/.test(line) && line === line.toUpperCase()) {
    return "heading";
  }
  if (line.length < 50 && line.endsWith(":")) {
    return "subheading";
  }
  return "body";
};

/**
 * Greedy word wrap. A single word wider than the line is put on its own line
 * and left to overflow rather than split mid-word.
 */
export const wrapLine = (
  text: string,
  maxWidth: number,
  measure: (s: string) => number,
): string[] => {
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let current = "";

  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (current && measure(candidate) > maxWidth) {
      lines.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }

  if (current) {
    lines.push(current);
  }
  return lines;
};

const toEncodable = (text: string, charset: Set<number>) => {
  let out = "";
  for (const ch of text) {
    const code = ch.codePointAt(0);
    out += code !== undefined && charset.has(code) ? ch : "?";
  }
  return out;
};

/**
 * Renders plain text (as returned by the AI) into a simple one-column PDF.
 */
export const renderTextPdf = async (text: string, title = "Document"): Promise<Uint8Array> => {
  const doc = await PDFDocument.create();
  doc.setTitle(title);

  const regular = await doc.embedFont(StandardFonts.Helvetica);
  const bold = await doc.embedFont(StandardFonts.HelveticaBold);
  const charset = new Set([...regular.getCharacterSet(), ...bold.getCharacterSet()]);

  let page: PDFPage = doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
  let y = PAGE_HEIGHT - MARGIN;

  const ensureRoom = (height: number) => {
    if (y - height < MARGIN) {
      page = doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
      y = PAGE_HEIGHT - MARGIN;
    }
  };

  const draw = (line: string, font: PDFFont, size: number, leading: number) => {
    ensureRoom(leading);
    y -= leading;
    page.drawText(line, { x: MARGIN, y, size, font });
  };

  for (const rawLine of text.split(/\r?\n/)) {
    const line = toEncodable(rawLine.replace(/\t/g, "    ").trim(), charset);

    if (!line) {
      y -= BLANK_LINE_GAP;
      continue;
    }

    const style = STYLES[classifyLine(line)];
    const font = style.bold ? bold : regular;
    const wrapped = wrapLine(line, CONTENT_WIDTH, (s) => font.widthOfTextAtSize(s, style.size));

    for (const part of wrapped) {
      draw(part, font, style.size, style.leading);
    }
  }

  console.log(`[PdfService] Rendered "${title}" (${doc.getPageCount()} page(s))`);
  return doc.save();
};

export const renderTextPdfBase64 = async (text: string, title?: string): Promise<string> =>
  Buffer.from(await renderTextPdf(text, title)).toString("base64");
