/**
 * Model card PDF (pdf-lib). A title block opens the first page and the card's sections follow.
 * Footers carry version, generation time and "Page n of N", so they are stamped after layout.
 */

import { PDFDocument, StandardFonts, rgb, type PDFFont, type PDFPage } from "pdf-lib";
import type { ModelSnapshot } from "../scoring/modelVersion";
import { buildModelCardSections, disclaimerLines, modelCardTitle, type ModelCardSection } from "./modelCardContent";

const PAGE_SIZE: [number, number] = [612, 792];
const MARGIN = 50;
const FOOTER_HEIGHT = 60;
const CONTENT_WIDTH = PAGE_SIZE[0] - MARGIN * 2;
const BULLET_INDENT = 14;
const TITLE_SIZE = 18;
const HEADING_SIZE = 12;
const BODY_SIZE = 10;
/** Room a heading needs below it; less than this and it moves to the next page. */
const HEADING_KEEP = 48;

type Color = ReturnType<typeof rgb>;
const BLACK = rgb(0, 0, 0);
const INK = rgb(0.2, 0.2, 0.2);
const MUTED = rgb(0.5, 0.5, 0.5);

const lineHeight = (size: number) => size * 1.25;

/** Standard fonts encode WinAnsi only; map typographic characters and drop the rest. */
export function sanitizeForPdf(s: string | null | undefined): string {
  if (s == null) return "";
  return s
    .replace(/‘|’/g, "'")
    .replace(/“|”/g, '"')
    .replace(/–|—/g, "-")
    .replace(/…/g, "...")
    .replace(/≤/g, "<=")
    .replace(/≥/g, ">=")
    .replace(/→/g, "->")
    .replace(/[\u0000-\u001F\u007F-\u009F]/g, " ")
    .replace(/[^\x20-\x7E -ÿ]/g, "?");
}

/** Greedy word wrap. A word wider than the line gets a line of its own. */
export function wrapText(text: string, maxWidth: number, fontSize: number, font: Pick<PDFFont, "widthOfTextAtSize">): string[] {
  const lines: string[] = [];
  let line = "";
  for (const word of text.split(/\s+/).filter(Boolean)) {
    const next = line ? `${line} ${word}` : word;
    if (line && font.widthOfTextAtSize(next, fontSize) > maxWidth) {
      lines.push(line);
      line = word;
    } else {
      line = next;
    }
  }
  if (line) lines.push(line);
  return lines;
}

/** Top-down writer over a growing document; opens a page whenever the next line would hit the footer. */
class PageCursor {
  private readonly doc: PDFDocument;
  private readonly font: PDFFont;
  private page: PDFPage;
  private y: number;

  constructor(doc: PDFDocument, font: PDFFont) {
    this.doc = doc;
    this.font = font;
    this.page = doc.addPage(PAGE_SIZE);
    this.y = PAGE_SIZE[1] - MARGIN;
  }

  reserve(height: number): void {
    if (this.y - height >= MARGIN + FOOTER_HEIGHT) return;
    this.page = this.doc.addPage(PAGE_SIZE);
    this.y = PAGE_SIZE[1] - MARGIN;
  }

  gap(height: number): void {
    this.y -= height;
  }

  line(text: string, size: number, options: { font?: PDFFont; color?: Color; indent?: number } = {}): void {
    this.reserve(lineHeight(size));
    this.page.drawText(text, {
      x: MARGIN + (options.indent ?? 0),
      y: this.y,
      size,
      font: options.font ?? this.font,
      color: options.color ?? INK,
    });
    this.y -= lineHeight(size);
  }

  paragraph(text: string, size: number, indent = 0): void {
    for (const l of wrapText(sanitizeForPdf(text), CONTENT_WIDTH - indent, size, this.font)) this.line(l, size, { indent });
  }

  bullet(text: string): void {
    const lines = wrapText(sanitizeForPdf(text), CONTENT_WIDTH - BULLET_INDENT, BODY_SIZE, this.font);
    if (lines.length === 0) return;
    this.reserve(lineHeight(BODY_SIZE));
    this.page.drawText("-", { x: MARGIN, y: this.y, size: BODY_SIZE, font: this.font, color: INK });
    for (const l of lines) this.line(l, BODY_SIZE, { indent: BULLET_INDENT });
  }
}

function writeSection(cursor: PageCursor, section: ModelCardSection, bold: PDFFont): void {
  cursor.reserve(HEADING_KEEP);
  cursor.line(sanitizeForPdf(section.heading), HEADING_SIZE, { font: bold, color: BLACK });
  cursor.gap(4);
  for (const para of (section.body ?? "").split("\n").filter((p) => p.trim())) {
    cursor.paragraph(para.trim(), BODY_SIZE);
  }
  if (section.body) cursor.gap(6);
  for (const bullet of section.bullets ?? []) {
    cursor.bullet(bullet);
    cursor.gap(2);
  }
  if (section.bullets?.length) cursor.gap(4);
}

function stampFooters(doc: PDFDocument, font: PDFFont, versionId: string, generatedAt: string): void {
  const pages = doc.getPages();
  const disclaimer = wrapText(sanitizeForPdf(disclaimerLines.join(" ")), CONTENT_WIDTH, 7, font);
  pages.forEach((page, i) => {
    const top = MARGIN + 36;
    page.drawText(sanitizeForPdf(`Model version ${versionId} - Generated ${generatedAt}`), {
      x: MARGIN,
      y: top,
      size: 8,
      font,
      color: MUTED,
    });
    const pageLabel = `Page ${i + 1} of ${pages.length}`;
    page.drawText(pageLabel, {
      x: PAGE_SIZE[0] - MARGIN - font.widthOfTextAtSize(pageLabel, 8),
      y: top,
      size: 8,
      font,
      color: MUTED,
    });
    disclaimer.forEach((l, j) => {
      page.drawText(l, { x: MARGIN, y: top - 14 - j * lineHeight(7), size: 7, font, color: MUTED });
    });
  });
}

export type BuildModelCardPdfParams = {
  snapshot: ModelSnapshot;
  generatedAt: string;
};

export async function buildModelCardPdf(params: BuildModelCardPdfParams): Promise<Uint8Array> {
  const { snapshot, generatedAt } = params;
  const versionId = snapshot.version.version_id;

  const doc = await PDFDocument.create();
  doc.setTitle(modelCardTitle(versionId));
  const font = await doc.embedFont(StandardFonts.Helvetica);
  const bold = await doc.embedFont(StandardFonts.HelveticaBold);

  const cursor = new PageCursor(doc, font);
  cursor.line(sanitizeForPdf(modelCardTitle(versionId)), TITLE_SIZE, { font: bold, color: BLACK });
  cursor.line(sanitizeForPdf(`Status ${snapshot.version.status} - Generated ${generatedAt}`), BODY_SIZE, { color: MUTED });
  cursor.gap(14);

  for (const section of buildModelCardSections(snapshot)) writeSection(cursor, section, bold);

  stampFooters(doc, font, versionId, generatedAt);
  return doc.save();
}
