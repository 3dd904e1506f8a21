import PDFDocument from 'pdfkit';
import { writeFile } from 'fs/promises';
import { createLogger } from '@exclusion/config';
import { buildReportModel, type NoticeTone, type PdfReportInput, type ReportModel } from './report-model.js';

const logger = createLogger('reports');

const MARGIN = 36;
const CELL_PAD_X = 4;
const CELL_PAD_Y = 3;
const PAGE_NUMBER_OFFSET = 25;

const COLORS = {
  headerFill: '#224B7A',
  grid: '#B0BEC5',
  footer: '#808080',
  text: '#000000',
};

const NOTICE_COLORS: Record<NoticeTone, string> = {
  clear: '#2E7D32',
  alert: '#C62828',
  review: '#EF6C00',
};

export interface RenderedPdf {
  data: Buffer;
  pageCount: number;
}

function rowHeight(doc: PDFKit.PDFDocument, cells: string[], widths: number[]): number {
  let height = 0;
  cells.forEach((cell, i) => {
    height = Math.max(height, doc.heightOfString(cell || ' ', { width: widths[i] - CELL_PAD_X * 2 }));
  });
  return height + CELL_PAD_Y * 2;
}

function drawRow(doc: PDFKit.PDFDocument, cells: string[], widths: number[], header: boolean): void {
  const height = rowHeight(doc, cells, widths);
  const top = doc.y;
  let x = MARGIN;

  if (header) {
    doc.rect(MARGIN, top, widths.reduce((a, b) => a + b, 0), height).fill(COLORS.headerFill);
  }

  cells.forEach((cell, i) => {
    doc.lineWidth(0.25).rect(x, top, widths[i], height).stroke(COLORS.grid);
    doc
      .fillColor(header ? '#FFFFFF' : COLORS.text)
      .text(cell, x + CELL_PAD_X, top + CELL_PAD_Y, { width: widths[i] - CELL_PAD_X * 2 });
    x += widths[i];
  });

  doc.x = MARGIN;
  doc.y = top + height;
}

function drawTable(doc: PDFKit.PDFDocument, model: ReportModel): void {
  const contentWidth = doc.page.width - MARGIN * 2;
  const widths = model.columns.map((column) => column.fraction * contentWidth);
  const headers = model.columns.map((column) => column.header);
  const bottom = () => doc.page.height - doc.page.margins.bottom;

  doc.fontSize(8).font('Helvetica-Bold');
  drawRow(doc, headers, widths, true);

  for (const row of model.rows) {
    doc.fontSize(8).font('Helvetica');
    if (doc.y + rowHeight(doc, row, widths) > bottom()) {
      doc.addPage();
      doc.fontSize(8).font('Helvetica-Bold');
      drawRow(doc, headers, widths, true);
      doc.fontSize(8).font('Helvetica');
    }
    drawRow(doc, row, widths, false);
  }
}

function drawPageNumbers(doc: PDFKit.PDFDocument): number {
  const range = doc.bufferedPageRange();
  for (let i = range.start; i < range.start + range.count; i++) {
    doc.switchToPage(i);
    // writing inside the bottom margin would otherwise start a new page
    const bottomMargin = doc.page.margins.bottom;
    doc.page.margins.bottom = 0;
    doc
      .fontSize(8)
      .font('Helvetica')
      .fillColor(COLORS.footer)
      .text(`-- ${i + 1} of ${range.count} --`, 0, doc.page.height - PAGE_NUMBER_OFFSET - 8, {
        width: doc.page.width,
        align: 'center',
        lineBreak: false,
      });
    doc.page.margins.bottom = bottomMargin;
  }
  return range.count;
}

/**
 * Render a screening report: heading, summary, notice, screened table,
 * data-source footer and "-- n of N --" page numbers
 */
export function renderPdfReport(model: ReportModel): Promise<RenderedPdf> {
  return new Promise((resolve, reject) => {
    try {
      const chunks: Buffer[] = [];
      const doc = new PDFDocument({
        size: 'LETTER',
        layout: 'landscape',
        margins: { top: MARGIN + 4, bottom: MARGIN + 4, left: MARGIN, right: MARGIN },
        bufferPages: true,
        info: {
          Title: `${model.title} - ${model.clientName} - ${model.month}`,
          Subject: 'Exclusion screening',
          CreationDate: new Date(),
        },
      });

      let pageCount = 0;
      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve({ data: Buffer.concat(chunks), pageCount }));
      doc.on('error', reject);

      doc.fillColor(COLORS.text).font('Helvetica-Bold').fontSize(14).text(model.clientName, { align: 'center' });
      doc.fontSize(12).text(model.title, { align: 'center' });
      doc.font('Helvetica').fontSize(10).text(model.month, { align: 'center' });
      doc.moveDown(1);

      doc.font('Helvetica-Bold').fontSize(10).text('Screening Summary', { align: 'left' });
      doc.font('Helvetica').fontSize(9);
      for (const line of model.summary) {
        doc.text(line);
      }
      doc.moveDown(0.6);

      doc.font('Helvetica-Bold').fontSize(10).fillColor(NOTICE_COLORS[model.notice.tone]).text(model.notice.title);
      doc.font('Helvetica').fontSize(9).fillColor(COLORS.text).text(model.notice.text);
      doc.moveDown(0.6);

      doc.font('Helvetica-Bold').fontSize(10).text(model.tableTitle);
      doc.moveDown(0.3);
      drawTable(doc, model);

      doc.moveDown(1);
      doc.font('Helvetica').fontSize(8).fillColor(COLORS.footer).text(model.footer, MARGIN, doc.y, {
        width: doc.page.width - MARGIN * 2,
      });

      pageCount = drawPageNumbers(doc);
      doc.end();
    } catch (error) {
      reject(error);
    }
  });
}

export async function writePdfReport(path: string, input: PdfReportInput): Promise<RenderedPdf> {
  const rendered = await renderPdfReport(buildReportModel(input));
  await writeFile(path, rendered.data);
  logger.info({ event: 'report.pdf.written', kind: input.kind, path, pages: rendered.pageCount }, 'PDF report written');
  return rendered;
}
