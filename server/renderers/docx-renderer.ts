import {
  Document, Packer, Paragraph, TextRun, Table, TableRow, TableCell,
  WidthType, AlignmentType, BorderStyle, TableLayoutType, PageBreak,
} from 'docx';
import type { TextAlign, TextStyle } from './letter-template.js';
import type { ResolvedBlock, ResolvedLetter } from './letter-resolver.js';

const TWIPS_PER_CM = 567;
const C = {
  text: '000000',
  muted: 'A0A0A0',
  headerBg: 'F2F2F2',
};

const NO_BORDER = { style: BorderStyle.NONE, size: 0, color: 'FFFFFF' };
const NO_BORDERS = {
  top: NO_BORDER,
  bottom: NO_BORDER,
  left: NO_BORDER,
  right: NO_BORDER,
  insideHorizontal: NO_BORDER,
  insideVertical: NO_BORDER,
};
const GRID_BORDER = { style: BorderStyle.SINGLE, size: 4, color: C.text };
const GRID_BORDERS = {
  top: GRID_BORDER,
  bottom: GRID_BORDER,
  left: GRID_BORDER,
  right: GRID_BORDER,
  insideHorizontal: GRID_BORDER,
  insideVertical: GRID_BORDER,
};

type Block = Paragraph | Table;

interface RunOptions {
  font: string;
  size: number;
  bold?: boolean;
  italics?: boolean;
  color?: string;
}

function alignment(align: TextAlign | undefined) {
  switch (align) {
    case 'center': return AlignmentType.CENTER;
    case 'right': return AlignmentType.RIGHT;
    case 'justify': return AlignmentType.JUSTIFIED;
    default: return AlignmentType.LEFT;
  }
}

/**
 * One run per line; "\n" in template text becomes a line break.
 */
function textRuns(text: string, options: RunOptions): TextRun[] {
  return text.split('\n').map((line, i) => new TextRun({
    text: line,
    break: i > 0 ? 1 : undefined,
    font: options.font,
    size: options.size * 2,
    bold: options.bold,
    italics: options.italics,
    color: options.color ?? C.text,
  }));
}

function paragraph(text: string, font: string, size: number, style: TextStyle = {}): Paragraph {
  return new Paragraph({
    children: textRuns(text, {
      font,
      size: style.size ?? size,
      bold: style.bold,
      italics: style.italic,
      color: style.color,
    }),
    alignment: alignment(style.align),
    spacing: { before: 0, after: 0, line: 240 },
  });
}

function cell(content: Paragraph, widthCm?: number, shading?: string): TableCell {
  return new TableCell({
    children: [content],
    width: widthCm ? { size: Math.round(widthCm * TWIPS_PER_CM), type: WidthType.DXA } : undefined,
    shading: shading ? { fill: shading } : undefined,
  });
}

function fixedTable(rows: TableRow[], widthsCm: Array<number | undefined>, borders: typeof NO_BORDERS | typeof GRID_BORDERS): Table {
  const columnWidths = widthsCm.every((w): w is number => w !== undefined)
    ? widthsCm.map(w => Math.round(w * TWIPS_PER_CM))
    : undefined;

  return new Table({
    rows,
    columnWidths,
    layout: columnWidths ? TableLayoutType.FIXED : TableLayoutType.AUTOFIT,
    width: columnWidths ? undefined : { size: 100, type: WidthType.PERCENTAGE },
    borders,
  });
}

function renderBlock(block: ResolvedBlock, font: string, size: number): Block[] {
  switch (block.type) {
    case 'heading':
      return [paragraph(block.text, font, size, { bold: true, align: 'center', size: size + 1, ...block.style })];

    case 'paragraph':
      return [paragraph(block.text, font, size, block.style)];

    case 'fields': {
      const widths = [block.labelWidth ?? 4.2, block.valueWidth ?? 9.0];
      const rows = block.rows.map(row => new TableRow({
        children: [
          cell(paragraph(row.label, font, size), widths[0]),
          cell(paragraph(`: ${row.value}`, font, size), widths[1]),
        ],
      }));
      return [fixedTable(rows, widths, NO_BORDERS)];
    }

    case 'numbered': {
      const widths = [0.7, 14.5];
      const rows = block.items.map((item, i) => new TableRow({
        children: [
          cell(paragraph(String(i + 1), font, size, { align: 'center' }), widths[0]),
          cell(paragraph(item, font, size, { align: 'justify' }), widths[1]),
        ],
      }));
      return [fixedTable(rows, widths, NO_BORDERS)];
    }

    case 'proposals': {
      const tableSize = block.fontSize ?? size - 1;
      const header = new TableRow({
        tableHeader: true,
        children: block.headers.map((text, i) =>
          cell(paragraph(text, font, tableSize, { bold: true }), block.widths[i], C.headerBg)
        ),
      });
      const rows = block.rows.map(values => new TableRow({
        children: values.map((text, i) => cell(paragraph(text, font, tableSize), block.widths[i])),
      }));
      return [fixedTable([header, ...rows], block.widths, GRID_BORDERS)];
    }

    case 'signature': {
      const out: Block[] = [];
      if (block.note) {
        out.push(paragraph(block.note, font, size, { align: 'right', color: C.muted }));
        out.push(paragraph('', font, size));
      }
      out.push(paragraph(block.lines.join('\n'), font, size, { align: 'right' }));
      return out;
    }

    case 'page_break':
      return [new Paragraph({ children: [new PageBreak()] })];

    case 'spacer':
      return [paragraph('', font, size)];
  }
}

/**
 * Lay a resolved letter out as a .docx file and return its bytes.
 */
export async function renderLetterDocx(letter: ResolvedLetter): Promise<Buffer> {
  const children = letter.blocks.flatMap(block => renderBlock(block, letter.font, letter.fontSize));

  const doc = new Document({
    creator: 'compliance-letters',
    title: letter.title,
    styles: {
      default: {
        document: {
          run: { font: letter.font, size: letter.fontSize * 2 },
        },
      },
    },
    sections: [{ properties: {}, children }],
  });

  return Packer.toBuffer(doc);
}
