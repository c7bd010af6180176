import { rename, rm, writeFile } from 'fs/promises';
import {
  Document,
  HeadingLevel,
  ImageRun,
  Packer,
  PageBreak,
  Paragraph,
  ShadingType,
  Table,
  TableCell,
  TableRow,
  TextRun,
  WidthType
} from 'docx';
import { imageSize } from 'image-size';
import { SinkWriteError } from './errors.js';
import { EmissionCommand, LegendEntry, StyledSpan, TableRowCommand } from './types.js';

export interface DocumentSink {
  write(commands: readonly EmissionCommand[], outputPath: string): Promise<void>;
}

export interface DocxSinkOptions {
  font: string;
  /** Points */
  fontSize: number;
  loadImage: (filePath: string, source: 'old' | 'new') => Buffer | undefined;
  imageUnavailable: (filePath: string) => string;
  maxImageWidth?: number;
}

const HEADINGS = [
  HeadingLevel.HEADING_1,
  HeadingLevel.HEADING_2,
  HeadingLevel.HEADING_3,
  HeadingLevel.HEADING_4,
  HeadingLevel.HEADING_5,
  HeadingLevel.HEADING_6
] as const;

// Word only ships six heading styles
const headingLevel = (level: number) => HEADINGS[Math.min(Math.max(level, 1), HEADINGS.length) - 1];

/**
 * C0 control characters other than tab, newline and carriage return cannot
 * appear in WordprocessingML; they are swapped for their Unicode control pictures.
 */
export const visibleControlChars = (text: string) =>
  text.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F]/g, (c) => String.fromCharCode(0x2400 + c.charCodeAt(0)));

const shade = (fill: string) => ({ fill, type: ShadingType.CLEAR, color: 'auto' });

export class DocxSink implements DocumentSink {
  constructor(private options: DocxSinkOptions) {}

  async write(commands: readonly EmissionCommand[], outputPath: string): Promise<void> {
    const tmp = `${outputPath}.${process.pid}.tmp`;
    try {
      const doc = new Document({ sections: [{ children: this.render(commands) }] });
      await writeFile(tmp, await Packer.toBuffer(doc));
      await rename(tmp, outputPath);
    } catch (e) {
      await rm(tmp, { force: true });
      throw new SinkWriteError(outputPath, (e as Error).message);
    }
  }

  render(commands: readonly EmissionCommand[]): Array<Paragraph | Table> {
    const out: Array<Paragraph | Table> = [];
    let rows: TableRowCommand[] = [];
    const flush = () => {
      if (rows.length) out.push(this.rowTable(rows));
      rows = [];
    };

    for (const command of commands) {
      if (command.kind === 'tableRow') {
        rows.push(command);
        continue;
      }
      flush();
      switch (command.kind) {
        case 'heading':
          out.push(new Paragraph({ text: command.text, heading: headingLevel(command.level) }));
          break;
        case 'paragraph':
          out.push(new Paragraph({ children: [new TextRun({ text: command.text, italics: command.italic })] }));
          break;
        case 'noChanges':
          out.push(new Paragraph({ children: [new TextRun({ text: command.text, italics: true })] }));
          break;
        case 'legend':
          out.push(this.legendTable(command.entries));
          break;
        case 'pageBreak':
          out.push(new Paragraph({ children: [new PageBreak()] }));
          break;
        case 'image':
          out.push(this.image(command.path, command.source));
          break;
        default: {
          const unhandled: never = command;
          throw new Error(`Unhandled emission command: ${JSON.stringify(unhandled)}`);
        }
      }
    }
    flush();
    return out;
  }

  private code(text: string | StyledSpan[]): Paragraph {
    const spans: StyledSpan[] = typeof text === 'string' ? [{ text }] : text;
    return new Paragraph({
      spacing: { before: 0, after: 0 },
      children: spans.map(
        (span) =>
          new TextRun({
            text: visibleControlChars(span.text),
            font: this.options.font,
            size: this.options.fontSize * 2,
            color: span.color,
            bold: span.bold,
            italics: span.italic
          })
      )
    });
  }

  private rowTable(rows: TableRowCommand[]): Table {
    return new Table({
      width: { size: 100, type: WidthType.PERCENTAGE },
      rows: rows.map((row) => {
        const cells: TableCell[] = [];
        if (row.lineNumbers) {
          cells.push(
            new TableCell({ children: [this.code(String(row.lineNumbers.old ?? ''))] }),
            new TableCell({ children: [this.code(String(row.lineNumbers.new ?? ''))] })
          );
        }
        const content = row.spans ? this.code([{ text: row.symbol }, ...row.spans]) : this.code(row.text);
        cells.push(new TableCell({ shading: shade(row.color), children: [content] }));
        return new TableRow({ children: cells });
      })
    });
  }

  private legendTable(entries: LegendEntry[]): Table {
    return new Table({
      width: { size: 100, type: WidthType.PERCENTAGE },
      rows: entries.map(
        (entry) =>
          new TableRow({
            children: [
              new TableCell({ children: [new Paragraph(entry.label)] }),
              new TableCell({ shading: shade(entry.color), children: [this.code(entry.symbol)] })
            ]
          })
      )
    });
  }

  private image(filePath: string, source: 'old' | 'new'): Paragraph {
    const data = this.options.loadImage(filePath, source);
    const size = data && measure(data);
    if (!data || !size) {
      return new Paragraph({
        children: [new TextRun({ text: this.options.imageUnavailable(filePath), italics: true })]
      });
    }
    const scale = Math.min(1, (this.options.maxImageWidth ?? 500) / size.width);
    return new Paragraph({
      children: [
        new ImageRun({
          data,
          transformation: { width: Math.round(size.width * scale), height: Math.round(size.height * scale) }
        })
      ]
    });
  }
}

/** Pixel dimensions, or undefined for formats Word cannot embed. */
function measure(data: Buffer): { width: number; height: number } | undefined {
  try {
    const { width, height } = imageSize(data);
    return width && height ? { width, height } : undefined;
  } catch {
    return undefined;
  }
}
