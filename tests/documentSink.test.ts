import { mkdtemp, readdir, readFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Paragraph, Table } from 'docx';
import { describe, expect, it, vi } from 'vitest';
import { DocxSink, visibleControlChars } from '../src/documentSink.js';
import { SinkWriteError } from '../src/errors.js';
import { EmissionCommand } from '../src/types.js';

const row = (text: string): EmissionCommand => ({
  kind: 'tableRow',
  text,
  colorRole: 'added',
  color: 'D0FFD0',
  symbol: '+'
});

const commands: EmissionCommand[] = [
  { kind: 'heading', text: 'Report', level: 1 },
  {
    kind: 'legend',
    entries: [{ label: 'Added line', colorRole: 'added', color: 'D0FFD0', symbol: '+' }]
  },
  { kind: 'heading', text: 'File: a.ts (modified)', level: 9 },
  row('+one'),
  row('+two'),
  { kind: 'pageBreak' },
  { kind: 'heading', text: 'File: logo.png (added)', level: 2 },
  { kind: 'image', path: 'logo.png', source: 'new' },
  { kind: 'noChanges', text: 'nothing' }
];

const sink = (loadImage = vi.fn(() => undefined)) =>
  new DocxSink({
    font: 'Courier New',
    fontSize: 8,
    loadImage,
    imageUnavailable: (file) => `missing ${file}`
  });

describe('DocxSink', () => {
  it('groups consecutive rows into one table', () => {
    const out = sink().render(commands);

    expect(out).toHaveLength(8);
    expect(out.map((block) => (block instanceof Table ? 'table' : 'paragraph'))).toEqual([
      'paragraph',
      'table',
      'paragraph',
      'table',
      'paragraph',
      'paragraph',
      'paragraph',
      'paragraph'
    ]);
    expect(out[7]).toBeInstanceOf(Paragraph);
  });

  it('renders highlighted rows next to their line numbers', () => {
    const [table] = sink().render([
      {
        kind: 'tableRow',
        text: '+const x\u001b',
        colorRole: 'added',
        color: 'D0FFD0',
        symbol: '+',
        lineNumbers: { old: null, new: 4 },
        spans: [{ text: 'const', color: '008000', bold: true }, { text: ' x\u001b' }]
      }
    ]);
    expect(table).toBeInstanceOf(Table);
  });

  it('asks for image bytes from the right side of the diff', () => {
    const loadImage = vi.fn(() => undefined);
    sink(loadImage).render([{ kind: 'image', path: 'old.png', source: 'old' }]);
    expect(loadImage).toHaveBeenCalledWith('old.png', 'old');
  });

  it('writes a docx package and leaves no temporary file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'gdd-sink-'));
    const output = join(dir, 'report.docx');

    await sink().write(commands, output);

    const data = await readFile(output);
    expect(data.subarray(0, 2).toString('latin1')).toBe('PK');
    expect(await readdir(dir)).toEqual(['report.docx']);
  });

  it('reports unwritable targets', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'gdd-sink-'));
    const output = join(dir, 'missing', 'report.docx');

    await expect(sink().write(commands, output)).rejects.toBeInstanceOf(SinkWriteError);
    expect(await readdir(dir)).toEqual([]);
  });
});

describe('visibleControlChars', () => {
  it('replaces characters XML cannot carry with control pictures', () => {
    expect(visibleControlChars('a\u001b[0mb\u000c\u0000')).toBe('a\u241b[0mb\u240c\u2400');
  });

  it('keeps tabs and ordinary text', () => {
    expect(visibleControlChars('\tx = "ü";')).toBe('\tx = "ü";');
  });
});
