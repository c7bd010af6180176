import { mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { resolveConfig } from '../src/config.js';
import { DocumentSink } from '../src/documentSink.js';
import { SinkWriteError } from '../src/errors.js';
import { DiffSource, EMPTY_TREE } from '../src/git.js';
import { loadMessages } from '../src/localization.js';
import { ReportEngine, ReportEngineOptions } from '../src/reportEngine.js';
import { ChangedFile, EmissionCommand } from '../src/types.js';

class FakeSource implements DiffSource {
  ranges: Array<[string, string]> = [];

  constructor(
    private changes: ChangedFile[],
    private diffs: Record<string, string> = {}
  ) {}

  rootCommit(): string {
    return 'root123';
  }

  headCommit(): string {
    return 'head456';
  }

  listChanges(from: string, to: string): ChangedFile[] {
    this.ranges.push([from, to]);
    return this.changes;
  }

  fileDiff(_from: string, _to: string, change: ChangedFile): string {
    return this.diffs[change.path] ?? '';
  }

  readFile(): Buffer | undefined {
    return undefined;
  }
}

class RecordingSink implements DocumentSink {
  commands: EmissionCommand[] = [];
  writes = 0;

  async write(commands: readonly EmissionCommand[]): Promise<void> {
    this.commands = [...commands];
    this.writes++;
  }
}

const messages = loadMessages('en');

const headings = (commands: EmissionCommand[]) =>
  commands.flatMap((c) => (c.kind === 'heading' ? [c.text] : []));

describe('ReportEngine', () => {
  let repoDir: string;
  let outputPath: string;
  let sink: RecordingSink;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    repoDir = await mkdtemp(join(tmpdir(), 'gdd-engine-'));
    outputPath = join(repoDir, 'report.docx');
    sink = new RecordingSink();
  });

  const engine = (
    source: DiffSource,
    overrides: Record<string, unknown> = {},
    extra: Partial<ReportEngineOptions> = {}
  ) =>
    new ReportEngine({
      repoDir,
      outputPath,
      config: resolveConfig({ language: 'en', legend_position: 'none', ...overrides }),
      messages,
      source,
      sink,
      now: () => new Date(2024, 0, 1, 12, 0, 0),
      ...extra
    });

  it('filters ignored files and renders the rest', async () => {
    await writeFile(join(repoDir, '.gddignore'), 'dist/\n', 'utf8');
    const source = new FakeSource(
      [
        { path: 'src/a.ts', status: 'modified' },
        { path: 'dist/bundle.js', status: 'added' }
      ],
      { 'src/a.ts': '@@ -1 +1 @@\n-old\n+new\n' }
    );

    const outcome = await engine(source).run('abc', 'def');

    expect(outcome).toEqual({ status: 'written', outputPath, fileCount: 1 });
    expect(headings(sink.commands)).toEqual(['Git changes report (abc → def)', 'Diffs', 'File: src/a.ts (modified)']);
    expect(sink.commands.filter((c) => c.kind === 'tableRow')).toHaveLength(2);
  });

  it('reports no changes when every file is ignored', async () => {
    await writeFile(join(repoDir, '.gddignore'), '*.lock\n', 'utf8');
    const source = new FakeSource([{ path: 'package.lock', status: 'modified' }]);

    const outcome = await engine(source).run('abc', 'def');

    expect(outcome).toEqual({ status: 'noChanges', outputPath, fileCount: 0 });
    expect(sink.commands.map((c) => c.kind)).toEqual(['heading', 'paragraph', 'heading', 'noChanges']);
    expect(sink.writes).toBe(1);
  });

  it('keeps going after a malformed hunk', async () => {
    const source = new FakeSource(
      [
        { path: 'bad.ts', status: 'modified' },
        { path: 'good.ts', status: 'modified' }
      ],
      { 'bad.ts': '@@ bogus @@\n', 'good.ts': '@@ -1 +1 @@\n+fine\n' }
    );

    await engine(source, { insert_page_breaks: false }).run('abc', 'def');

    const rows = sink.commands.flatMap((c) => (c.kind === 'tableRow' ? [c.text] : []));
    expect(rows).toEqual([' The diff of bad.ts could not be parsed: @@ bogus @@', '+fine']);
  });

  it('falls back to the listed status when the diff has no header', async () => {
    const source = new FakeSource([{ path: 'new.ts', status: 'added' }], { 'new.ts': '@@ -0,0 +1 @@\n+x\n' });

    await engine(source).run('abc', 'def');

    expect(headings(sink.commands)[2]).toBe('File: new.ts (added)');
  });

  it('names renamed files by the paths git listed', async () => {
    const source = new FakeSource([{ path: 'docs/new name.md', oldPath: 'docs/old name.md', status: 'renamed' }]);

    await engine(source).run('abc', 'def');

    expect(headings(sink.commands)[2]).toBe('File: docs/old name.md → docs/new name.md (renamed)');
  });

  it('defaults the range to the first commit and HEAD', async () => {
    const source = new FakeSource([]);

    await engine(source).run();

    expect(source.ranges).toEqual([['root123', 'head456']]);
    expect(headings(sink.commands)[0]).toBe('Git changes report (root123 → head456)');
  });

  it('diffs against the empty tree to include the first commit', async () => {
    const source = new FakeSource([]);

    await engine(source, { include_first_commit: true }).run(undefined, 'def');

    expect(source.ranges).toEqual([[EMPTY_TREE, 'def']]);
  });

  it('refuses to overwrite without confirmation', async () => {
    await writeFile(outputPath, 'existing', 'utf8');
    const confirmOverwrite = vi.fn(async () => false);

    await expect(engine(new FakeSource([]), {}, { confirmOverwrite }).run('abc', 'def')).rejects.toBeInstanceOf(
      SinkWriteError
    );
    expect(confirmOverwrite).toHaveBeenCalledWith(outputPath);
    expect(sink.writes).toBe(0);
  });

  it('overwrites once confirmed', async () => {
    await writeFile(outputPath, 'existing', 'utf8');

    const outcome = await engine(new FakeSource([]), {}, { confirmOverwrite: async () => true }).run('abc', 'def');

    expect(outcome.status).toBe('noChanges');
    expect(sink.writes).toBe(1);
  });

  it('opens the report when configured and survives a failure to do so', async () => {
    const openDocument = vi.fn(async () => {
      throw new Error('no viewer');
    });

    const outcome = await engine(new FakeSource([]), { open_after_creation: true }, { openDocument }).run('a', 'b');

    expect(openDocument).toHaveBeenCalledWith(outputPath);
    expect(outcome.status).toBe('noChanges');
  });
});
