import path from 'path';
import { Configuration } from './config.js';
import { isStyled, SyntaxHighlighter } from './highlighter.js';
import { MessageParams, Messages, translate } from './localization.js';
import { ColorRole, EmissionCommand, FileChangeSet, LegendEntry, TableRowCommand } from './types.js';

export const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.gif', '.bmp']);

export interface ReportHeader {
  from: string;
  to: string;
  generatedAt: Date;
}

const pad = (n: number) => String(n).padStart(2, '0');

export function formatTimestamp(d: Date): string {
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

export function isImageAsset(filePath: string): boolean {
  return IMAGE_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

/**
 * Turns parsed file changes into an ordered list of document commands.
 * Per file: heading, then image or rows, then an optional page break.
 * Rows of files with a known grammar also carry highlighted spans.
 */
export class ReportComposer {
  constructor(
    private config: Configuration,
    private messages: Messages,
    private highlighter = new SyntaxHighlighter(config.syntax_style)
  ) {}

  composeReport(header: ReportHeader, files: readonly FileChangeSet[]): EmissionCommand[] {
    const commands: EmissionCommand[] = [
      { kind: 'heading', text: this.t('report_title', { from: header.from, to: header.to }), level: 1 },
      {
        kind: 'paragraph',
        text: this.t('report_generated_on', { date: formatTimestamp(header.generatedAt) }),
        italic: false
      }
    ];
    const position = this.config.legend_position;
    if (position === 'before') {
      commands.push(...this.composeLegend());
      if (this.config.insert_page_breaks) commands.push({ kind: 'pageBreak' });
    }
    commands.push({ kind: 'heading', text: this.t('diffs'), level: this.config.heading_level });
    commands.push(...this.compose(files));
    if (position === 'after') commands.push(...this.composeLegend());
    return commands;
  }

  composeLegend(): EmissionCommand[] {
    const roles: Array<[ColorRole, string]> = [
      ['added', 'legend_add'],
      ['removed', 'legend_remove'],
      ['neutral', 'legend_neutral']
    ];
    const entries: LegendEntry[] = roles.map(([role, id]) => ({
      label: this.t(id),
      colorRole: role,
      color: this.colorOf(role),
      symbol: this.symbolOf(role)
    }));
    return [
      { kind: 'heading', text: this.t('legend'), level: this.config.heading_level },
      { kind: 'legend', entries }
    ];
  }

  compose(files: readonly FileChangeSet[]): EmissionCommand[] {
    if (!files.length) {
      return [{ kind: 'noChanges', text: this.t('no_changes_found') }];
    }
    const commands: EmissionCommand[] = [];
    files.forEach((file, idx) => {
      commands.push(...this.composeFile(file));
      if (this.config.insert_page_breaks && idx < files.length - 1) {
        commands.push({ kind: 'pageBreak' });
      }
    });
    return commands;
  }

  private composeFile(file: FileChangeSet): EmissionCommand[] {
    const status = this.t(`status_${file.status}`);
    const heading = file.oldPath
      ? this.t('file_heading_renamed', { old_path: file.oldPath, path: file.path, status })
      : this.t('file_heading', { path: file.path, status });
    const commands: EmissionCommand[] = [
      { kind: 'heading', text: heading, level: this.config.heading_level }
    ];

    if (this.config.include_images && isImageAsset(file.path) && !file.error) {
      commands.push({ kind: 'image', path: file.path, source: file.status === 'removed' ? 'old' : 'new' });
      return commands;
    }

    if (!file.lines.length) {
      commands.push({ kind: 'paragraph', text: this.t('no_content_changes'), italic: true });
      return commands;
    }

    // The placeholder row of an unparseable diff is not source
    const language = file.error ? undefined : this.highlighter.languageFor(file.path);
    for (const line of file.lines) {
      const symbol = this.symbolOf(line.kind);
      const row: TableRowCommand = {
        kind: 'tableRow',
        text: symbol + line.text,
        colorRole: line.kind,
        color: this.colorOf(line.kind),
        symbol
      };
      if (this.config.include_line_numbers) {
        row.lineNumbers = { old: line.oldLine, new: line.newLine };
      }
      const spans = language ? this.highlighter.highlight(line.text, language) : [];
      if (spans.some(isStyled)) row.spans = spans;
      commands.push(row);
    }
    return commands;
  }

  private colorOf(role: ColorRole): string {
    if (role === 'added') return this.config.add_color;
    if (role === 'removed') return this.config.remove_color;
    return this.config.neutral_color;
  }

  private symbolOf(role: ColorRole): string {
    if (role === 'added') return this.config.add_symbol;
    if (role === 'removed') return this.config.remove_symbol;
    return this.config.neutral_symbol;
  }

  private t(id: string, params?: MessageParams): string {
    return translate(this.messages, id, params);
  }
}
