export type LineKind = 'added' | 'removed' | 'neutral';

export type ColorRole = LineKind;

export type FileStatus = 'added' | 'removed' | 'modified' | 'renamed';

export interface DiffLine {
  kind: LineKind;
  oldLine: number | null;
  newLine: number | null;
  text: string;
}

export interface FileChangeSet {
  path: string;
  /** Set for renames */
  oldPath?: string;
  status: FileStatus;
  binary: boolean;
  lines: DiffLine[];
  error?: Error;
}

export interface ChangedFile {
  path: string;
  oldPath?: string;
  status: FileStatus;
}

export interface LegendEntry {
  label: string;
  colorRole: ColorRole;
  color: string;
  symbol: string;
}

/** A run of row text with its token styling; unset fields take the row's defaults. */
export interface StyledSpan {
  text: string;
  color?: string;
  bold?: boolean;
  italic?: boolean;
}

export interface TableRowCommand {
  kind: 'tableRow';
  /** Line content prefixed by the marker symbol */
  text: string;
  colorRole: ColorRole;
  color: string;
  symbol: string;
  lineNumbers?: { old: number | null; new: number | null };
  /** Syntax-highlighted runs of the line content, without the symbol */
  spans?: StyledSpan[];
}

export type EmissionCommand =
  | { kind: 'heading'; text: string; level: number }
  | { kind: 'paragraph'; text: string; italic: boolean }
  | { kind: 'legend'; entries: LegendEntry[] }
  | TableRowCommand
  | { kind: 'pageBreak' }
  | { kind: 'image'; path: string; source: 'old' | 'new' }
  | { kind: 'noChanges'; text: string };

export type RunOutcome =
  | { status: 'written'; outputPath: string; fileCount: number }
  | { status: 'noChanges'; outputPath: string; fileCount: 0 };
