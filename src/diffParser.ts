import { MalformedHunkError } from './errors.js';
import { DiffLine, FileChangeSet } from './types.js';

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

export interface ParseOptions {
  /** Keep context lines. Defaults to true. */
  includeUnchangedLines?: boolean;
  /** Text of the placeholder row shown when a file cannot be parsed. */
  describeFailure?: (error: MalformedHunkError) => string;
}

interface Hunk {
  oldLine: number;
  newLine: number;
  oldRemaining: number;
  newRemaining: number;
}

function parseHunkHeader(line: string, filePath: string): Hunk {
  const m = HUNK_HEADER.exec(line);
  if (!m) throw new MalformedHunkError(filePath, line);
  const [, a, b, c, d] = m;
  return {
    oldLine: +a,
    newLine: +c,
    oldRemaining: b === undefined ? 1 : +b,
    newRemaining: d === undefined ? 1 : +d
  };
}

export class DiffLineParser {
  constructor(private options: ParseOptions = {}) {}

  parse(rawDiffText: string, filePath: string): FileChangeSet {
    const result: FileChangeSet = { path: filePath, status: 'modified', binary: false, lines: [] };
    try {
      this.walk(rawDiffText, result);
    } catch (e) {
      if (!(e instanceof MalformedHunkError)) throw e;
      const text = this.options.describeFailure?.(e) ?? e.message;
      result.lines = [{ kind: 'neutral', oldLine: null, newLine: null, text }];
      result.error = e;
    }
    return result;
  }

  private walk(raw: string, out: FileChangeSet): void {
    const keepContext = this.options.includeUnchangedLines ?? true;
    let hunk: Hunk | undefined;

    for (const line of raw.split(/\r?\n/)) {
      if (line.startsWith('@@')) {
        hunk = parseHunkHeader(line, out.path);
        continue;
      }

      if (!hunk || (hunk.oldRemaining <= 0 && hunk.newRemaining <= 0)) {
        // file header
        if (line.startsWith('new file mode')) out.status = 'added';
        else if (line.startsWith('deleted file mode')) out.status = 'removed';
        else if (line.startsWith('rename from ')) {
          out.status = 'renamed';
          out.oldPath = line.slice('rename from '.length);
        } else if (line.startsWith('Binary files ') || line === 'GIT binary patch') {
          out.binary = true;
        }
        continue;
      }

      const text = line.slice(1);
      switch (line[0]) {
        case '+':
          out.lines.push({ kind: 'added', oldLine: null, newLine: hunk.newLine++, text });
          hunk.newRemaining--;
          break;
        case '-':
          out.lines.push({ kind: 'removed', oldLine: hunk.oldLine++, newLine: null, text });
          hunk.oldRemaining--;
          break;
        case ' ': {
          const entry: DiffLine = { kind: 'neutral', oldLine: hunk.oldLine++, newLine: hunk.newLine++, text };
          if (keepContext) out.lines.push(entry);
          hunk.oldRemaining--;
          hunk.newRemaining--;
          break;
        }
        default:
          // "\ No newline at end of file" and anything else unclassifiable
          break;
      }
    }
  }
}
