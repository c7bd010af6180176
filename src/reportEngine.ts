import fs from 'fs';
import chalk from 'chalk';
import open from 'open';
import { Configuration } from './config.js';
import { DiffLineParser } from './diffParser.js';
import { DocumentSink, DocxSink } from './documentSink.js';
import { SinkWriteError } from './errors.js';
import { DiffSource, EMPTY_TREE, GitDiffSource } from './git.js';
import { compileIgnoreRules, isIgnored, loadIgnoreFile } from './ignoreMatcher.js';
import { MessageParams, Messages, translate } from './localization.js';
import { ReportComposer } from './reportComposer.js';
import { FileChangeSet, RunOutcome } from './types.js';

export interface ReportEngineOptions {
  repoDir: string;
  outputPath: string;
  config: Configuration;
  messages: Messages;
  source?: DiffSource;
  /** Built per run from the resolved range when omitted. */
  sink?: DocumentSink;
  confirmOverwrite?: (outputPath: string) => Promise<boolean>;
  openDocument?: (outputPath: string) => Promise<unknown>;
  now?: () => Date;
}

interface Range {
  from: string;
  to: string;
}

export class ReportEngine {
  private source: DiffSource;
  private config: Configuration;

  constructor(private options: ReportEngineOptions) {
    this.config = options.config;
    this.source = options.source ?? new GitDiffSource(options.repoDir, options.config.file_encoding);
    console.log(chalk.green.bold(`\n${this.t('title')}`));
  }

  async run(from?: string, to?: string): Promise<RunOutcome> {
    const range = this.resolveRange(from, to);
    const { repoDir, outputPath } = this.options;

    console.log(chalk.cyan(`\n${this.t('collecting_changes', { ...range })}`));
    const changes = this.source.listChanges(range.from, range.to);
    console.log(chalk.gray(this.t('found_files', { count: changes.length })));

    const rules = compileIgnoreRules(loadIgnoreFile(repoDir, this.config.ignore_file));
    this.verbose(this.t('loaded_ignore_rules', { count: rules.length, file: this.config.ignore_file }));

    const parser = new DiffLineParser({
      includeUnchangedLines: this.config.include_unchanged_lines,
      describeFailure: (e) => this.t('malformed_hunk', { file: e.filePath, error: e.header })
    });

    const files: FileChangeSet[] = [];
    for (const change of changes) {
      if (isIgnored(rules, change.path)) {
        this.verbose(this.t('ignored_file', { file: change.path }));
        continue;
      }
      this.verbose(this.t('processing_file', { file: change.path }));
      const parsed = parser.parse(this.source.fileDiff(range.from, range.to, change), change.path);
      if (parsed.status === 'modified') parsed.status = change.status;
      parsed.oldPath = change.oldPath ?? parsed.oldPath;
      if (parsed.error) console.log(chalk.yellow(parsed.lines[0].text));
      files.push(parsed);
      this.verbose(this.t('processing_done', { file: change.path }));
    }

    if (!files.length) {
      console.log(chalk.yellow(this.t('no_significant_changes', { ...range })));
    }

    const commands = new ReportComposer(this.config, this.options.messages).composeReport(
      { ...range, generatedAt: (this.options.now ?? (() => new Date()))() },
      files
    );

    if (fs.existsSync(outputPath)) {
      const confirm = this.options.confirmOverwrite ?? (async () => false);
      if (!(await confirm(outputPath))) {
        throw new SinkWriteError(outputPath, this.t('overwrite_declined'));
      }
    }
    await (this.options.sink ?? this.createSink(range)).write(commands, outputPath);
    console.log(chalk.green(this.t('saving_report', { output: outputPath })));

    if (this.config.open_after_creation) {
      try {
        await (this.options.openDocument ?? open)(outputPath);
      } catch (e) {
        console.log(chalk.red(this.t('error_opening_file', { output: outputPath, error: (e as Error).message })));
      }
    }

    return files.length
      ? { status: 'written', outputPath, fileCount: files.length }
      : { status: 'noChanges', outputPath, fileCount: 0 };
  }

  private resolveRange(from?: string, to?: string): Range {
    let start = from;
    if (!start && this.config.include_first_commit) {
      start = EMPTY_TREE;
      console.log(this.t('using_empty_tree'));
    } else if (!start) {
      start = this.source.rootCommit();
      console.log(this.t('using_first_commit', { commit: start }));
    }
    let end = to;
    if (!end) {
      end = this.source.headCommit();
      console.log(this.t('using_last_commit', { commit: end }));
    }
    return { from: start, to: end };
  }

  private createSink(range: Range): DocumentSink {
    return new DocxSink({
      font: this.config.diff_font,
      fontSize: this.config.diff_font_size,
      loadImage: (filePath, source) => this.source.readFile(source === 'old' ? range.from : range.to, filePath),
      imageUnavailable: (filePath) => this.t('image_unavailable', { file: filePath })
    });
  }

  private verbose(message: string) {
    if (this.config.verbose) console.log(chalk.gray(message));
  }

  private t(id: string, params?: MessageParams): string {
    return translate(this.options.messages, id, params);
  }
}
