#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import path from 'path';
import { fileURLToPath } from 'url';
import { loadConfig } from './config.js';
import { isGitRepository } from './git.js';
import { loadMessages, translate } from './localization.js';
import { askYesNo } from './prompt.js';
import { ReportEngine } from './reportEngine.js';

const DEFAULT_CONFIG = fileURLToPath(new URL('../config.json', import.meta.url));

const cli = new Command();

cli
  .name('gdd')
  .description('Render the changes between two commits as a Word document')
  .argument('[from]', 'Start commit (defaults to the first commit)')
  .argument('[to]', 'End commit (defaults to HEAD)')
  .option('-d, --dir <path>', 'Repository directory', process.cwd())
  .option('-o, --output <file>', 'Output .docx file', 'output.docx')
  .option('-c, --config <file>', 'Configuration file (JSON or YAML)', DEFAULT_CONFIG)
  .option('-l, --language <code>', 'Override the configured language')
  .option('-y, --yes', 'Overwrite an existing output file without asking', false)
  .parse(process.argv);

const opts = cli.opts<{
  dir: string;
  output: string;
  config: string;
  language?: string;
  yes: boolean;
}>();

const [from, to] = cli.args;

(async () => {
  try {
    const config = loadConfig(path.resolve(opts.config), { language: opts.language });
    const messages = loadMessages(config.language);
    const repoDir = path.resolve(opts.dir);

    if (!isGitRepository(repoDir)) {
      console.log(chalk.yellow(translate(messages, 'no_git_repo_found', { dir: repoDir })));
    }

    await new ReportEngine({
      repoDir,
      outputPath: path.resolve(opts.output),
      config,
      messages,
      confirmOverwrite: async (output) => {
        if (opts.yes) return true;
        if (!process.stdin.isTTY) return false;
        const yes = translate(messages, 'yes');
        const no = translate(messages, 'no');
        return askYesNo(translate(messages, 'output_exists', { output, yes, no }), yes, no);
      }
    }).run(from, to);
  } catch (e) {
    console.error(chalk.red((e as Error).message));
    process.exit(2);
  }
})();
