#!/usr/bin/env node

import path from 'node:path';
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, loadEnvFiles, type SiteConfig } from './lib/config';
import { describeError } from './lib/errors';
import { formatDate } from './lib/format';
import { formatReport, lintPosts } from './lib/lint';
import { LogLevel, logger } from './lib/logger';
import { getAllPosts } from './lib/posts';
import { createPost } from './lib/scaffold';
import { buildSite } from './lib/site';
import { filterPosts } from './lib/taxonomy';

export interface CliContext {
  env: NodeJS.ProcessEnv;
  cwd: string;
  color: boolean;
  now: () => Date;
}

const log = logger.child('cli');

function collect(value: string, previous: string[]): string[] {
  return previous.concat(value);
}

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('must be a non-negative integer');
  return n;
}

type LintCommandOptions = { json?: boolean; maxWarnings?: number };
type ListCommandOptions = { tag?: string; category?: string; author?: string; drafts?: boolean; json?: boolean };
type BuildCommandOptions = { out?: string; drafts?: boolean };
type NewCommandOptions = { author: string[]; tag: string[]; category: string[]; description?: string; draft?: boolean };

export function createProgram(context: Partial<CliContext> = {}): Command {
  const { env = process.env, cwd = process.cwd(), color = Boolean(chalk.supportsColor), now = () => new Date() } = context;
  const c = new chalk.Instance({ level: color ? 1 : 0 });
  const program = new Command();

  const configure = (): SiteConfig => {
    const config = loadConfig(env, cwd);
    logger.setLevel(program.opts<{ verbose?: boolean }>().verbose ? LogLevel.DEBUG : config.logLevel);
    return config;
  };

  // Library code throws; this is the one place failures turn into an exit code.
  const run = (task: () => void): void => {
    try {
      task();
    } catch (error) {
      log.error(`Command failed: ${describeError(error)}`);
      process.exitCode = 1;
    }
  };

  program
    .name('devjournal')
    .description('Lint, list, scaffold and build the Markdown posts of a developer journal')
    .version('0.1.0')
    .option('--verbose', 'log debug output');

  program
    .command('lint')
    .description('Check front matter, internal links and images of every post')
    .option('--json', 'print the report as JSON')
    .option('--max-warnings <n>', 'fail when there are more warnings than this', parseCount)
    .action((options: LintCommandOptions) =>
      run(() => {
        const config = configure();
        const report = lintPosts({ postsDir: config.postsDir, publicDir: config.publicDir, now: now() });
        console.log(options.json ? JSON.stringify(report, null, 2) : formatReport(report, { color }));
        const tooManyWarnings = options.maxWarnings !== undefined && report.warningCount > options.maxWarnings;
        if (report.errorCount > 0 || tooManyWarnings) process.exitCode = 1;
      }),
    );

  program
    .command('list')
    .description('List posts, newest first')
    .option('--tag <tag>', 'only posts with this tag')
    .option('--category <category>', 'only posts in this category')
    .option('--author <author>', 'only posts by this author')
    .option('--drafts', 'include drafts')
    .option('--json', 'print JSON')
    .action((options: ListCommandOptions) =>
      run(() => {
        const config = configure();
        const posts = filterPosts(
          getAllPosts({ postsDir: config.postsDir, includeDrafts: options.drafts }),
          { tag: options.tag, category: options.category, author: options.author },
        );
        if (options.json) {
          const rows = posts.map(({ slug, title, date, authors, categories, tags, draft, sourcePath }) => ({
            slug,
            title,
            date,
            authors,
            categories,
            tags,
            draft,
            sourcePath,
          }));
          console.log(JSON.stringify(rows, null, 2));
          return;
        }
        if (posts.length === 0) {
          console.log(c.yellow('No posts found'));
          return;
        }
        for (const p of posts) {
          const tags = p.tags.length > 0 ? ` ${c.dim(`[${p.tags.join(', ')}]`)}` : '';
          const draft = p.draft ? c.yellow(' (draft)') : '';
          console.log(`${formatDate(p.date)}  ${c.bold(p.slug)}  ${p.title}${draft}${tags}`);
        }
      }),
    );

  program
    .command('build')
    .description('Render the site to static HTML')
    .option('-o, --out <dir>', 'output directory (overrides BLOG_OUT_DIR)')
    .option('--drafts', 'include drafts')
    .action((options: BuildCommandOptions) =>
      run(() => {
        const base = configure();
        const config = options.out ? { ...base, outDir: path.resolve(cwd, options.out) } : base;
        const result = buildSite({ config, includeDrafts: options.drafts });
        console.log(c.green(`✓ Wrote ${result.files.length} files for ${result.posts} posts to ${result.outDir}`));
      }),
    );

  program
    .command('new <title>')
    .description('Create a post with complete front matter')
    .option('-a, --author <name>', 'author, repeatable (defaults to BLOG_DEFAULT_AUTHOR)', collect, [])
    .option('-t, --tag <tag>', 'tag, repeatable', collect, [])
    .option('-c, --category <category>', 'category, repeatable', collect, [])
    .option('-d, --description <text>', 'one-line description')
    .option('--draft', 'mark the post as a draft')
    .action((title: string, options: NewCommandOptions) =>
      run(() => {
        const config = configure();
        const authors = options.author.length > 0 ? options.author : config.defaultAuthor ? [config.defaultAuthor] : [];
        const { filePath, slug } = createPost({
          postsDir: config.postsDir,
          title,
          authors,
          tags: options.tag,
          categories: options.category,
          description: options.description,
          draft: options.draft,
          date: now(),
        });
        console.log(c.green(`✓ Created ${path.relative(cwd, filePath)} (slug: ${slug})`));
      }),
    );

  return program;
}

function main(): void {
  try {
    loadEnvFiles();
  } catch (error) {
    log.error(describeError(error));
    process.exitCode = 1;
    return;
  }
  createProgram().parse(process.argv);
}

if (require.main === module) {
  main();
}
