import fs from 'node:fs';
import chalk from 'chalk';
import { isRemoteUrl, isRootPath, measureImage, resolvePublicPath, safeDecode, stripQuery } from './images';
import { extractReferences, splitMore } from './markdown';
import { checkSource, readPostSources, resolvePostFileLink, type PostSource } from './posts';
import { FEED_HREF, indexHref, routes, TAXONOMY_KINDS } from './routes';
import { slugify } from './taxonomy';
import type { FrontMatterIssue } from './errors';
import type { FrontMatter } from '../types/post';

export type Severity = 'error' | 'warning';

export const LINT_RULES = {
  'front-matter': 'error',
  'duplicate-slug': 'error',
  'broken-link': 'error',
  'missing-image': 'error',
  'relative-image': 'error',
  'unreadable-image': 'warning',
  'more-marker': 'warning',
  'empty-body': 'warning',
  'description-length': 'warning',
  'future-date': 'warning',
} as const satisfies Record<string, Severity>;

export type LintRule = keyof typeof LINT_RULES;

export type LintIssue = {
  rule: LintRule;
  severity: Severity;
  file: string;
  message: string;
};

export interface LintOptions {
  postsDir: string;
  publicDir: string;
  /** Reference time for `future-date`. */
  now?: Date;
  maxDescriptionLength?: number;
}

export type LintReport = {
  files: number;
  issues: LintIssue[];
  errorCount: number;
  warningCount: number;
};

export const DEFAULT_MAX_DESCRIPTION_LENGTH = 160;

const SECTION_PATH = /^\/(blog|tags|categories|authors)\/([^/]+)\/?$/;

type CheckedSource = {
  source: PostSource;
  frontMatter?: FrontMatter;
  problems: FrontMatterIssue[];
  slug: string;
};

class LinkTargets {
  readonly files: Set<string>;
  readonly known: Record<string, Set<string>>;

  constructor(sources: CheckedSource[]) {
    this.files = new Set(sources.map((c) => c.source.file));
    this.known = { blog: new Set(sources.map((c) => c.slug)) };
    for (const kind of TAXONOMY_KINDS) {
      this.known[kind] = new Set(sources.flatMap((c) => (c.frontMatter ? c.frontMatter[kind].map(slugify) : [])));
    }
  }
}

export function lintPosts(options: LintOptions): LintReport {
  const now = options.now ?? new Date();
  const maxDescription = options.maxDescriptionLength ?? DEFAULT_MAX_DESCRIPTION_LENGTH;
  const issues: LintIssue[] = [];
  const report = (rule: LintRule, file: string, message: string): void => {
    issues.push({ rule, severity: LINT_RULES[rule], file, message });
  };

  const checked: CheckedSource[] = readPostSources(options.postsDir).map((source) => {
    const result = checkSource(source);
    if (!result.ok) return { source, problems: result.issues, slug: source.defaultSlug };
    return { source, frontMatter: result.value, problems: [], slug: result.value.slug ?? source.defaultSlug };
  });

  // A default build leaves drafts out, so only drafts may link to drafts.
  const valid = checked.filter((c) => c.frontMatter !== undefined);
  const published = new LinkTargets(valid.filter((c) => !c.frontMatter?.draft));
  const withDrafts = new LinkTargets(valid);
  const staticHrefs = new Set([...routes.map((r) => r.href), ...TAXONOMY_KINDS.map(indexHref), FEED_HREF]);

  const linkProblem = (from: CheckedSource, href: string): boolean => {
    const { files, known } = from.frontMatter?.draft ? withDrafts : published;
    const fromFile = from.source.file;
    if (href === '' || href.startsWith('#') || isRemoteUrl(href)) return false;
    if (href.startsWith('/')) {
      const target = stripQuery(href);
      if (staticHrefs.has(target)) return false;
      const section = SECTION_PATH.exec(target);
      if (section) {
        const [, name = '', slug = ''] = section;
        return !known[name]?.has(safeDecode(slug));
      }
      return !fs.existsSync(resolvePublicPath(options.publicDir, target));
    }
    const postFile = resolvePostFileLink(fromFile, href);
    return postFile !== undefined && !files.has(postFile);
  };

  const firstBySlug = new Map<string, string>();
  for (const current of checked) {
    const { source, frontMatter, problems, slug } = current;
    const { file, content } = source;
    for (const problem of problems) report('front-matter', file, `${problem.field}: ${problem.message}`);

    const owner = slug === '' ? undefined : firstBySlug.get(slug);
    if (owner) report('duplicate-slug', file, `Slug "${slug}" is already used by ${owner}`);
    else firstBySlug.set(slug, file);

    if (frontMatter) {
      if (!frontMatter.draft && new Date(frontMatter.date) > now) {
        report('future-date', file, `Date ${frontMatter.date.slice(0, 10)} is in the future`);
      }
      if (frontMatter.description.length > maxDescription) {
        report(
          'description-length',
          file,
          `Description is ${frontMatter.description.length} characters; keep it to ${maxDescription}`,
        );
      }
    }

    const { markerCount } = splitMore(content);
    if (markerCount > 1) {
      report('more-marker', file, `Found ${markerCount} "<!-- more -->" markers; only the first splits the excerpt`);
    }
    if (content.trim() === '') report('empty-body', file, 'Post body is empty');

    const { links, images } = extractReferences(content);
    for (const link of links) {
      if (linkProblem(current, link.href)) report('broken-link', file, `Link to ${link.href} does not resolve`);
    }
    for (const image of images) {
      if (isRemoteUrl(image.href)) continue;
      if (!isRootPath(image.href)) {
        report('relative-image', file, `Image ${image.href} is relative; start image paths with /`);
      } else if (!fs.existsSync(resolvePublicPath(options.publicDir, image.href))) {
        report('missing-image', file, `Image ${image.href} not found in the public directory`);
      } else if (!measureImage(options.publicDir, image.href)) {
        report('unreadable-image', file, `Image ${image.href} exists but its dimensions could not be read`);
      }
    }
  }

  const errorCount = issues.filter((i) => i.severity === 'error').length;
  return { files: checked.length, issues, errorCount, warningCount: issues.length - errorCount };
}

const plural = (n: number, word: string): string => `${n} ${word}${n === 1 ? '' : 's'}`;

export function formatReport(report: LintReport, options: { color?: boolean } = {}): string {
  const c = new chalk.Instance({ level: options.color ? 1 : 0 });
  if (report.issues.length === 0) {
    return c.green(`✔ ${plural(report.files, 'post')} checked, no problems`);
  }
  const lines: string[] = [];
  let current: string | undefined;
  for (const issue of report.issues) {
    if (issue.file !== current) {
      if (current !== undefined) lines.push('');
      lines.push(c.underline(issue.file));
      current = issue.file;
    }
    const severity = issue.severity.padEnd(7);
    lines.push(`  ${issue.severity === 'error' ? c.red(severity) : c.yellow(severity)}  ${c.dim(issue.rule.padEnd(18))}  ${issue.message}`);
  }
  lines.push('');
  const summary = `✖ ${plural(report.issues.length, 'problem')} (${plural(report.errorCount, 'error')}, ${plural(report.warningCount, 'warning')})`;
  lines.push(report.errorCount > 0 ? c.red(summary) : c.yellow(summary));
  return lines.join('\n');
}
