import fs from 'node:fs';
import path from 'node:path';
import matter from 'gray-matter';
import { BlogError, BlogErrorType, FrontMatterError, PostNotFoundError, describeError, type FrontMatterIssue } from './errors';
import { validateFrontMatter, type FrontMatterResult } from './frontmatter';
import { logger } from './logger';
import { createMarkdownRenderer, readingMinutes, splitMore } from './markdown';
import { postHref } from './routes';
import { slugify } from './taxonomy';
import type { FrontMatter, Post } from '../types/post';

const log = logger.child('posts');

const POST_FILE = /\.(md|markdown)$/i;
const DATE_PREFIX = /^\d{4}-\d{2}-\d{2}-/;

export type PostSource = {
  /** Path relative to the posts directory, `/`-separated. */
  file: string;
  absolutePath: string;
  defaultSlug: string;
  data: unknown;
  content: string;
  /** Set when the front matter block is not valid YAML. */
  parseError?: string;
};

export interface LoadPostsOptions {
  postsDir: string;
  publicDir?: string;
  includeDrafts?: boolean;
}

export type PostFailure = { file: string; issues: FrontMatterIssue[] };

export type LoadPostsResult = { posts: Post[]; failures: PostFailure[] };

export function defaultSlugFor(file: string): string {
  const stem = path.posix.basename(file).replace(POST_FILE, '');
  return slugify(stem.replace(DATE_PREFIX, '')) || slugify(stem);
}

function listPostFiles(root: string, prefix = ''): string[] {
  const entries = fs.readdirSync(path.join(root, prefix), { withFileTypes: true });
  return entries.flatMap((entry) => {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) return listPostFiles(root, rel);
    return entry.isFile() && POST_FILE.test(entry.name) ? [rel] : [];
  });
}

export function readPostSources(postsDir: string): PostSource[] {
  if (!fs.existsSync(postsDir) || !fs.statSync(postsDir).isDirectory()) {
    throw new BlogError(`Posts directory not found: ${postsDir}`, BlogErrorType.IO, { postsDir });
  }
  return listPostFiles(postsDir)
    .sort()
    .map((file) => {
      const absolutePath = path.join(postsDir, file);
      const raw = fs.readFileSync(absolutePath, 'utf8');
      const defaultSlug = defaultSlugFor(file);
      try {
        // An options object skips gray-matter's cache, which also keeps inputs that failed to parse.
        const { data, content } = matter(raw, {});
        return { file, absolutePath, defaultSlug, data, content };
      } catch (error) {
        return { file, absolutePath, defaultSlug, data: {}, content: raw, parseError: describeError(error) };
      }
    });
}

/**
 * The post file a relative Markdown link points at (`../2024/other.md#x`),
 * relative to the posts directory; undefined for any other kind of link.
 */
export function resolvePostFileLink(fromFile: string, href: string): string | undefined {
  if (/^[a-z][a-z0-9+.-]*:/i.test(href) || href.startsWith('/') || href.startsWith('#')) return undefined;
  const target = href.split(/[?#]/)[0] ?? '';
  if (!POST_FILE.test(target)) return undefined;
  const joined = path.posix.normalize(path.posix.join(path.posix.dirname(fromFile), target));
  return joined.startsWith('../') ? undefined : joined;
}

export function comparePosts(a: Post, b: Post): number {
  if (a.date !== b.date) return a.date < b.date ? 1 : -1;
  if (a.slug === b.slug) return 0;
  return a.slug < b.slug ? -1 : 1;
}

export function checkSource(source: PostSource): FrontMatterResult {
  if (source.parseError) return { ok: false, issues: [{ field: '(front matter)', message: source.parseError }] };
  const result = validateFrontMatter(source.data);
  if (result.ok && result.value.slug === undefined && source.defaultSlug === '') {
    return { ok: false, issues: [{ field: 'slug', message: 'slug is required when the file name has no letters or digits' }] };
  }
  return result;
}

export function loadPosts(options: LoadPostsOptions): LoadPostsResult {
  const sources = readPostSources(options.postsDir);
  const failures: PostFailure[] = [];
  const valid: Array<{ source: PostSource; frontMatter: FrontMatter; slug: string }> = [];
  const ownerBySlug = new Map<string, string>();

  for (const source of sources) {
    const result = checkSource(source);
    if (!result.ok) {
      failures.push({ file: source.file, issues: result.issues });
      continue;
    }
    const slug = result.value.slug ?? source.defaultSlug;
    const owner = ownerBySlug.get(slug);
    if (owner) {
      failures.push({ file: source.file, issues: [{ field: 'slug', message: `slug "${slug}" is already used by ${owner}` }] });
      continue;
    }
    ownerBySlug.set(slug, source.file);
    valid.push({ source, frontMatter: result.value, slug });
  }

  const slugByFile = new Map(valid.map(({ source, slug }) => [source.file, slug]));

  const posts = valid
    .filter(({ frontMatter }) => options.includeDrafts || !frontMatter.draft)
    .map(({ source, frontMatter, slug }) => {
      const renderer = createMarkdownRenderer({
        publicDir: options.publicDir,
        resolveHref: (href) => {
          const target = resolvePostFileLink(source.file, href);
          const targetSlug = target ? slugByFile.get(target) : undefined;
          if (!targetSlug) return undefined;
          const hash = href.indexOf('#');
          return hash >= 0 ? `${postHref(targetSlug)}${href.slice(hash)}` : postHref(targetSlug);
        },
      });
      const { excerpt, body } = splitMore(source.content);
      const post: Post = {
        ...frontMatter,
        slug,
        sourcePath: source.file,
        excerpt,
        excerptHtml: excerpt ? renderer.render(excerpt) : undefined,
        content: source.content,
        html: renderer.render(body),
        readingMinutes: readingMinutes(source.content),
      };
      return post;
    })
    .sort(comparePosts);

  log.debug('Loaded posts', { postsDir: options.postsDir, posts: posts.length, failures: failures.length });
  return { posts, failures };
}

export function getAllPosts(options: LoadPostsOptions): Post[] {
  const { posts, failures } = loadPosts(options);
  const [first] = failures;
  if (first) throw new FrontMatterError(first.file, first.issues);
  return posts;
}

export function getPostBySlug(options: LoadPostsOptions, slug: string): Post {
  const post = getAllPosts(options).find((p) => p.slug === slug);
  if (!post) throw new PostNotFoundError(slug);
  return post;
}
