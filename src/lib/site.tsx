import fs from 'node:fs';
import path from 'node:path';
import type { ReactElement, ReactNode } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import Layout from '../components/Layout';
import NotFound from '../components/NotFound';
import PostList from '../components/PostList';
import PostPage from '../components/PostPage';
import TermIndex from '../components/TermIndex';
import type { SiteConfig } from './config';
import { BlogError, BlogErrorType } from './errors';
import { buildRssFeed } from './feed';
import { logger, type Logger } from './logger';
import { getAllPosts } from './posts';
import {
  FEED_HREF,
  NOT_FOUND_HREF,
  TAXONOMY_KINDS,
  TAXONOMY_LABELS,
  indexHref,
  outputPathFor,
  postHref,
  termHref,
} from './routes';
import { buildMeta, type PageMeta } from './seo';
import { buildTaxonomy, relatedPosts } from './taxonomy';

export interface BuildOptions {
  config: SiteConfig;
  includeDrafts?: boolean;
  logger?: Logger;
}

export type BuildResult = {
  outDir: string;
  /** Written files relative to `outDir`, in write order; copied public files are not listed. */
  files: string[];
  posts: number;
};

export function renderPage(element: ReactElement): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(element)}`;
}

function isInside(dir: string, candidate: string): boolean {
  const rel = path.relative(dir, candidate);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

// The output directory is wiped on every build, so it must not hold the sources.
function assertSafeOutDir(config: SiteConfig): void {
  for (const source of [config.postsDir, config.publicDir]) {
    if (isInside(config.outDir, source)) {
      throw new BlogError(`Output directory ${config.outDir} would overwrite ${source}`, BlogErrorType.BUILD, {
        outDir: config.outDir,
        source,
      });
    }
  }
}

export function buildSite({ config, includeDrafts = false, logger: log = logger.child('build') }: BuildOptions): BuildResult {
  assertSafeOutDir(config);
  const posts = getAllPosts({ postsDir: config.postsDir, publicDir: config.publicDir, includeDrafts });

  fs.rmSync(config.outDir, { recursive: true, force: true });
  fs.mkdirSync(config.outDir, { recursive: true });
  if (fs.existsSync(config.publicDir)) {
    fs.cpSync(config.publicDir, config.outDir, { recursive: true });
    log.debug('Copied public directory', { from: config.publicDir });
  }

  const files: string[] = [];
  const write = (href: string, body: string): void => {
    const rel = outputPathFor(href);
    const target = path.join(config.outDir, rel);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, body, 'utf8');
    files.push(rel);
  };
  const page = (href: string, meta: PageMeta, children: ReactNode): void => {
    write(
      href,
      renderPage(
        <Layout site={config} meta={meta} currentHref={href}>
          {children}
        </Layout>,
      ),
    );
  };

  page('/', buildMeta(config, { canonical: '/' }), <PostList heading={config.title} intro={config.description} posts={posts} />);

  for (const post of posts) {
    const href = postHref(post.slug);
    const meta = buildMeta(config, {
      title: post.title,
      description: post.description,
      canonical: href,
      type: 'article',
      publishedTime: post.date,
      tags: post.tags,
    });
    page(href, meta, <PostPage post={post} related={relatedPosts(post, posts)} />);
  }

  for (const kind of TAXONOMY_KINDS) {
    const label = TAXONOMY_LABELS[kind];
    const terms = buildTaxonomy(posts, kind);
    page(indexHref(kind), buildMeta(config, { title: label.plural, canonical: indexHref(kind) }), <TermIndex kind={kind} terms={terms} />);
    for (const term of terms) {
      const heading = `${label.singular}: ${term.name}`;
      const href = termHref(kind, term.slug);
      page(href, buildMeta(config, { title: heading, canonical: href }), <PostList heading={heading} posts={term.posts} />);
    }
  }

  write(FEED_HREF, buildRssFeed(posts, config, config.feedLimit));
  page(NOT_FOUND_HREF, buildMeta(config, { title: 'Not found' }), <NotFound />);

  log.info(`Built ${files.length} files from ${posts.length} posts`, { outDir: config.outDir });
  return { outDir: config.outDir, files, posts: posts.length };
}
