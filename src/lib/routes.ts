import type { TaxonomyKind } from '../types/post';

export type RouteItem = { label: string; href: string };

export const routes: RouteItem[] = [
  { label: 'Home', href: '/' },
  { label: 'Tags', href: '/tags/' },
  { label: 'Categories', href: '/categories/' },
  { label: 'Authors', href: '/authors/' },
];

export const FEED_HREF = '/feed.xml';
export const NOT_FOUND_HREF = '/404.html';

export const TAXONOMY_KINDS: TaxonomyKind[] = ['tags', 'categories', 'authors'];

export const TAXONOMY_LABELS: Record<TaxonomyKind, { plural: string; singular: string }> = {
  tags: { plural: 'Tags', singular: 'Tag' },
  categories: { plural: 'Categories', singular: 'Category' },
  authors: { plural: 'Authors', singular: 'Author' },
};

export const postHref = (slug: string): string => `/blog/${slug}/`;

export const indexHref = (kind: TaxonomyKind): string => `/${kind}/`;

export const termHref = (kind: TaxonomyKind, slug: string): string => `/${kind}/${slug}/`;

/** `/` → `index.html`, `/blog/x/` → `blog/x/index.html`, `/feed.xml` → `feed.xml`. */
export function outputPathFor(href: string): string {
  const trimmed = href.replace(/^\/+/, '');
  if (trimmed === '' || trimmed.endsWith('/')) return `${trimmed}index.html`;
  return trimmed;
}

export function absoluteUrl(baseUrl: string, href: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${href.startsWith('/') ? href : `/${href}`}`;
}
