import type { Post, TaxonomyKind } from '../types/post';

export type Term = {
  name: string;
  slug: string;
  posts: Post[];
};

/** Latin accents are folded away; letters and digits of other scripts are kept. */
export function slugify(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .normalize('NFC')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Groups posts by term slug, so `Docker` and `docker` are one term named
 * after whichever spelling appears first. Posts keep their input order.
 */
export function buildTaxonomy(posts: Post[], kind: TaxonomyKind): Term[] {
  const terms = new Map<string, Term>();
  for (const post of posts) {
    const seen = new Set<string>();
    for (const name of post[kind]) {
      const slug = slugify(name);
      if (!slug || seen.has(slug)) continue;
      seen.add(slug);
      const term = terms.get(slug);
      if (term) term.posts.push(post);
      else terms.set(slug, { name, slug, posts: [post] });
    }
  }
  return [...terms.values()].sort((a, b) => b.posts.length - a.posts.length || a.name.localeCompare(b.name, 'en'));
}

export function findTerm(posts: Post[], kind: TaxonomyKind, slug: string): Term | undefined {
  return buildTaxonomy(posts, kind).find((t) => t.slug === slug);
}

function hasTerm(post: Post, kind: TaxonomyKind, slug: string): boolean {
  return post[kind].some((name) => slugify(name) === slugify(slug));
}

export type PostFilter = { tag?: string; category?: string; author?: string };

export function filterPosts(posts: Post[], filter: PostFilter): Post[] {
  return posts.filter(
    (post) =>
      (!filter.tag || hasTerm(post, 'tags', filter.tag)) &&
      (!filter.category || hasTerm(post, 'categories', filter.category)) &&
      (!filter.author || hasTerm(post, 'authors', filter.author)),
  );
}

function shared(a: string[], b: string[]): number {
  const other = new Set(b.map(slugify));
  return new Set(a.map(slugify).filter((s) => other.has(s))).size;
}

/** Scores 2 per shared tag and 1 per shared category; ties go to the newer post. */
export function relatedPosts(post: Post, posts: Post[], limit = 3): Post[] {
  return posts
    .filter((candidate) => candidate.slug !== post.slug)
    .map((candidate) => ({
      candidate,
      score: 2 * shared(post.tags, candidate.tags) + shared(post.categories, candidate.categories),
    }))
    .filter(({ score }) => score > 0)
    .sort((a, b) => b.score - a.score || (a.candidate.date < b.candidate.date ? 1 : a.candidate.date > b.candidate.date ? -1 : 0))
    .slice(0, limit)
    .map(({ candidate }) => candidate);
}
