export type FrontMatter = {
  title: string;
  date: string; // ISO string
  categories: string[];
  authors: string[];
  tags: string[];
  description: string;
  slug?: string;
  draft: boolean;
  updated?: string; // ISO string
};

export type Post = FrontMatter & {
  slug: string;
  sourcePath: string; // relative to the posts directory, `/`-separated
  excerpt?: string; // markdown before `<!-- more -->`
  excerptHtml?: string;
  content: string; // original markdown
  html: string;
  readingMinutes: number;
};

export type TaxonomyKind = 'tags' | 'categories' | 'authors';
