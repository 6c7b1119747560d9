import fs from 'node:fs';
import path from 'node:path';
import matter from 'gray-matter';
import { BlogError, BlogErrorType } from './errors';
import { slugify } from './taxonomy';

export interface NewPostOptions {
  postsDir: string;
  title: string;
  authors: string[];
  date?: Date;
  tags?: string[];
  categories?: string[];
  description?: string;
  draft?: boolean;
}

export type NewPostResult = { filePath: string; slug: string };

const STARTER_BODY = `
Start with the question this post answers.

<!-- more -->

Then the details.
`;

/** Writes `<YYYY-MM-DD>-<slug>.md` with complete front matter; never overwrites. */
export function createPost(options: NewPostOptions): NewPostResult {
  const title = options.title.trim();
  const slug = slugify(title);
  if (!slug) {
    throw new BlogError('A post needs a title with at least one letter or digit', BlogErrorType.FRONT_MATTER, { title });
  }
  const authors = options.authors.map((a) => a.trim()).filter(Boolean);
  if (authors.length === 0) {
    throw new BlogError('A post needs at least one author', BlogErrorType.FRONT_MATTER, { title });
  }

  const date = (options.date ?? new Date()).toISOString().slice(0, 10);
  const filePath = path.join(options.postsDir, `${date}-${slug}.md`);
  if (fs.existsSync(filePath)) {
    throw new BlogError(`Post already exists: ${filePath}`, BlogErrorType.IO, { filePath });
  }

  const data: Record<string, unknown> = {
    title,
    date,
    categories: options.categories ?? [],
    authors,
    tags: options.tags ?? [],
    description: options.description?.trim() || title,
  };
  if (options.draft) data.draft = true;

  fs.mkdirSync(options.postsDir, { recursive: true });
  fs.writeFileSync(filePath, matter.stringify(STARTER_BODY, data), { encoding: 'utf8', flag: 'wx' });
  return { filePath, slug };
}
