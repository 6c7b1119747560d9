import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { BlogError, BlogErrorType } from '../../src/lib/errors';
import { getAllPosts, loadPosts } from '../../src/lib/posts';
import { createPost } from '../../src/lib/scaffold';
import { makeTempDir, removeDir } from '../helpers/blog';

describe('createPost', () => {
  let postsDir: string;
  const date = new Date('2024-05-02T10:00:00.000Z');

  beforeEach(() => {
    postsDir = path.join(makeTempDir(), 'posts');
  });

  afterEach(() => removeDir(path.dirname(postsDir)));

  it('writes a post that passes validation', () => {
    const result = createPost({ postsDir, title: '  Hello, World!  ', authors: ['Sam', ' '], tags: ['intro'], date });

    expect(result).toEqual({ filePath: path.join(postsDir, '2024-05-02-hello-world.md'), slug: 'hello-world' });
    const [post] = getAllPosts({ postsDir });
    expect(post).toMatchObject({
      slug: 'hello-world',
      title: 'Hello, World!',
      date: '2024-05-02T00:00:00.000Z',
      authors: ['Sam'],
      tags: ['intro'],
      categories: [],
      description: 'Hello, World!',
      draft: false,
      excerpt: 'Start with the question this post answers.',
    });
  });

  it('marks drafts', () => {
    createPost({ postsDir, title: 'Later', authors: ['Sam'], description: 'Soon.', draft: true, date });

    expect(loadPosts({ postsDir }).posts).toEqual([]);
    expect(loadPosts({ postsDir, includeDrafts: true }).posts[0]).toMatchObject({ draft: true, description: 'Soon.' });
  });

  it('never overwrites an existing post', () => {
    const { filePath } = createPost({ postsDir, title: 'Once', authors: ['Sam'], date });
    fs.appendFileSync(filePath, 'Edited.\n');

    expect(() => createPost({ postsDir, title: 'Once', authors: ['Sam'], date })).toThrow(`Post already exists: ${filePath}`);
    expect(fs.readFileSync(filePath, 'utf8')).toContain('Edited.');
  });

  it('rejects titles without a slug and posts without authors', () => {
    expect(() => createPost({ postsDir, title: '!!!', authors: ['Sam'], date })).toThrow(
      'A post needs a title with at least one letter or digit',
    );
    try {
      createPost({ postsDir, title: 'Fine', authors: [], date });
    } catch (error) {
      expect(error).toBeInstanceOf(BlogError);
      expect(error instanceof BlogError && error.type).toBe(BlogErrorType.FRONT_MATTER);
    }
    expect(fs.existsSync(postsDir)).toBe(false);
  });
});
