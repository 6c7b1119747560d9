import path from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from '@jest/globals';
import { BlogError, BlogErrorType, FrontMatterError, PostNotFoundError } from '../../src/lib/errors';
import {
  comparePosts,
  defaultSlugFor,
  getAllPosts,
  getPostBySlug,
  loadPosts,
  readPostSources,
  resolvePostFileLink,
} from '../../src/lib/posts';
import { makePost, makeTempDir, postFile, removeDir, writeFiles } from '../helpers/blog';

describe('posts', () => {
  let root: string;
  let postsDir: string;
  let brokenDir: string;

  beforeAll(() => {
    root = makeTempDir();
    postsDir = path.join(root, 'posts');
    brokenDir = path.join(root, 'broken');
    writeFiles(postsDir, {
      '2024-03-01-first-post.md': postFile(
        { title: 'First post', tags: '[Docker, testing]' },
        'Intro text.\n\n<!-- more -->\n\nSee [second](./nested/second.md#part).\n',
      ),
      'nested/second.md': postFile({ title: 'Second', date: '2024-04-01', slug: 'custom-second' }, 'Body two.\n'),
      'draft.md': postFile({ title: 'Draft', date: '2024-05-01', draft: 'true' }, 'Draft body.\n'),
      'notes.txt': 'not a post',
    });
    writeFiles(brokenDir, {
      'bad-yaml.md': '---\ntitle: [unclosed\n---\nBody\n',
      'no-title.md': postFile({ title: undefined }),
      'ok.md': postFile(),
    });
  });

  afterAll(() => removeDir(root));

  describe('readPostSources', () => {
    it('finds markdown files recursively in path order', () => {
      const sources = readPostSources(postsDir);

      expect(sources.map((s) => [s.file, s.defaultSlug])).toEqual([
        ['2024-03-01-first-post.md', 'first-post'],
        ['draft.md', 'draft'],
        ['nested/second.md', 'second'],
      ]);
    });

    it('records YAML errors instead of throwing', () => {
      const [bad] = readPostSources(brokenDir);

      expect(bad?.file).toBe('bad-yaml.md');
      expect(bad?.parseError).toEqual(expect.any(String));
    });

    it('throws an io error for a missing directory', () => {
      expect(() => readPostSources(path.join(root, 'nope'))).toThrow(BlogError);
      try {
        readPostSources(path.join(root, 'nope'));
      } catch (error) {
        expect(error instanceof BlogError && error.type).toBe(BlogErrorType.IO);
      }
    });
  });

  describe('loadPosts', () => {
    it('returns published posts newest first', () => {
      const { posts, failures } = loadPosts({ postsDir });

      expect(failures).toEqual([]);
      expect(posts.map((p) => p.slug)).toEqual(['custom-second', 'first-post']);
    });

    it('includes drafts on request', () => {
      const { posts } = loadPosts({ postsDir, includeDrafts: true });

      expect(posts.map((p) => p.slug)).toEqual(['draft', 'custom-second', 'first-post']);
      expect(posts[0]?.draft).toBe(true);
    });

    it('builds the post from front matter and body', () => {
      const post = loadPosts({ postsDir }).posts.find((p) => p.slug === 'first-post');

      expect(post).toMatchObject({
        title: 'First post',
        date: '2024-03-01T00:00:00.000Z',
        tags: ['Docker', 'testing'],
        categories: ['Notes'],
        authors: ['Sam'],
        sourcePath: '2024-03-01-first-post.md',
        excerpt: 'Intro text.',
        excerptHtml: '<p>Intro text.</p>\n',
        readingMinutes: 1,
      });
      expect(post?.html).toBe('<p>Intro text.</p>\n<p>See <a href="/blog/custom-second/#part">second</a>.</p>\n');
    });

    it('collects front matter failures per file', () => {
      const { posts, failures } = loadPosts({ postsDir: brokenDir });

      expect(posts.map((p) => p.sourcePath)).toEqual(['ok.md']);
      expect(failures).toEqual([
        { file: 'bad-yaml.md', issues: [{ field: '(front matter)', message: expect.any(String) }] },
        { file: 'no-title.md', issues: [{ field: 'title', message: 'title is required' }] },
      ]);
    });
  });

  describe('slug conflicts', () => {
    let dir: string;

    beforeAll(() => {
      dir = path.join(root, 'conflicts');
      writeFiles(dir, {
        'a.md': postFile({ title: 'First', slug: 'same' }, 'First body.\n'),
        'b.md': postFile({ title: 'Second', slug: 'same', draft: 'true' }, 'Second body.\n'),
        '!!!.md': postFile({ title: 'Symbols' }),
        '日記.md': postFile({ title: 'Diary' }),
      });
    });

    it('rejects a slug already taken by an earlier file, drafts included', () => {
      const { posts, failures } = loadPosts({ postsDir: dir, includeDrafts: true });

      expect(posts.map((p) => [p.slug, p.sourcePath])).toEqual([
        ['same', 'a.md'],
        ['日記', '日記.md'],
      ]);
      expect(failures).toEqual([
        { file: '!!!.md', issues: [{ field: 'slug', message: 'slug is required when the file name has no letters or digits' }] },
        { file: 'b.md', issues: [{ field: 'slug', message: 'slug "same" is already used by a.md' }] },
      ]);
    });

    it('makes getAllPosts fail on the conflict', () => {
      expect(() => getAllPosts({ postsDir: dir })).toThrow(FrontMatterError);
    });
  });

  describe('getAllPosts', () => {
    it('fails fast on the first broken file', () => {
      expect(() => getAllPosts({ postsDir: brokenDir })).toThrow(FrontMatterError);
    });
  });

  describe('getPostBySlug', () => {
    it('finds a post or throws', () => {
      expect(getPostBySlug({ postsDir }, 'first-post').title).toBe('First post');
      expect(() => getPostBySlug({ postsDir }, 'draft')).toThrow(PostNotFoundError);
    });
  });

  it('derives slugs from file names', () => {
    expect(defaultSlugFor('2024-01-14-Setting Up.md')).toBe('setting-up');
    expect(defaultSlugFor('2024/notes.markdown')).toBe('notes');
    expect(defaultSlugFor('2024-01-14-.md')).toBe('2024-01-14');
  });

  it('resolves relative links to post files only', () => {
    expect(resolvePostFileLink('a/b.md', '../c.md')).toBe('c.md');
    expect(resolvePostFileLink('a/b.md', 'd.md?x=1#y')).toBe('a/d.md');
    expect(resolvePostFileLink('b.md', '../outside.md')).toBeUndefined();
    expect(resolvePostFileLink('b.md', 'https://example.com/x.md')).toBeUndefined();
    expect(resolvePostFileLink('b.md', '/blog/x/')).toBeUndefined();
    expect(resolvePostFileLink('b.md', 'notes.txt')).toBeUndefined();
  });

  it('orders by date, then slug', () => {
    const older = makePost({ slug: 'older', date: '2024-01-01T00:00:00.000Z' });
    const b = makePost({ slug: 'b', date: '2024-02-01T00:00:00.000Z' });
    const a = makePost({ slug: 'a', date: '2024-02-01T00:00:00.000Z' });

    expect([older, b, a].sort(comparePosts).map((p) => p.slug)).toEqual(['a', 'b', 'older']);
  });
});
