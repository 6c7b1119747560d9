import { describe, expect, it } from '@jest/globals';
import { renderToStaticMarkup } from 'react-dom/server';
import Nav from '../../src/components/Nav';
import PostList from '../../src/components/PostList';
import PostMeta from '../../src/components/PostMeta';
import PostPage from '../../src/components/PostPage';
import TermIndex from '../../src/components/TermIndex';
import TermLinks from '../../src/components/TermLinks';
import { makePost } from '../helpers/blog';

describe('Nav', () => {
  it('marks the section of the current page', () => {
    const html = renderToStaticMarkup(<Nav siteTitle="Dev Journal" currentHref="/tags/docker/" />);

    expect(html).toContain('<a href="/" class="nav-link">Home</a>');
    expect(html).toContain('<a href="/tags/" aria-current="page" class="nav-link nav-link--active">Tags</a>');
    expect(html).toContain('<a href="/authors/" class="nav-link">Authors</a>');
  });

  it('only marks Home on the home page', () => {
    const html = renderToStaticMarkup(<Nav siteTitle="Dev Journal" currentHref="/" />);

    expect(html).toContain('<a href="/" aria-current="page" class="nav-link nav-link--active">Home</a>');
    expect(html.match(/aria-current/g)).toHaveLength(1);
  });
});

describe('PostMeta', () => {
  it('shows date, reading time and author links', () => {
    const html = renderToStaticMarkup(<PostMeta post={makePost({ authors: ['Sam', 'Alex Kim'], readingMinutes: 4 })} />);

    expect(html).toContain('>2024-03-01</time> · 4 min read · ');
    expect(html).toContain('<span><a href="/authors/sam/">Sam</a></span><span>, <a href="/authors/alex-kim/">Alex Kim</a></span>');
  });
});

describe('TermLinks', () => {
  it('links each term', () => {
    expect(renderToStaticMarkup(<TermLinks kind="tags" names={['Docker', 'CI/CD']} />)).toBe(
      '<p class="terms terms--tags"><span class="terms__label">Tags:</span>' +
        '<a class="term" href="/tags/docker/">Docker</a><a class="term" href="/tags/ci-cd/">CI/CD</a></p>',
    );
  });

  it('renders nothing for an empty list', () => {
    expect(renderToStaticMarkup(<TermLinks kind="categories" names={[]} />)).toBe('');
  });
});

describe('PostList', () => {
  it('prefers the excerpt over the description', () => {
    const html = renderToStaticMarkup(
      <PostList
        heading="Tag: docker"
        posts={[
          makePost({ slug: 'one', title: 'One', excerptHtml: '<p>Excerpt <em>one</em></p>' }),
          makePost({ slug: 'two', title: 'Two', description: 'Only a description' }),
        ]}
      />,
    );

    expect(html).toContain('<h1>Tag: docker</h1>');
    expect(html).toContain('<h2><a href="/blog/one/">One</a></h2>');
    expect(html).toContain('<div class="excerpt"><p>Excerpt <em>one</em></p></div>');
    expect(html).toContain('<p class="muted">Only a description</p>');
  });

  it('says so when there are no posts', () => {
    expect(renderToStaticMarkup(<PostList heading="Empty" posts={[]} />)).toContain('<p class="muted">No posts yet.</p>');
  });
});

describe('PostPage', () => {
  const post = makePost({
    title: 'Retries',
    html: '<p>Body</p>',
    draft: true,
    categories: ['Backend'],
    tags: ['http'],
  });

  it('renders the article with its terms and related posts', () => {
    const html = renderToStaticMarkup(<PostPage post={post} related={[makePost({ slug: 'other', title: 'Other' })]} />);

    expect(html).toContain('<h1>Retries</h1>');
    expect(html).toContain('<p class="draft-badge">Draft</p>');
    expect(html).toContain('<div class="prose"><p>Body</p></div>');
    expect(html).toContain('<a class="term" href="/categories/backend/">Backend</a>');
    expect(html).toContain('<a class="term" href="/tags/http/">http</a>');
    expect(html).toContain('<h2>Related posts</h2><ul><li><a href="/blog/other/">Other</a></li></ul>');
  });

  it('leaves out the related section when nothing relates', () => {
    expect(renderToStaticMarkup(<PostPage post={post} related={[]} />)).not.toContain('Related posts');
  });
});

describe('TermIndex', () => {
  it('lists terms with their post counts', () => {
    const terms = [{ name: 'Docker', slug: 'docker', posts: [makePost(), makePost({ slug: 'b' })] }];

    expect(renderToStaticMarkup(<TermIndex kind="tags" terms={terms} />)).toContain(
      '<li><a href="/tags/docker/">Docker</a> <span class="muted">(2)</span></li>',
    );
  });
});
