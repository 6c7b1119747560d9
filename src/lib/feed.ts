import { escapeHtml } from './escape';
import { absoluteUrl, FEED_HREF, postHref } from './routes';
import type { SiteInfo } from './seo';
import type { Post } from '../types/post';

function element(name: string, value: string): string {
  return `<${name}>${escapeHtml(value)}</${name}>`;
}

function cdata(value: string): string {
  return `<![CDATA[${value.replace(/]]>/g, ']]]]><![CDATA[>')}]]>`;
}

/** RSS 2.0 document for the newest `limit` posts; posts arrive newest first. */
export function buildRssFeed(posts: Post[], site: SiteInfo, limit: number): string {
  const items = posts.slice(0, limit).map((post) => {
    const link = absoluteUrl(site.baseUrl, postHref(post.slug));
    const lines = [
      '    <item>',
      `      ${element('title', post.title)}`,
      `      ${element('link', link)}`,
      `      <guid isPermaLink="true">${escapeHtml(link)}</guid>`,
      `      ${element('pubDate', new Date(post.date).toUTCString())}`,
      ...post.authors.map((a) => `      ${element('dc:creator', a)}`),
      ...[...post.categories, ...post.tags].map((c) => `      ${element('category', c)}`),
      `      <description>${cdata(post.excerptHtml ?? escapeHtml(post.description))}</description>`,
      '    </item>',
    ];
    return lines.join('\n');
  });

  const newest = posts[0];
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<rss version="2.0" xmlns:atom="http://www.w3.org/2005/Atom" xmlns:dc="http://purl.org/dc/elements/1.1/">',
    '  <channel>',
    `    ${element('title', site.title)}`,
    `    ${element('link', absoluteUrl(site.baseUrl, '/'))}`,
    `    ${element('description', site.description)}`,
    `    ${element('language', site.language)}`,
    `    <atom:link href="${escapeHtml(absoluteUrl(site.baseUrl, FEED_HREF))}" rel="self" type="application/rss+xml"/>`,
    ...(newest ? [`    ${element('lastBuildDate', new Date(newest.date).toUTCString())}`] : []),
    ...items,
    '  </channel>',
    '</rss>',
    '',
  ].join('\n');
}
