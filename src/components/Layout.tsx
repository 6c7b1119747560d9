import type { ReactNode } from 'react';
import Nav from './Nav';
import { FEED_HREF } from '../lib/routes';
import type { PageMeta, SiteInfo } from '../lib/seo';

interface LayoutProps {
  site: SiteInfo;
  meta: PageMeta;
  currentHref: string;
  children: ReactNode;
}

export default function Layout({ site, meta, currentHref, children }: LayoutProps) {
  const { openGraph: og, twitter } = meta;
  return (
    <html lang={site.language}>
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{meta.title}</title>
        <meta name="description" content={meta.description} />
        {meta.canonical && <link rel="canonical" href={meta.canonical} />}
        <meta property="og:title" content={og.title} />
        <meta property="og:description" content={og.description} />
        <meta property="og:site_name" content={og.siteName} />
        <meta property="og:type" content={og.type} />
        {og.url && <meta property="og:url" content={og.url} />}
        {og.publishedTime && <meta property="article:published_time" content={og.publishedTime} />}
        {og.tags?.map((tag) => <meta key={tag} property="article:tag" content={tag} />)}
        <meta name="twitter:card" content={twitter.card} />
        <meta name="twitter:title" content={twitter.title} />
        <meta name="twitter:description" content={twitter.description} />
        <link rel="alternate" type="application/rss+xml" title={site.title} href={FEED_HREF} />
        <link rel="stylesheet" href="/styles.css" />
      </head>
      <body>
        <Nav siteTitle={site.title} currentHref={currentHref} />
        <main className="container">{children}</main>
        <footer className="site-footer container">
          <a href={FEED_HREF}>RSS</a>
        </footer>
      </body>
    </html>
  );
}
