import { absoluteUrl } from './routes';
import type { SiteConfig } from './config';

export type SiteInfo = Pick<SiteConfig, 'title' | 'description' | 'baseUrl' | 'language'>;

interface BaseMeta {
  title?: string;
  description?: string;
  /** Site-relative href; made absolute against the base URL. */
  canonical?: string;
  type?: 'website' | 'article';
  publishedTime?: string;
  tags?: string[];
}

export type PageMeta = {
  title: string;
  description: string;
  canonical?: string;
  openGraph: {
    title: string;
    description: string;
    siteName: string;
    type: 'website' | 'article';
    url?: string;
    publishedTime?: string;
    tags?: string[];
  };
  twitter: {
    card: 'summary' | 'summary_large_image';
    title: string;
    description: string;
  };
};

export function buildMeta(site: SiteInfo, { title, description, canonical, type = 'website', publishedTime, tags }: BaseMeta = {}): PageMeta {
  const fullTitle = title ? `${title} · ${site.title}` : site.title;
  const desc = description || site.description;
  const url = canonical ? absoluteUrl(site.baseUrl, canonical) : undefined;
  return {
    title: fullTitle,
    description: desc,
    canonical: url,
    openGraph: {
      title: fullTitle,
      description: desc,
      siteName: site.title,
      type,
      url,
      publishedTime,
      tags: tags && tags.length > 0 ? tags : undefined,
    },
    twitter: {
      card: 'summary',
      title: fullTitle,
      description: desc,
    },
  };
}
