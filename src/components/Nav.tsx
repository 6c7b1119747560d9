import { clsx } from 'clsx';
import { routes, type RouteItem } from '../lib/routes';

function isActive(href: string, currentHref: string): boolean {
  return href === '/' ? currentHref === '/' : currentHref.startsWith(href);
}

export default function Nav({ siteTitle, currentHref }: { siteTitle: string; currentHref: string }) {
  return (
    <header className="site-header">
      <div className="container site-header__inner">
        <a href="/" className="site-title">{siteTitle}</a>
        <nav className="site-nav">
          {routes.map((r: RouteItem) => {
            const active = isActive(r.href, currentHref);
            return (
              <a
                key={r.href}
                href={r.href}
                aria-current={active ? 'page' : undefined}
                className={clsx('nav-link', active && 'nav-link--active')}
              >
                {r.label}
              </a>
            );
          })}
        </nav>
      </div>
    </header>
  );
}
