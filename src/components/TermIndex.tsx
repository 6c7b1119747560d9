import { TAXONOMY_LABELS, termHref } from '../lib/routes';
import type { Term } from '../lib/taxonomy';
import type { TaxonomyKind } from '../types/post';

export default function TermIndex({ kind, terms }: { kind: TaxonomyKind; terms: Term[] }) {
  return (
    <section className="card term-index">
      <h1>{TAXONOMY_LABELS[kind].plural}</h1>
      {terms.length === 0 ? (
        <p className="muted">Nothing here yet.</p>
      ) : (
        <ul>
          {terms.map((t) => (
            <li key={t.slug}>
              <a href={termHref(kind, t.slug)}>{t.name}</a> <span className="muted">({t.posts.length})</span>
            </li>
          ))}
        </ul>
      )}
    </section>
  );
}
