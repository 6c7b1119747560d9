import { TAXONOMY_LABELS, termHref } from '../lib/routes';
import { slugify } from '../lib/taxonomy';
import type { TaxonomyKind } from '../types/post';

export default function TermLinks({ kind, names }: { kind: TaxonomyKind; names: string[] }) {
  if (names.length === 0) return null;
  return (
    <p className={`terms terms--${kind}`}>
      <span className="terms__label">{TAXONOMY_LABELS[kind].plural}:</span>
      {names.map((name) => (
        <a key={name} className="term" href={termHref(kind, slugify(name))}>
          {name}
        </a>
      ))}
    </p>
  );
}
