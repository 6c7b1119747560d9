import { formatDate } from '../lib/format';
import { termHref } from '../lib/routes';
import { slugify } from '../lib/taxonomy';
import type { Post } from '../types/post';

export default function PostMeta({ post }: { post: Post }) {
  return (
    <p className="post-meta">
      <time dateTime={post.date}>{formatDate(post.date)}</time>
      {' · '}
      {post.readingMinutes} min read
      {' · '}
      {post.authors.map((name, i) => (
        <span key={name}>
          {i > 0 && ', '}
          <a href={termHref('authors', slugify(name))}>{name}</a>
        </span>
      ))}
    </p>
  );
}
