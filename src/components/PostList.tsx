import PostMeta from './PostMeta';
import { postHref } from '../lib/routes';
import type { Post } from '../types/post';

interface PostListProps {
  heading: string;
  intro?: string;
  posts: Post[];
}

export default function PostList({ heading, intro, posts }: PostListProps) {
  return (
    <section className="post-list">
      <div className="card">
        <h1>{heading}</h1>
        {intro && <p className="muted">{intro}</p>}
      </div>

      {posts.length === 0 ? (
        <p className="muted">No posts yet.</p>
      ) : (
        <ul className="post-grid">
          {posts.map((p) => (
            <li key={p.slug} className="card">
              <h2>
                <a href={postHref(p.slug)}>{p.title}</a>
              </h2>
              <PostMeta post={p} />
              {p.excerptHtml ? (
                <div className="excerpt" dangerouslySetInnerHTML={{ __html: p.excerptHtml }} />
              ) : (
                <p className="muted">{p.description}</p>
              )}
              <a className="btn" href={postHref(p.slug)}>
                Read →
              </a>
            </li>
          ))}
        </ul>
      )}
    </section>
  );
}
