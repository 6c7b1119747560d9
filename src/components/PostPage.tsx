import PostMeta from './PostMeta';
import TermLinks from './TermLinks';
import { postHref } from '../lib/routes';
import type { Post } from '../types/post';

export default function PostPage({ post, related }: { post: Post; related: Post[] }) {
  return (
    <article className="card post">
      <h1>{post.title}</h1>
      <PostMeta post={post} />
      {post.draft && <p className="draft-badge">Draft</p>}
      <div className="prose" dangerouslySetInnerHTML={{ __html: post.html }} />
      <footer className="post__footer">
        <TermLinks kind="categories" names={post.categories} />
        <TermLinks kind="tags" names={post.tags} />
      </footer>
      {related.length > 0 && (
        <aside className="related">
          <h2>Related posts</h2>
          <ul>
            {related.map((r) => (
              <li key={r.slug}>
                <a href={postHref(r.slug)}>{r.title}</a>
              </li>
            ))}
          </ul>
        </aside>
      )}
    </article>
  );
}
