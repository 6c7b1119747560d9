export default function NotFound() {
  return (
    <section className="card">
      <h1>Page not found</h1>
      <p className="muted">
        Nothing lives at this address. Try the <a href="/">post list</a> instead.
      </p>
    </section>
  );
}
