import { useEffect, useMemo, useState } from "react";
import { Link } from "react-router-dom";
import { useLibraryStore } from "../stores/library-store";

export const LibraryPage = () => {
  const assets = useLibraryStore((state) => state.assets);
  const loading = useLibraryStore((state) => state.loading);
  const error = useLibraryStore((state) => state.error);
  const fetchAssets = useLibraryStore((state) => state.fetchAssets);
  const toggleFavorite = useLibraryStore((state) => state.toggleFavorite);
  const deleteAsset = useLibraryStore((state) => state.deleteAsset);
  const [favoritesOnly, setFavoritesOnly] = useState(false);

  useEffect(() => {
    void fetchAssets();
  }, [fetchAssets]);

  const visible = useMemo(
    () => (favoritesOnly ? assets.filter((asset) => asset.isFavorite) : assets),
    [assets, favoritesOnly]
  );

  return (
    <div className="space-y-6">
      <section className="rounded-3xl border border-white/15 bg-black/20 p-6">
        <p className="text-xs uppercase tracking-[0.2em] text-[var(--ink-300)]">Library</p>
        <h1 className="mt-2 font-display text-4xl text-[var(--ink-100)]">Your assets</h1>

        <div className="mt-6 flex flex-wrap gap-3">
          <Link
            to="/generator"
            className="rounded-full bg-[var(--brand-sand)] px-5 py-2 text-sm font-semibold text-[var(--ink-900)] transition hover:brightness-105"
          >
            New Asset
          </Link>
          <button
            type="button"
            onClick={() => void fetchAssets()}
            className="rounded-full border border-white/30 px-5 py-2 text-sm font-semibold text-[var(--ink-100)] transition hover:bg-white/10"
          >
            Refresh
          </button>
          <button
            type="button"
            onClick={() => setFavoritesOnly((value) => !value)}
            className={`rounded-full px-5 py-2 text-sm font-semibold transition ${
              favoritesOnly ? "bg-[var(--brand-coral)] text-[var(--ink-900)]" : "border border-white/30 text-[var(--ink-100)]"
            }`}
          >
            Favorites only
          </button>
        </div>
        {error ? <p className="mt-4 text-sm text-[var(--brand-coral)]">{error}</p> : null}
      </section>

      <section className="grid gap-4 sm:grid-cols-2 lg:grid-cols-3">
        {loading && assets.length === 0 ? <p className="text-sm text-[var(--ink-300)]">Loading...</p> : null}
        {!loading && visible.length === 0 ? <p className="text-sm text-[var(--ink-300)]">No assets yet.</p> : null}

        {visible.map((asset) => (
          <article key={asset.id} className="overflow-hidden rounded-2xl border border-white/15 bg-[var(--ink-900)]/40">
            <img src={asset.imageUrl} alt={asset.prompt} className="aspect-square w-full bg-black/30 object-contain" />
            <div className="space-y-3 p-4">
              <p className="line-clamp-3 text-sm text-[var(--ink-100)]">{asset.prompt}</p>
              <div className="flex flex-wrap gap-1">
                {asset.tags.map((tag) => (
                  <span key={tag} className="rounded-full bg-white/10 px-2 py-0.5 text-[10px] uppercase text-[var(--ink-200)]">
                    {tag}
                  </span>
                ))}
              </div>
              <p className="text-xs text-[var(--ink-300)]">{new Date(asset.createdAt).toLocaleString()}</p>
              <div className="flex flex-wrap items-center gap-2">
                <button
                  type="button"
                  onClick={() => void toggleFavorite(asset.id)}
                  className="rounded-full border border-white/30 px-3 py-1 text-xs font-semibold text-[var(--ink-100)]"
                >
                  {asset.isFavorite ? "★ Favorite" : "☆ Favorite"}
                </button>
                <a
                  href={asset.imageUrl}
                  download
                  className="rounded-full bg-[var(--brand-sand)] px-3 py-1 text-xs font-semibold text-[var(--ink-900)]"
                >
                  Download
                </a>
                <button
                  type="button"
                  onClick={() => void deleteAsset(asset.id)}
                  className="rounded-full bg-[var(--brand-coral)]/85 px-3 py-1 text-xs font-semibold text-[var(--ink-900)]"
                >
                  Delete
                </button>
              </div>
            </div>
          </article>
        ))}
      </section>
    </div>
  );
};
