import Link from "next/link";

export default function HomePage() {
  return (
    <section className="grid gap-8">
      <div className="rounded-3xl border border-black/10 bg-white/90 p-8 shadow-sm">
        <p className="text-xs uppercase tracking-[0.35em] text-black/50">
          Steam account qualifier
        </p>
        <h1 className="mt-4 text-4xl font-semibold text-ink md:text-5xl">
          Check an account against the engagement bar.
        </h1>
        <p className="mt-4 max-w-2xl text-base leading-relaxed text-black/70">
          Playtime and achievements are pulled from the Steam Web API, aggregated across every
          owned game, and scored against four fixed criteria. Every check reports which criteria
          passed and how far off the rest are.
        </p>
        <Link
          href="/qualify"
          className="mt-6 inline-flex rounded-full bg-ink px-5 py-2 text-sm font-semibold text-white"
        >
          Run a check
        </Link>
      </div>

      <div className="grid gap-4 md:grid-cols-4">
        {[
          { title: "100+ hours", body: "Total lifetime playtime across all owned games." },
          { title: "10+ achievements", body: "Unlocked achievements summed over played games." },
          { title: "3+ games", body: "Games with more than one hour of playtime." },
          { title: "≤ 50% in one game", body: "No single game holds over half the playtime." }
        ].map((item) => (
          <div key={item.title} className="rounded-2xl border border-black/10 bg-white/80 p-6">
            <h2 className="text-lg font-semibold text-ink">{item.title}</h2>
            <p className="mt-2 text-sm text-black/70">{item.body}</p>
          </div>
        ))}
      </div>
    </section>
  );
}
