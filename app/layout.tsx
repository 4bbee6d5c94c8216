import type { Metadata } from "next";
import Link from "next/link";
import "./globals.css";

export const metadata: Metadata = {
  title: "Steam Qualifier",
  description: "Steam account engagement qualification check"
};

export default function RootLayout({
  children
}: {
  children: React.ReactNode;
}) {
  return (
    <html lang="en">
      <body className="min-h-screen">
        <div className="flex min-h-screen flex-col">
          <header className="border-b border-black/10 bg-white/70 backdrop-blur">
            <div className="mx-auto flex w-full max-w-[1100px] items-center justify-between px-4 py-4">
              <Link href="/" className="flex items-center gap-3">
                <div className="h-8 w-8 rounded-full border border-black/10 bg-ember" />
                <span className="text-sm font-semibold tracking-[0.2em] text-ink">
                  STEAM QUALIFIER
                </span>
              </Link>
              <nav className="flex items-center gap-6 text-sm text-black/70">
                <Link href="/qualify">Check</Link>
              </nav>
            </div>
          </header>
          <main className="mx-auto flex w-full max-w-[1100px] flex-1 flex-col gap-10 px-4 py-10">
            {children}
          </main>
          <footer className="border-t border-black/10 bg-white/80">
            <div className="mx-auto flex w-full max-w-[1100px] items-center justify-between px-4 py-6 text-xs text-black/60">
              <span>Data from the Steam Web API.</span>
              <span>Not affiliated with Valve.</span>
            </div>
          </footer>
        </div>
      </body>
    </html>
  );
}
