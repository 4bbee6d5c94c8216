"use client";

import { useRef, useState, type FormEvent } from "react";
import type {
  CriterionLine,
  QualifyErrorResponse,
  QualifyRequest,
  QualifyResponse
} from "@/src/lib/types";

type CheckState =
  | { status: "idle" }
  | { status: "loading"; steamId: string }
  | { status: "done"; result: QualifyResponse }
  | { status: "failed"; error: QualifyErrorResponse["error"] };

const STEAM_PROFILE_URL = /^https?:\/\/steamcommunity\.com\/(?:profiles|openid\/id)\/(\d{17})\/?$/;

const numberFormatter = new Intl.NumberFormat("en-US", {
  maximumFractionDigits: 2
});

const formatNumber = (value: number) => numberFormatter.format(value);

const formatDateTime = (value: string) => {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) return "--";
  return date.toLocaleString();
};

export const normalizeSteamId = (raw: string): string | null => {
  const trimmed = raw.trim();
  if (/^\d{17}$/.test(trimmed)) return trimmed;
  const match = STEAM_PROFILE_URL.exec(trimmed);
  return match ? match[1] : null;
};

const MetricTile = ({ label, value, passed }: { label: string; value: string; passed: boolean }) => (
  <div className="rounded-2xl border border-black/10 bg-white p-4">
    <p className="text-xs uppercase tracking-[0.3em] text-black/50">{label}</p>
    <p className={`mt-2 text-2xl font-semibold ${passed ? "text-ink" : "text-ember"}`}>{value}</p>
  </div>
);

const CriterionRow = ({ line }: { line: CriterionLine }) => (
  <li
    className="flex items-start gap-3 rounded-xl border border-black/5 bg-white px-4 py-3 text-sm"
    data-criterion={line.code}
  >
    <span
      aria-label={line.passed ? "met" : "not met"}
      className={`mt-0.5 font-semibold ${line.passed ? "text-pass" : "text-ember"}`}
    >
      {line.passed ? "✓" : "✗"}
    </span>
    <span className="text-black/70">{line.text}</span>
  </li>
);

export const VerdictCard = ({ result }: { result: QualifyResponse }) => {
  const { verdict, explanation } = result;

  return (
    <section className="rounded-3xl border border-black/10 bg-white/90 p-6 shadow-sm">
      <div className="flex flex-col gap-2 md:flex-row md:items-center md:justify-between">
        <div>
          <p className="text-xs uppercase tracking-[0.3em] text-black/50">Steam ID <span className="font-mono">{result.steamId}</span></p>
          <h2
            className={`mt-2 text-2xl font-semibold ${verdict.valid ? "text-pass" : "text-ember"}`}
          >
            {explanation.headline}
          </h2>
        </div>
        <p className="text-xs text-black/60">Checked {formatDateTime(result.checkedAt)}</p>
      </div>

      <div className="mt-6 grid gap-3 md:grid-cols-4">
        <MetricTile label="Hours" value={formatNumber(verdict.totalHours)} passed={verdict.hoursOk} />
        <MetricTile
          label="Achievements"
          value={String(verdict.totalAchievements)}
          passed={verdict.achievementsOk}
        />
        <MetricTile
          label="Games > 1h"
          value={String(verdict.gamesOver1Hr)}
          passed={verdict.diversityOk}
        />
        <MetricTile
          label="Top game share"
          value={`${formatNumber(verdict.mostPlayedPercentage)}%`}
          passed={verdict.concentrationOk}
        />
      </div>

      <ul className="mt-6 space-y-2">
        {explanation.lines.map((line) => (
          <CriterionRow key={line.code} line={line} />
        ))}
      </ul>

      {result.unavailableAchievementGames > 0 ? (
        <p className="mt-4 text-xs text-black/60">
          Achievement data was unavailable for {result.unavailableAchievementGames}{" "}
          {result.unavailableAchievementGames === 1 ? "game" : "games"}; they count as zero
          achievements.
        </p>
      ) : null}
    </section>
  );
};

export const ErrorPanel = ({
  error,
  onRetry
}: {
  error: QualifyErrorResponse["error"];
  onRetry?: () => void;
}) => (
  <div role="alert" className="rounded-2xl border border-ember/30 bg-ember/5 p-6 text-sm">
    <p className="font-semibold text-ember">{error.message}</p>
    {error.hint ? <p className="mt-2 text-black/70">{error.hint}</p> : null}
    {error.retryable && onRetry ? (
      <button
        type="button"
        onClick={onRetry}
        className="mt-4 rounded-full border border-black/10 bg-ink px-4 py-2 text-xs font-semibold text-white"
      >
        Try again
      </button>
    ) : null}
  </div>
);

const isErrorResponse = (
  payload: QualifyResponse | QualifyErrorResponse
): payload is QualifyErrorResponse => "error" in payload;

export const QualifyChecker = () => {
  const [input, setInput] = useState("");
  const [state, setState] = useState<CheckState>({ status: "idle" });
  const inFlight = useRef<AbortController | null>(null);

  const steamId = normalizeSteamId(input);

  const runCheck = async (id: string) => {
    inFlight.current?.abort();
    const controller = new AbortController();
    inFlight.current = controller;
    setState({ status: "loading", steamId: id });

    const requestBody: QualifyRequest = { steamId: id };

    try {
      const res = await fetch("/api/qualify", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(requestBody),
        signal: controller.signal
      });
      const data = (await res.json()) as QualifyResponse | QualifyErrorResponse;
      if (isErrorResponse(data)) {
        setState({ status: "failed", error: data.error });
        return;
      }
      setState({ status: "done", result: data });
    } catch (err) {
      if (controller.signal.aborted) return;
      setState({
        status: "failed",
        error: {
          kind: "Internal",
          message: err instanceof Error ? err.message : "Qualification check failed.",
          retryable: true
        }
      });
    }
  };

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    if (!steamId) return;
    void runCheck(steamId);
  };

  return (
    <section className="grid gap-8">
      <div className="rounded-3xl border border-black/10 bg-white/90 p-6 shadow-sm">
        <p className="text-xs uppercase tracking-[0.35em] text-black/50">Qualification check</p>
        <h1 className="mt-3 text-3xl font-semibold text-ink md:text-4xl">
          Does this account qualify?
        </h1>
        <p className="mt-3 max-w-2xl text-sm text-black/70">
          Enter a SteamID64 or profile URL. Game details must be public for the check to read
          playtime and achievements.
        </p>

        <form onSubmit={handleSubmit} className="mt-6 flex flex-col gap-3 md:flex-row">
          <label htmlFor="steam-id" className="sr-only">
            Steam ID
          </label>
          <input
            id="steam-id"
            value={input}
            onChange={(event) => setInput(event.target.value)}
            placeholder="76561197960287930"
            className="flex-1 rounded-full border border-black/10 bg-white px-4 py-2 font-mono text-sm"
          />
          <button
            type="submit"
            disabled={!steamId || state.status === "loading"}
            className="rounded-full border border-black/10 bg-ink px-6 py-2 text-sm font-semibold text-white disabled:opacity-50"
          >
            {state.status === "loading" ? "Checking…" : "Check"}
          </button>
        </form>
        {input.trim() && !steamId ? (
          <p className="mt-2 text-xs text-ember">Enter a 17-digit SteamID64 or profile URL.</p>
        ) : null}
      </div>

      {state.status === "done" ? <VerdictCard result={state.result} /> : null}
      {state.status === "failed" ? (
        <ErrorPanel error={state.error} onRetry={steamId ? () => void runCheck(steamId) : undefined} />
      ) : null}
    </section>
  );
};
