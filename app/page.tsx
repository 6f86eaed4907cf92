"use client";

import { useState } from "react";
import dynamic from "next/dynamic";

import PortfolioTable from "@/components/PortfolioTable";
import ThesisForm from "@/components/ThesisForm";
import type { ErrorBody } from "@/lib/portfolio/errors";
import type { GeneratedPortfolio } from "@/lib/portfolio/generate";
import type { ThesisFormValues } from "@/lib/portfolio/request";
import { TIMEFRAME_OPTIONS } from "@/lib/timeframe";

type ErrorInfo = ErrorBody["error"];

const PerformanceChart = dynamic(() => import("@/components/PerformanceChart"), {
  ssr: false,
  loading: () => (
    <div className="muted" style={{ padding: 16 }}>
      Loading chart...
    </div>
  ),
});

function isErrorBody(x: unknown): x is ErrorBody {
  if (x === null || typeof x !== "object" || !("error" in x)) return false;
  const { error } = x;
  return error !== null && typeof error === "object" && "kind" in error && "message" in error;
}

class RequestFailure extends Error {
  constructor(readonly info: ErrorInfo) {
    super(info.message);
  }
}

async function submitThesis(values: ThesisFormValues): Promise<GeneratedPortfolio> {
  const res = await fetch("/api/portfolio", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(values),
    cache: "no-store",
  });

  if (!res.ok) {
    const json: unknown = await res.json().catch(() => null);
    if (isErrorBody(json)) throw new RequestFailure(json.error);
    throw new Error(`HTTP ${res.status}`);
  }
  return (await res.json()) as GeneratedPortfolio;
}

function toErrorInfo(e: unknown): ErrorInfo {
  if (e instanceof RequestFailure) return e.info;
  return {
    kind: "TransportFailure",
    message: String(e instanceof Error ? e.message : e),
  };
}

export default function Home() {
  const [result, setResult] = useState<GeneratedPortfolio | null>(null);
  const [err, setErr] = useState<ErrorInfo | null>(null);
  const [submitting, setSubmitting] = useState(false);

  const handleSubmit = async (values: ThesisFormValues) => {
    setSubmitting(true);
    setErr(null);
    setResult(null);
    try {
      setResult(await submitThesis(values));
    } catch (e: unknown) {
      setErr(toErrorInfo(e));
    } finally {
      setSubmitting(false);
    }
  };

  const timeframeLabel = result
    ? TIMEFRAME_OPTIONS.find((o) => o.value === result.timeframe)?.label ?? result.timeframe
    : null;

  return (
    <div className="container">
      <header>
        <div className="brand">
          <div className="logo" />
          <div>
            <h1>Thesis Portfolio Lab</h1>
            <p>AI-generated portfolios • simulated performance • not investment advice</p>
          </div>
        </div>

        <nav>
          <a href="/prompt">Prompt</a>
        </nav>
      </header>

      <section className="hero">
        <h2>Describe a thesis, get a portfolio</h2>
        <p>
          A language model turns your investment thesis into a 10–15 asset portfolio with a
          justification for every holding. Allocations are checked and rescaled to 100%; the
          performance chart is a random walk for illustration only.
        </p>
      </section>

      <div className="card">
        <div className="card-head">
          <div>
            <p className="title">Investment Thesis</p>
            <p className="sub">Keys are sent with this request only and never stored</p>
          </div>
          <div className="pill">{submitting ? "Working…" : "Ready"}</div>
        </div>
        <ThesisForm onSubmit={handleSubmit} submitting={submitting} />
      </div>

      {err ? (
        <div className="card" role="alert" style={{ marginTop: 16 }}>
          <div style={{ padding: 16 }}>
            <div className="notice notice-error">
              <strong>{err.kind === "MissingInput" ? "Missing input" : "An error occurred"}:</strong>{" "}
              <span>{err.message}</span>
            </div>
            {err.kind === "MalformedResponse" && err.raw ? (
              <pre className="raw" data-testid="raw-response">
                {err.raw}
              </pre>
            ) : null}
          </div>
        </div>
      ) : null}

      {result ? (
        <>
          {result.normalized ? (
            <div className="notice notice-warning" role="status" style={{ marginTop: 16 }}>
              Total allocation is {result.originalTotal.toFixed(2)}%. Adjusting.
            </div>
          ) : null}

          <section className="card" style={{ marginTop: 16 }}>
            <div className="card-head">
              <div>
                <p className="title">📌 Overall Strategy Justification</p>
              </div>
            </div>
            <p style={{ padding: "0 16px 16px", margin: 0, lineHeight: 1.5 }}>
              {result.overallJustification}
            </p>
          </section>

          <section className="card" style={{ marginTop: 16 }}>
            <div className="card-head">
              <div>
                <p className="title">📈 Portfolio Composition</p>
                <p className="sub">{result.portfolio.length} assets</p>
              </div>
            </div>
            <PortfolioTable portfolio={result.portfolio} />
          </section>

          <section className="card" style={{ marginTop: 16 }}>
            <div className="card-head">
              <div>
                <p className="title">📊 Simulated Performance vs Benchmark</p>
                <p className="sub">
                  {timeframeLabel} • {result.days} days
                </p>
              </div>
              <div className="pill">Base: $10,000</div>
            </div>
            <div className="chart-wrap">
              <PerformanceChart data={result.performance} />
            </div>
          </section>

          <details className="card" style={{ marginTop: 16, padding: 16 }}>
            <summary className="muted">Raw model response</summary>
            <pre className="raw">{result.rawCompletion}</pre>
          </details>
        </>
      ) : null}

      <div className="footer">
        <div>© 2026 Thesis Portfolio Lab</div>
        <div>Research only • No investment advice</div>
      </div>
    </div>
  );
}
