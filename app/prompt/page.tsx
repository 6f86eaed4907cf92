"use client";

import { PORTFOLIO_PROMPT_TEMPLATE } from "@/lib/portfolio/prompt";

export default function PromptPage() {
  const copy = async () => {
    try {
      await navigator.clipboard.writeText(PORTFOLIO_PROMPT_TEMPLATE);
      alert("Copied prompt to clipboard.");
    } catch {
      alert("Copy failed — select the text and copy manually.");
    }
  };

  return (
    <div className="container">
      <header>
        <div className="brand">
          <div className="logo" />
          <div>
            <h1>Thesis Portfolio Lab</h1>
            <p>Prompt transparency • research only</p>
          </div>
        </div>

        <nav>
          <a href="/">← Back to Generator</a>
        </nav>
      </header>

      <section className="hero">
        <h2>Portfolio Prompt</h2>
        <p>
          This is the exact prompt sent to the language model. Your thesis replaces{" "}
          <code>{"{{thesis}}"}</code> verbatim.
        </p>
      </section>

      <div className="card">
        <div className="card-head">
          <div>
            <p className="title">Prompt</p>
            <p className="sub">Single user message • JSON reply expected</p>
          </div>
          <div style={{ display: "flex", gap: 10, alignItems: "center" }}>
            <div className="pill">Read-only</div>
            <button type="button" className="btn btn-small" onClick={copy}>
              Copy
            </button>
          </div>
        </div>

        <div style={{ padding: 16 }}>
          <pre className="raw">{PORTFOLIO_PROMPT_TEMPLATE}</pre>
        </div>
      </div>

      <div className="footer">
        <div>© 2026 Thesis Portfolio Lab</div>
        <div>Research only • No investment advice</div>
      </div>
    </div>
  );
}
