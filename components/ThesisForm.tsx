"use client";

import { useState, type FormEvent } from "react";

import { isPortfolioError } from "@/lib/portfolio/errors";
import { type ThesisFormValues, validateThesisForm } from "@/lib/portfolio/request";
import { TIMEFRAME_OPTIONS, defaultCustomStartDate, formatDateUTC } from "@/lib/timeframe";

type Props = {
  onSubmit: (values: ThesisFormValues) => void;
  submitting?: boolean;
  today?: Date;
};

const inputStyle = {
  width: "100%",
  padding: "10px 12px",
  borderRadius: 10,
  border: "1px solid var(--border)",
  background: "rgba(255,255,255,0.03)",
  color: "var(--text)",
  font: "inherit",
} as const;

export default function ThesisForm({ onSubmit, submitting = false, today }: Props) {
  const [now] = useState(() => today ?? new Date());
  const [thesis, setThesis] = useState("");
  const [llmApiKey, setLlmApiKey] = useState("");
  const [marketDataApiKey, setMarketDataApiKey] = useState("");
  const [timeframe, setTimeframe] = useState("MTD");
  const [customStartDate, setCustomStartDate] = useState(() => defaultCustomStartDate(now));
  const [err, setErr] = useState<string | null>(null);

  const handleSubmit = (e: FormEvent<HTMLFormElement>) => {
    e.preventDefault();

    const values: ThesisFormValues = {
      thesis,
      llmApiKey,
      marketDataApiKey,
      timeframe,
      ...(timeframe === "CUSTOM" ? { customStartDate } : {}),
    };

    try {
      validateThesisForm(values, now);
    } catch (error: unknown) {
      if (!isPortfolioError(error)) throw error;
      setErr(error.message);
      return;
    }

    setErr(null);
    onSubmit(values);
  };

  return (
    <form onSubmit={handleSubmit} noValidate style={{ display: "grid", gap: 14, padding: 16 }}>
      <label className="field">
        <span>Describe your investment thesis</span>
        <textarea
          name="thesis"
          rows={5}
          value={thesis}
          onChange={(e) => setThesis(e.target.value)}
          style={{ ...inputStyle, resize: "vertical" }}
        />
      </label>

      <div style={{ display: "grid", gap: 14, gridTemplateColumns: "repeat(auto-fit, minmax(220px, 1fr))" }}>
        <label className="field">
          <span>LLM API Key</span>
          <input
            name="llmApiKey"
            type="password"
            autoComplete="off"
            value={llmApiKey}
            onChange={(e) => setLlmApiKey(e.target.value)}
            style={inputStyle}
          />
        </label>

        <label className="field">
          <span>Market Data API Key</span>
          <input
            name="marketDataApiKey"
            type="password"
            autoComplete="off"
            value={marketDataApiKey}
            onChange={(e) => setMarketDataApiKey(e.target.value)}
            style={inputStyle}
          />
        </label>

        <label className="field">
          <span>Performance View Range</span>
          <select
            name="timeframe"
            value={timeframe}
            onChange={(e) => setTimeframe(e.target.value)}
            style={inputStyle}
          >
            {TIMEFRAME_OPTIONS.map((o) => (
              <option key={o.value} value={o.value}>
                {o.label}
              </option>
            ))}
          </select>
        </label>

        {timeframe === "CUSTOM" ? (
          <label className="field">
            <span>Custom start date</span>
            <input
              name="customStartDate"
              type="date"
              max={formatDateUTC(now)}
              value={customStartDate}
              onChange={(e) => setCustomStartDate(e.target.value)}
              style={inputStyle}
            />
          </label>
        ) : null}
      </div>

      {err ? (
        <div role="alert" className="notice notice-error">
          {err}
        </div>
      ) : null}

      <div>
        <button type="submit" className="btn" disabled={submitting}>
          {submitting ? "Generating portfolio…" : "Generate Portfolio"}
        </button>
      </div>
    </form>
  );
}
