"use client";

import { useMemo, useState } from "react";

import { fmtDollars, isFiniteNumber } from "@/lib/format";
import {
  SIMULATION_BASE_VALUE,
  type SeriesName,
  type SimulatedSeries,
} from "@/lib/simulation";

const COLORS: Record<SeriesName, string> = {
  Portfolio: "hsl(217 91% 60%)",
  Benchmark: "hsl(30 95% 55%)",
};

const NAMES: SeriesName[] = ["Portfolio", "Benchmark"];

function clamp(x: number, a: number, b: number) {
  return Math.max(a, Math.min(b, x));
}

export default function PerformanceChart({ data }: { data: SimulatedSeries }) {
  const [hoverX, setHoverX] = useState<number | null>(null);

  const { labels, series } = data;

  const { minY, maxY } = useMemo(() => {
    let minY = Number.POSITIVE_INFINITY;
    let maxY = Number.NEGATIVE_INFINITY;

    for (const n of NAMES) {
      for (const v of series[n]) {
        if (!isFiniteNumber(v)) continue;
        minY = Math.min(minY, v);
        maxY = Math.max(maxY, v);
      }
    }

    if (!Number.isFinite(minY) || !Number.isFinite(maxY) || minY === maxY) {
      minY = SIMULATION_BASE_VALUE * 0.99;
      maxY = SIMULATION_BASE_VALUE * 1.01;
    }

    const pad = (maxY - minY) * 0.08;
    return { minY: minY - pad, maxY: maxY + pad };
  }, [series]);

  const W = 1000;
  const H = 420;
  const padL = 86;
  const padR = 18;
  const padT = 18;
  const padB = 36;

  const plotW = W - padL - padR;
  const plotH = H - padT - padB;

  const nPts = labels.length;

  const xAt = (i: number) => (nPts <= 1 ? padL + plotW / 2 : padL + (i / (nPts - 1)) * plotW);
  const yAt = (v: number) => {
    const t = (v - minY) / (maxY - minY);
    return padT + (1 - t) * plotH;
  };

  const hoverIndex = useMemo(() => {
    if (hoverX == null || nPts === 0) return null;
    if (nPts === 1) return 0;
    const i = Math.round(((hoverX - padL) / plotW) * (nPts - 1));
    return clamp(i, 0, nPts - 1);
  }, [hoverX, nPts, plotW]);

  const hoverLabel = hoverIndex != null ? labels[hoverIndex] : null;

  return (
    <div>
      <div
        className="chart-canvas"
        data-testid="performance-chart"
        style={{ position: "relative" }}
        onMouseLeave={() => setHoverX(null)}
        onMouseMove={(e) => {
          const rect = e.currentTarget.getBoundingClientRect();
          if (rect.width <= 0) return;
          const px = ((e.clientX - rect.left) / rect.width) * W;
          setHoverX(clamp(px, padL, W - padR));
        }}
      >
        <svg viewBox={`0 0 ${W} ${H}`} width="100%" height="auto" style={{ display: "block" }}>
          <title>Performance Comparison</title>

          {Array.from({ length: 5 }).map((_, k) => {
            const y = padT + (k / 4) * plotH;
            return (
              <line
                key={k}
                x1={padL}
                x2={W - padR}
                y1={y}
                y2={y}
                stroke="rgba(255,255,255,0.08)"
                strokeWidth={1}
              />
            );
          })}

          {Array.from({ length: 5 }).map((_, k) => {
            const v = minY + ((4 - k) / 4) * (maxY - minY);
            const y = padT + (k / 4) * plotH;
            return (
              <text
                key={k}
                x={padL - 10}
                y={y + 4}
                textAnchor="end"
                fontSize={12}
                fill="rgba(255,255,255,0.55)"
              >
                {fmtDollars(v, 0)}
              </text>
            );
          })}

          {NAMES.map((name) => {
            const arr = series[name];
            if (arr.length === 0) return null;

            let d = "";
            for (let i = 0; i < arr.length; i++) {
              const v = arr[i];
              if (!isFiniteNumber(v)) continue;
              d += (d ? " L " : "M ") + `${xAt(i)} ${yAt(v)}`;
            }

            return arr.length === 1 ? (
              <circle key={name} cx={xAt(0)} cy={yAt(arr[0])} r={4} fill={COLORS[name]} />
            ) : (
              <path key={name} d={d} fill="none" stroke={COLORS[name]} strokeWidth={2} opacity={0.95} />
            );
          })}

          {hoverIndex != null ? (
            <line
              x1={xAt(hoverIndex)}
              x2={xAt(hoverIndex)}
              y1={padT}
              y2={padT + plotH}
              stroke="rgba(255,255,255,0.25)"
              strokeWidth={1}
            />
          ) : null}

          {nPts >= 1 ? (
            <>
              <text x={padL} y={H - 12} fontSize={12} fill="rgba(255,255,255,0.55)">
                {labels[0]}
              </text>
              {nPts >= 3 ? (
                <text
                  x={padL + plotW / 2}
                  y={H - 12}
                  textAnchor="middle"
                  fontSize={12}
                  fill="rgba(255,255,255,0.55)"
                >
                  {labels[Math.floor((nPts - 1) / 2)]}
                </text>
              ) : null}
              <text
                x={W - padR}
                y={H - 12}
                textAnchor="end"
                fontSize={12}
                fill="rgba(255,255,255,0.55)"
              >
                {labels[nPts - 1]}
              </text>
            </>
          ) : null}
        </svg>

        {hoverIndex != null && hoverLabel ? (
          <div
            role="tooltip"
            style={{
              position: "absolute",
              left: `${((xAt(hoverIndex) - padL) / plotW) * 100}%`,
              top: 10,
              transform: "translateX(-50%)",
              pointerEvents: "none",
              minWidth: 200,
              background: "rgba(10,12,16,0.92)",
              border: "1px solid rgba(255,255,255,0.18)",
              borderRadius: 14,
              padding: 10,
              boxShadow: "0 10px 30px rgba(0,0,0,0.35)",
            }}
          >
            <div style={{ fontWeight: 800, marginBottom: 6, fontSize: 12, color: "rgba(255,255,255,0.85)" }}>
              {hoverLabel}
            </div>
            <div style={{ display: "grid", gap: 6 }}>
              {NAMES.map((name) => (
                <div key={name} style={{ display: "flex", justifyContent: "space-between", gap: 10, fontSize: 12 }}>
                  <span style={{ color: COLORS[name] }}>{name}</span>
                  <span style={{ fontVariantNumeric: "tabular-nums", color: "rgba(255,255,255,0.9)" }}>
                    {fmtDollars(series[name][hoverIndex])}
                  </span>
                </div>
              ))}
            </div>
          </div>
        ) : null}
      </div>

      {/* Legend: return against the 10,000 starting value */}
      <div style={{ marginTop: 14, display: "flex", flexWrap: "wrap", gap: 6 }}>
        {NAMES.map((name) => {
          const last = series[name][nPts - 1];
          const pct = isFiniteNumber(last)
            ? ((last - SIMULATION_BASE_VALUE) / SIMULATION_BASE_VALUE) * 100
            : null;
          const isPositive = pct != null && pct >= 0;

          return (
            <div key={name} className="legend-item" data-testid={`legend-${name}`}>
              <span
                style={{
                  width: 8,
                  height: 8,
                  borderRadius: "50%",
                  background: COLORS[name],
                  flexShrink: 0,
                }}
              />
              <span>{name === "Benchmark" ? "Benchmark (S&P 500)" : name}</span>
              {pct != null && (
                <span
                  style={{
                    marginLeft: 2,
                    fontSize: 11,
                    fontVariantNumeric: "tabular-nums",
                    color: isPositive ? "#4ade80" : "#f87171",
                    fontWeight: 600,
                  }}
                >
                  {isPositive ? "+" : ""}
                  {pct.toFixed(2)}%
                </span>
              )}
            </div>
          );
        })}
      </div>

      <div className="muted" style={{ fontSize: 12, marginTop: 8 }}>
        Simulated random walk from {fmtDollars(SIMULATION_BASE_VALUE, 0)} • not derived from the holdings • not a forecast
      </div>
    </div>
  );
}
