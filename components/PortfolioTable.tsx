"use client";

import type { AssetAllocation } from "@/lib/portfolio/schema";
import { fmtPct } from "@/lib/format";

export default function PortfolioTable({ portfolio }: { portfolio: AssetAllocation[] }) {
  const total = portfolio.reduce((sum, a) => sum + a.allocation, 0);

  return (
    <div className="table-wrap">
      <div className="table-scroll">
        <table>
          <thead>
            <tr>
              <th>Symbol</th>
              <th>Name</th>
              <th className="right">Allocation</th>
              <th>Justification</th>
            </tr>
          </thead>
          <tbody>
            {portfolio.map((a, i) => (
              <tr key={`${a.symbol}-${i}`}>
                <td className="mono">
                  <strong>{a.symbol}</strong>
                </td>
                <td>{a.name}</td>
                <td className="right">{fmtPct(a.allocation)}</td>
                <td className="muted">{a.justification}</td>
              </tr>
            ))}
          </tbody>
          <tfoot>
            <tr>
              <td colSpan={2}>
                <strong>Total</strong>
              </td>
              <td className="right">
                <strong>{fmtPct(total)}</strong>
              </td>
              <td />
            </tr>
          </tfoot>
        </table>
      </div>
    </div>
  );
}
