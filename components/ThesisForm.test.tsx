// @vitest-environment jsdom
import { fireEvent, render, screen } from "@testing-library/react";
import { describe, it, expect, vi } from "vitest";
import ThesisForm from "./ThesisForm";

const today = new Date("2026-10-19T10:00:00Z");

function fill(label: string, value: string) {
  fireEvent.change(screen.getByLabelText(label), { target: { value } });
}

describe("ThesisForm", () => {
  it("blocks submission and names the empty fields", () => {
    const onSubmit = vi.fn();
    render(<ThesisForm onSubmit={onSubmit} today={today} />);

    fireEvent.click(screen.getByRole("button", { name: "Generate Portfolio" }));

    expect(screen.getByRole("alert")).toHaveTextContent(
      "Please provide all required fields: investment thesis, LLM API key, market data API key.",
    );
    expect(onSubmit).not.toHaveBeenCalled();
  });

  it("submits the filled form", () => {
    const onSubmit = vi.fn();
    render(<ThesisForm onSubmit={onSubmit} today={today} />);

    fill("Describe your investment thesis", "Defense budgets rise across Europe.");
    fill("LLM API Key", "test-llm-key");
    fill("Market Data API Key", "test-market-key");
    fill("Performance View Range", "5Y");
    fireEvent.click(screen.getByRole("button", { name: "Generate Portfolio" }));

    expect(onSubmit).toHaveBeenCalledWith({
      thesis: "Defense budgets rise across Europe.",
      llmApiKey: "test-llm-key",
      marketDataApiKey: "test-market-key",
      timeframe: "5Y",
    });
    expect(screen.queryByRole("alert")).not.toBeInTheDocument();
  });

  it("shows a date picker defaulting to a year back for a custom range", () => {
    const onSubmit = vi.fn();
    render(<ThesisForm onSubmit={onSubmit} today={today} />);

    expect(screen.queryByLabelText("Custom start date")).not.toBeInTheDocument();
    fill("Performance View Range", "CUSTOM");
    expect(screen.getByLabelText("Custom start date")).toHaveValue("2025-10-19");

    fill("Describe your investment thesis", "t");
    fill("LLM API Key", "k1");
    fill("Market Data API Key", "k2");
    fireEvent.click(screen.getByRole("button", { name: "Generate Portfolio" }));

    expect(onSubmit).toHaveBeenCalledWith(
      expect.objectContaining({ timeframe: "CUSTOM", customStartDate: "2025-10-19" }),
    );
  });

  it("disables the button while a request is in flight", () => {
    render(<ThesisForm onSubmit={vi.fn()} submitting today={today} />);
    expect(screen.getByRole("button", { name: "Generating portfolio…" })).toBeDisabled();
  });
});
