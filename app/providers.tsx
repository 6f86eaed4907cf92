"use client";

import { Component, type ReactNode } from "react";

type BoundaryState = { error: Error | null };

// Last line of defence for render errors; workflow errors are shown inline.
class AppErrorBoundary extends Component<{ children: ReactNode }, BoundaryState> {
  state: BoundaryState = { error: null };

  static getDerivedStateFromError(error: Error): BoundaryState {
    return { error };
  }

  render() {
    if (this.state.error) {
      return (
        <div role="alert" style={{ padding: 24, color: "#fca5a5" }}>
          <strong>Application error:</strong> {this.state.error.message || "Unknown error"}{" "}
          <button type="button" className="btn btn-small" onClick={() => this.setState({ error: null })}>
            Try again
          </button>
        </div>
      );
    }
    return this.props.children;
  }
}

export default function Providers({ children }: { children: ReactNode }) {
  return <AppErrorBoundary>{children}</AppErrorBoundary>;
}
