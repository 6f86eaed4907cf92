import { NextResponse } from "next/server";

import { loadConfig } from "@/lib/config";

export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const config = loadConfig();
    return NextResponse.json(
      { ok: true, model: config.model, timeout_ms: config.timeoutMs },
      { status: 200 },
    );
  } catch (error: unknown) {
    return NextResponse.json(
      { ok: false, error: error instanceof Error ? error.message : String(error) },
      { status: 500 },
    );
  }
}
