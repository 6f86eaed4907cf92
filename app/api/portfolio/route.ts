import { NextRequest, NextResponse } from "next/server";

import { loadConfig } from "@/lib/config";
import { requestCompletion } from "@/lib/portfolio/completion";
import { PortfolioError, toErrorBody } from "@/lib/portfolio/errors";
import { generatePortfolio } from "@/lib/portfolio/generate";
import { coerceFormValues } from "@/lib/portfolio/request";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(req: NextRequest) {
  try {
    let body: unknown;
    try {
      body = await req.json();
    } catch (error) {
      throw new PortfolioError("MissingInput", "Request body must be a JSON object.", {
        cause: error,
      });
    }

    const config = loadConfig();
    const result = await generatePortfolio(coerceFormValues(body), {
      complete: (prompt, apiKey) =>
        requestCompletion({
          prompt,
          apiKey,
          model: config.model,
          baseURL: config.baseURL,
          timeoutMs: config.timeoutMs,
        }),
    });

    return NextResponse.json(result, {
      status: 200,
      headers: { "Cache-Control": "no-store" },
    });
  } catch (error: unknown) {
    const { status, body } = toErrorBody(error);
    console.error(`[portfolio] ${body.error.kind}: ${body.error.message}`);
    return NextResponse.json(body, { status, headers: { "Cache-Control": "no-store" } });
  }
}
