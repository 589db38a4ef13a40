import { NextResponse } from "next/server";
import { pipelineStatus } from "../../../src/application/jobService";
import { getDependencies } from "../../../src/infrastructure/container";
import { errorResponse, limitRequest } from "../../../lib/http";
import { renderProcessMetrics, renderStageMetrics } from "../../../lib/metrics";
import { withRateLimitHeaders } from "../../../lib/rateLimit";

export const runtime = "nodejs";

export async function GET(request: Request) {
  const limited = limitRequest(request, "metrics", 120);
  if (!limited.ok) {
    return limited.response;
  }
  try {
    const counts = await pipelineStatus(getDependencies());
    const body = `${[...renderProcessMetrics(), ...renderStageMetrics(counts)].join("\n")}\n`;
    const responseInit = withRateLimitHeaders(
      {
        headers: {
          "Content-Type": "text/plain; version=0.0.4; charset=utf-8",
          "Cache-Control": "no-store"
        }
      },
      limited.rate
    );
    return new NextResponse(body, responseInit);
  } catch (error) {
    return errorResponse(error, limited.init);
  }
}
