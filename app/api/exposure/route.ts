/**
 * Exposure evaluation API.
 * POST { wavelengthNm, durationS, powerW, pulse? } → { requestId, result, report }
 * GET → the R(λ)/B(λ) weighting table.
 */
import { NextResponse } from "next/server";
import { ExposureRequestSchema } from "@/domain/exposure/exposure.schema";
import { isExposureDomainError } from "@/domain/exposure/exposure.errors";
import { evaluateExposure, WEIGHTING_TABLE } from "@/engine/exposureLimits";
import { formatExposureReport } from "@/lib/exposureReport";
import { toExposureResponse } from "@/lib/exposureResponse";
import { derr, dlog, dwarn } from "@/lib/debug";

export async function POST(req: Request) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return NextResponse.json({ error: "Invalid JSON body" }, { status: 400 });
  }

  const parsed = ExposureRequestSchema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`);
    return NextResponse.json({ error: "Invalid request body", issues }, { status: 400 });
  }

  try {
    dlog("[api/exposure] POST", parsed.data);
    const result = evaluateExposure(parsed.data);
    dlog("[api/exposure] ok", { governing: result.governingHazard, margin: result.margin });
    return NextResponse.json(
      {
        requestId: crypto.randomUUID(),
        result: toExposureResponse(result),
        report: formatExposureReport(result),
      },
      { status: 200 }
    );
  } catch (e) {
    if (isExposureDomainError(e)) {
      dwarn("[api/exposure] domain error", { kind: e.kind, message: e.message });
      return NextResponse.json({ error: e.message, kind: e.kind }, { status: 422 });
    }
    derr("[api/exposure] unexpected error", e);
    return NextResponse.json({ error: "Unexpected error during exposure evaluation" }, { status: 500 });
  }
}

export async function GET() {
  return NextResponse.json({ ok: true, knots: WEIGHTING_TABLE }, { status: 200 });
}
