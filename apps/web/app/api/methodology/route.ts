/**
 * GET /api/methodology
 * GET /api/methodology?format=markdown   → text/markdown document
 */

import { NextRequest, NextResponse } from "next/server";
import {
  CONFIDENCE_LEVELS,
  CONFIDENCE_VARIANCE,
  generateMethodologyMarkdown,
  getAssumptions,
  getCalculationMethods,
} from "@/lib/methodology/methodology";
import { DISCLAIMERS } from "@/lib/methodology/disclaimers";
import { getAllSources } from "@/lib/registry/readReferenceData";
import { errorResponse } from "@/lib/api/route-errors";

export async function GET(req: NextRequest) {
  try {
    if (req.nextUrl.searchParams.get("format") === "markdown") {
      return new NextResponse(generateMethodologyMarkdown(), {
        headers: { "Content-Type": "text/markdown; charset=utf-8" },
      });
    }

    return NextResponse.json({
      confidenceLevels: CONFIDENCE_LEVELS.map(level => ({ level, variance: CONFIDENCE_VARIANCE[level] })),
      assumptions: getAssumptions(),
      methods: getCalculationMethods(),
      disclaimers: DISCLAIMERS,
      sources: getAllSources(),
    });
  } catch (e) {
    return errorResponse("/api/methodology", e);
  }
}
