import { NextResponse, type NextRequest } from "next/server";
import { getScenarioTable } from "@/lib/data/scenario-source";
import { handleScenarioRequest } from "@/lib/api/scenario-request";

/**
 * GET /api/scenario?match=&phaseout=&takeup=&leakage=&roi=
 * Returns the annual table and cumulative chart series for one policy combination.
 */
export async function GET(request: NextRequest) {
  try {
    const table = getScenarioTable();
    const response = handleScenarioRequest(table, request.nextUrl.searchParams);
    return NextResponse.json(response.body, { status: response.status });
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error";
    console.error("[api/scenario] Error:", message);
    return NextResponse.json(
      { error: "InternalError", message },
      { status: 500 }
    );
  }
}
