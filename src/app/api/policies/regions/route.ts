import { NextResponse } from "next/server";
import { buildErrorResponse } from "@/server/apiResponses";
import { getServices } from "@/server/container";

export async function GET(_request: Request) {
  try {
    const regions = await getServices().policies.listRegions();
    return NextResponse.json({ regions });
  } catch (error) {
    return buildErrorResponse(error, "Failed to list regions");
  }
}
