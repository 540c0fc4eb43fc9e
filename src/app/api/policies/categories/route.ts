import { NextResponse } from "next/server";
import { buildErrorResponse } from "@/server/apiResponses";
import { getServices } from "@/server/container";

export async function GET(_request: Request) {
  try {
    const categories = await getServices().policies.listCategories();
    return NextResponse.json({ categories });
  } catch (error) {
    return buildErrorResponse(error, "Failed to list categories");
  }
}
