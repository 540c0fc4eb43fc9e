import { NextResponse } from "next/server";
import { z } from "zod";
import { toStringOrNull } from "@/lib/textNormalization";
import { buildErrorResponse, parseRequest, searchParamsOf } from "@/server/apiResponses";
import { getServices } from "@/server/container";
import { hybridSearch } from "@/server/policySearch";

const optionalText = z.string().optional().transform((value) => toStringOrNull(value));

const PolicyListQuerySchema = z.object({
  query: optionalText,
  region: optionalText,
  category: optionalText,
  limit: z.coerce.number().int().min(1).max(100).default(10),
  offset: z.coerce.number().int().min(0).default(0)
});

export async function GET(request: Request) {
  try {
    const params = parseRequest(PolicyListQuerySchema, searchParamsOf(request));
    const result = await hybridSearch(getServices().policySearch, params);

    return NextResponse.json({
      total: result.total,
      count: result.policies.length,
      offset: params.offset,
      limit: params.limit,
      policies: result.policies.map((hit) => ({ ...hit.policy, score: hit.score }))
    });
  } catch (error) {
    return buildErrorResponse(error, "Failed to search policies");
  }
}
