import { NextResponse } from "next/server";
import { z } from "zod";
import { toStringOrNull } from "@/lib/textNormalization";
import { buildErrorResponse, parseRequest, searchParamsOf } from "@/server/apiResponses";
import { getServices } from "@/server/container";

const WebSourceQuerySchema = z.object({
  sessionId: z.string().optional().transform((value) => toStringOrNull(value)),
  limit: z.coerce.number().int().min(1).max(200).default(50)
});

export async function GET(request: Request) {
  try {
    const params = parseRequest(WebSourceQuerySchema, searchParamsOf(request));
    const webSources = await getServices().sessions.listWebSources(params);

    return NextResponse.json({ count: webSources.length, webSources });
  } catch (error) {
    return buildErrorResponse(error, "Failed to list web sources");
  }
}
