import { NextResponse } from "next/server";
import { z } from "zod";
import { buildErrorResponse, parseRequest, searchParamsOf } from "@/server/apiResponses";
import { getServices } from "@/server/container";

const ResetQuerySchema = z.object({
  sessionId: z.string().trim().min(1)
});

export async function POST(request: Request) {
  try {
    const { sessionId } = parseRequest(ResetQuerySchema, searchParamsOf(request));
    const success = await getServices().chat.resetSession(sessionId);

    return NextResponse.json({
      sessionId,
      success,
      message: success ? "세션이 초기화되었습니다." : "세션을 찾을 수 없습니다."
    });
  } catch (error) {
    return buildErrorResponse(error, "Failed to reset session");
  }
}
