import { NextResponse } from "next/server";
import { z } from "zod";
import { buildErrorResponse, parseRequest } from "@/server/apiResponses";
import { getServices } from "@/server/container";

const ChatBodySchema = z.object({
  sessionId: z.string().trim().min(1).max(36).optional(),
  policyId: z.coerce.number().int().positive(),
  message: z.string().trim().min(1).max(2000)
});

export async function POST(request: Request) {
  try {
    const payload: unknown = await request.json().catch(() => null);
    const body = parseRequest(ChatBodySchema, payload);

    const reply = await getServices().chat.runQa({
      sessionId: body.sessionId,
      policyId: body.policyId,
      message: body.message
    });

    return NextResponse.json(reply);
  } catch (error) {
    return buildErrorResponse(error, "Failed to answer chat message");
  }
}
