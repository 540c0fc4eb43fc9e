import { NextResponse } from "next/server";
import { buildErrorResponse } from "@/server/apiResponses";
import { getServices } from "@/server/container";

export async function GET(_request: Request) {
  try {
    const { policies, sessions } = getServices();
    const [policyTotal, byRegion, byCategory, sessionTotal, chatTotal] = await Promise.all([
      policies.count({}),
      policies.countBy("region"),
      policies.countBy("category"),
      sessions.countSessions(),
      sessions.countMessages()
    ]);

    return NextResponse.json({
      policies: {
        total: policyTotal,
        byRegion,
        byCategory
      },
      sessions: {
        total: sessionTotal
      },
      chats: {
        total: chatTotal
      }
    });
  } catch (error) {
    return buildErrorResponse(error, "Failed to load service stats");
  }
}
