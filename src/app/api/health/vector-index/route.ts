import { NextResponse } from "next/server";
import { toErrorMessage } from "@/lib/errors";
import { createLogger } from "@/lib/logger";
import { getServices } from "@/server/container";

const logger = createLogger("health");

export async function GET(_request: Request) {
  try {
    const pointsCount = await getServices().vectorIndex.count();
    return NextResponse.json({ status: "healthy", vectorIndex: "pgvector", pointsCount });
  } catch (error) {
    logger.error("Vector index health check failed", { error });
    return NextResponse.json(
      { status: "unhealthy", vectorIndex: "pgvector", error: toErrorMessage(error, "Vector index unavailable") },
      { status: 503 }
    );
  }
}
