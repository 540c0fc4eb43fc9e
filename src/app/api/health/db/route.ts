import { NextResponse } from "next/server";
import { toErrorMessage } from "@/lib/errors";
import { createLogger } from "@/lib/logger";
import { getServices } from "@/server/container";

const logger = createLogger("health");

export async function GET(_request: Request) {
  try {
    const policiesCount = await getServices().policies.count({});
    return NextResponse.json({ status: "healthy", database: "postgres", policiesCount });
  } catch (error) {
    logger.error("Database health check failed", { error });
    return NextResponse.json(
      { status: "unhealthy", database: "postgres", error: toErrorMessage(error, "Database unavailable") },
      { status: 503 }
    );
  }
}
