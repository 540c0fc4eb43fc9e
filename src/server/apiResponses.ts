import { NextResponse } from "next/server";
import type { z } from "zod";
import { ApiRouteError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

const logger = createLogger("api");

/** Validates request input, turning zod issues into a 400 `VALIDATION_ERROR`. */
export function parseRequest<Schema extends z.ZodTypeAny>(schema: Schema, value: unknown): z.output<Schema> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ApiRouteError({
      status: 400,
      code: "VALIDATION_ERROR",
      message: "Invalid request.",
      details: result.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
    });
  }

  return result.data;
}

export function searchParamsOf(request: Request): Record<string, string> {
  return Object.fromEntries(new URL(request.url).searchParams);
}

export function buildErrorResponse(error: unknown, failureMessage: string) {
  if (error instanceof ApiRouteError) {
    return NextResponse.json(
      {
        error: {
          code: error.code,
          message: error.message,
          details: error.details
        }
      },
      { status: error.status }
    );
  }

  logger.error(failureMessage, { error });
  return NextResponse.json(
    {
      error: {
        code: "INTERNAL_ERROR",
        message: `${failureMessage}.`
      }
    },
    { status: 500 }
  );
}
