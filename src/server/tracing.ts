import { toErrorMessage } from "@/lib/errors";
import { createLogger, type LogMeta, type Logger } from "@/lib/logger";

const EMAIL_PATTERN = /([a-zA-Z0-9._%+-]+)@([a-zA-Z0-9.-]+\.[a-zA-Z]{2,})/g;
const RESIDENT_NUMBER_PATTERN = /\b(\d{6})-?(\d{7})\b/g;
const PHONE_PATTERN = /\b(\d{2,3})-?(\d{3,4})-?(\d{4})\b/g;

export function redactEmail(text: string): string {
  return text.replace(EMAIL_PATTERN, (_match, username: string, domain: string) => `${username[0]}***@${domain}`);
}

export function redactResidentNumber(text: string): string {
  return text.replace(RESIDENT_NUMBER_PATTERN, (_match, first: string) => `${first}-*******`);
}

export function redactPhone(text: string): string {
  return text.replace(PHONE_PATTERN, (_match, first: string, _middle: string, last: string) => `${first}-****-${last}`);
}

/** Resident numbers are masked before phone numbers so their digits are not read as a phone number. */
export function redactPii(text: string): string {
  return redactPhone(redactResidentNumber(redactEmail(text)));
}

export function redactPiiDeep(value: unknown): unknown {
  if (typeof value === "string") {
    return redactPii(value);
  }

  if (Array.isArray(value)) {
    return value.map(redactPiiDeep);
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, redactPiiDeep(entry)]));
  }

  return value;
}

/** Session ids and stage names pass through untouched; only user-derived fields go through here. */
function redactMeta(meta: LogMeta): LogMeta {
  return Object.fromEntries(Object.entries(meta).map(([key, entry]) => [key, redactPiiDeep(entry)]));
}

export type FeatureCode = "QA" | "PS";

const FEATURE_NAMES: Record<FeatureCode, string> = {
  QA: "Q&A",
  PS: "Policy-Search"
};

export function buildFeatureTags(params: {
  environment: string;
  feature: FeatureCode;
  policyId?: number | null;
  extra?: string[];
}): string[] {
  const tags = [`env:${params.environment}`, `feature:${FEATURE_NAMES[params.feature]}`];
  if (params.policyId !== undefined && params.policyId !== null) {
    tags.push(`policy:${params.policyId}`);
  }

  return [...tags, ...(params.extra ?? [])];
}

export type StageEvent = {
  stage: string;
  sessionId: string;
  query: string;
  tags: string[];
};

export interface StageInterceptor {
  before(event: StageEvent): void;
  after(event: StageEvent & { durationMs: number; error: unknown }): void;
}

export function createTracingInterceptor(params: { enabled: boolean; logger?: Logger }): StageInterceptor {
  const logger = params.logger ?? createLogger("tracing");

  return {
    before(event) {
      if (!params.enabled) {
        return;
      }

      logger.debug("Stage started", {
        stage: event.stage,
        sessionId: event.sessionId,
        ...redactMeta({ query: event.query, tags: event.tags })
      });
    },
    after(event) {
      if (!params.enabled) {
        return;
      }

      logger.info("Stage finished", {
        stage: event.stage,
        sessionId: event.sessionId,
        durationMs: event.durationMs,
        failed: event.error !== null,
        ...redactMeta({
          query: event.query,
          tags: event.tags,
          error: event.error === null ? null : toErrorMessage(event.error, "Unknown error")
        })
      });
    }
  };
}
