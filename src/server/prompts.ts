import type { RetrievedPassage } from "@/lib/retrieval";
import type { WebResult } from "@/lib/webSearch";

export const POLICY_QA_SYSTEM_PROMPT =
  "당신은 정부 지원 정책 전문 상담사입니다. " +
  "제공된 정책 정보, 정책 문서 발췌, 웹 검색 결과만 근거로 답변하세요. " +
  "근거에 없는 내용은 추측하지 말고 확인할 수 없다고 안내하세요. " +
  "웹 검색 결과를 인용할 때는 출처 URL을 함께 적으세요. " +
  "답변은 한국어로 간결하게 작성하세요.";

export type PolicyContext = {
  policyName: string;
  policyOverview: string;
  applyTarget: string;
  supportDescription: string;
};

export const EMPTY_POLICY_CONTEXT: PolicyContext = {
  policyName: "",
  policyOverview: "",
  applyTarget: "",
  supportDescription: ""
};

function toPassageText(passages: RetrievedPassage[]): string {
  if (passages.length === 0) {
    return "(없음)";
  }

  return passages
    .map((passage, index) => `[문서 ${index + 1}] (섹션: ${passage.docType}, 점수: ${passage.score.toFixed(2)})\n${passage.content}`)
    .join("\n\n");
}

function toWebResultText(webResults: WebResult[]): string {
  if (webResults.length === 0) {
    return "(없음)";
  }

  return webResults
    .map((result, index) => `[웹 ${index + 1}] ${result.title}\nURL: ${result.url}\n수집일: ${result.fetchedDate}\n${result.snippet}`)
    .join("\n\n");
}

export function renderPolicyQaPrompt(params: {
  policy: PolicyContext;
  passages: RetrievedPassage[];
  webResults: WebResult[];
  question: string;
}): string {
  return [
    "## 정책 정보",
    `정책명: ${params.policy.policyName || "(정보 없음)"}`,
    `개요: ${params.policy.policyOverview || "(정보 없음)"}`,
    `지원 대상: ${params.policy.applyTarget || "(정보 없음)"}`,
    `지원 내용: ${params.policy.supportDescription || "(정보 없음)"}`,
    "",
    "## 정책 문서 발췌",
    toPassageText(params.passages),
    "",
    "## 웹 검색 결과",
    toWebResultText(params.webResults),
    "",
    "## 사용자 질문",
    params.question
  ].join("\n");
}
