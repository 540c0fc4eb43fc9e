"use client";

import { FormEvent, useState } from "react";
import { z } from "zod";

const EvidenceSchema = z.object({
  kind: z.enum(["internal", "web"]),
  source: z.string(),
  content: z.string(),
  score: z.number().optional(),
  url: z.string().nullish(),
  fetchedDate: z.string().nullish()
});

const ChatReplySchema = z.object({
  sessionId: z.string(),
  policyId: z.number(),
  answer: z.string(),
  evidence: z.array(EvidenceSchema),
  error: z.string().nullable()
});

const PolicyListSchema = z.object({
  total: z.number(),
  policies: z.array(
    z.object({
      id: z.number(),
      programName: z.string(),
      region: z.string().nullable(),
      category: z.string().nullable(),
      score: z.number().nullable()
    })
  )
});

const ErrorSchema = z.object({
  error: z.object({ message: z.string() })
});

type ChatReply = z.infer<typeof ChatReplySchema>;
type PolicySummary = z.infer<typeof PolicyListSchema>["policies"][number];

async function readPayload<Schema extends z.ZodTypeAny>(response: Response, schema: Schema): Promise<z.output<Schema>> {
  const payload: unknown = await response.json();
  if (!response.ok) {
    const failure = ErrorSchema.safeParse(payload);
    throw new Error(failure.success ? failure.data.error.message : "요청을 처리하지 못했습니다.");
  }

  return schema.parse(payload);
}

export default function Home() {
  const [searchQuery, setSearchQuery] = useState("");
  const [policies, setPolicies] = useState<PolicySummary[]>([]);
  const [selectedPolicy, setSelectedPolicy] = useState<PolicySummary | null>(null);
  const [sessionId, setSessionId] = useState<string | null>(null);
  const [message, setMessage] = useState("");
  const [replies, setReplies] = useState<Array<{ question: string; reply: ChatReply }>>([]);
  const [isLoading, setIsLoading] = useState(false);
  const [error, setError] = useState("");

  async function handleSearch(event: FormEvent<HTMLFormElement>) {
    event.preventDefault();
    setError("");

    try {
      const params = new URLSearchParams({ limit: "10" });
      if (searchQuery.trim()) {
        params.set("query", searchQuery.trim());
      }

      const response = await fetch(`/api/policies?${params.toString()}`);
      const payload = await readPayload(response, PolicyListSchema);
      setPolicies(payload.policies);
    } catch (caughtError) {
      setError(caughtError instanceof Error ? caughtError.message : "정책 검색에 실패했습니다.");
    }
  }

  async function handleAsk(event: FormEvent<HTMLFormElement>) {
    event.preventDefault();

    if (!selectedPolicy || !message.trim()) {
      setError("정책을 선택하고 질문을 입력해 주세요.");
      return;
    }

    setIsLoading(true);
    setError("");

    try {
      const response = await fetch("/api/chat", {
        method: "POST",
        headers: {
          "Content-Type": "application/json"
        },
        body: JSON.stringify({ sessionId: sessionId ?? undefined, policyId: selectedPolicy.id, message })
      });

      const reply = await readPayload(response, ChatReplySchema);
      setSessionId(reply.sessionId);
      setReplies((current) => [...current, { question: message, reply }]);
      setMessage("");
    } catch (caughtError) {
      setError(caughtError instanceof Error ? caughtError.message : "답변을 받지 못했습니다.");
    } finally {
      setIsLoading(false);
    }
  }

  async function handleReset() {
    if (sessionId) {
      await fetch(`/api/session/reset?sessionId=${encodeURIComponent(sessionId)}`, { method: "POST" });
    }

    setSessionId(null);
    setReplies([]);
  }

  function selectPolicy(policy: PolicySummary) {
    setSelectedPolicy(policy);
    setSessionId(null);
    setReplies([]);
  }

  return (
    <main>
      <h1>정책 Q&amp;A</h1>

      <form onSubmit={handleSearch}>
        <input
          value={searchQuery}
          onChange={(event) => setSearchQuery(event.target.value)}
          placeholder="지원 사업 검색 (예: 청년 창업 자금)"
        />
        <button type="submit">검색</button>
      </form>

      <ul>
        {policies.map((policy) => (
          <li key={policy.id}>
            <button type="button" onClick={() => selectPolicy(policy)} disabled={policy.id < 0}>
              {policy.programName}
            </button>{" "}
            {[policy.region, policy.category].filter(Boolean).join(" · ")}
            {policy.score !== null ? ` (${policy.score.toFixed(2)})` : null}
          </li>
        ))}
      </ul>

      {selectedPolicy ? (
        <section>
          <h2>{selectedPolicy.programName}</h2>
          <form onSubmit={handleAsk}>
            <textarea
              rows={4}
              cols={80}
              value={message}
              onChange={(event) => setMessage(event.target.value)}
              placeholder="이 정책에 대해 궁금한 점을 입력하세요"
            />
            <br />
            <button type="submit" disabled={isLoading}>
              {isLoading ? "답변 생성 중..." : "질문하기"}
            </button>{" "}
            <button type="button" onClick={() => void handleReset()} disabled={isLoading}>
              대화 초기화
            </button>
          </form>
        </section>
      ) : null}

      {error ? <p>{error}</p> : null}

      {replies.map(({ question, reply }, index) => (
        <section key={`${reply.sessionId}-${index}`}>
          <h3>Q. {question}</h3>
          <p style={{ whiteSpace: "pre-wrap" }}>{reply.answer}</p>
          {reply.evidence.length > 0 ? (
            <ol>
              {reply.evidence.map((item, evidenceIndex) => (
                <li key={evidenceIndex}>
                  <strong>{item.source}</strong>
                  {item.url ? (
                    <>
                      {" "}
                      <a href={item.url} target="_blank" rel="noreferrer">
                        {item.url}
                      </a>
                    </>
                  ) : null}
                  <div>{item.content}</div>
                </li>
              ))}
            </ol>
          ) : null}
        </section>
      ))}
    </main>
  );
}
