/**
 * Terms that signal the answer lives outside the policy catalog: recency, links, application
 * procedures and downloadable forms. Matching is case-sensitive, so the English entries are lowercase.
 */
export const WEB_SEARCH_KEYWORDS = [
  "최신",
  "링크",
  "홈페이지",
  "신청 방법",
  "접수",
  "url",
  "사이트",
  "웹사이트",
  "온라인",
  "신청서",
  "다운로드",
  "양식",
  "공고문",
  "latest",
  "link",
  "homepage",
  "website",
  "how to apply",
  "apply online",
  "download",
  "application form"
] as const;

export function matchWebSearchKeywords(queryText: string): string[] {
  if (!queryText) {
    return [];
  }

  return WEB_SEARCH_KEYWORDS.filter((keyword) => queryText.includes(keyword));
}

export function requiresWebSearch(queryText: string): boolean {
  return matchWebSearchKeywords(queryText).length > 0;
}
