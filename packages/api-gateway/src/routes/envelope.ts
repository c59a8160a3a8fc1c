export interface ApiError {
  code: string;
  message: string;
}

export function ok(data: unknown, requestId: string) {
  return { data, requestId };
}

export function badRequest(message: string, requestId: string, code = "BAD_REQUEST") {
  return { data: null, requestId, errors: [{ code, message }] satisfies ApiError[] };
}

/** First zod issue as "path: message" */
export function firstIssue(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string {
  const issue = issues[0];
  if (!issue) return "Invalid body";
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}
