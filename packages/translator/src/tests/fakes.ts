/**
 * In-process stand-ins for the provider: zero network calls.
 */
import type { LanguageCode } from "@tetraglot/shared-types";
import type { FetchFn } from "../client.js";
import { EMPTY_ANNOTATIONS } from "../types.js";
import type {
  DetectedLanguage,
  ProviderAnnotations,
  ProviderGateway,
  ProviderRequest,
  ProviderTranslation,
} from "../types.js";

export function reply(
  detected: DetectedLanguage,
  translations: Partial<Record<LanguageCode, string>>,
  annotations: Partial<ProviderAnnotations> = {}
): ProviderTranslation {
  return { detectedLanguage: detected, translations, annotations: { ...EMPTY_ANNOTATIONS, ...annotations } };
}

/** Records every request; `respond` returns a translation or an error to throw */
export class FakeGateway implements ProviderGateway {
  readonly calls: ProviderRequest[] = [];

  constructor(private readonly respond: (req: ProviderRequest, call: number) => ProviderTranslation | Error) {}

  async translate(request: ProviderRequest): Promise<ProviderTranslation> {
    this.calls.push(request);
    const outcome = this.respond(request, this.calls.length);
    if (outcome instanceof Error) throw outcome;
    return outcome;
  }
}

export function chatResponse(content: string, status = 200): Response {
  return new Response(
    JSON.stringify({
      choices: [{ message: { role: "assistant", content }, finish_reason: "stop" }],
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    }),
    { status, headers: { "Content-Type": "application/json" } }
  );
}

export function errorResponse(status: number, message: string): Response {
  return new Response(JSON.stringify({ error: { message } }), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** Serves `responses` in order; the init of every call is kept */
export function mockFetch(...responses: Response[]): { fetchFn: FetchFn; calls: Array<{ url: string; init: RequestInit }> } {
  const calls: Array<{ url: string; init: RequestInit }> = [];
  const fetchFn: FetchFn = async (input, init) => {
    calls.push({ url: String(input), init: init ?? {} });
    const next = responses[calls.length - 1];
    if (!next) throw new Error("No more mock responses");
    return next;
  };
  return { fetchFn, calls };
}
