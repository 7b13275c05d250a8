import { RuleOracleError } from "../errors.js";
import type { Schedule } from "../schedule/schedule.types.js";
import { OracleResponseSchema } from "./oracle.schemas.js";
import type { FetcherLike, OracleReport, OracleRequest, RuleOracle } from "./oracle.types.js";

export type { FetcherLike, OracleReport, OracleRequest, RuleOracle } from "./oracle.types.js";

const normalizeFetch = (
  fetcher: FetcherLike,
): ((input: string | URL, init?: RequestInit) => Promise<Response>) => {
  if (typeof fetcher === "function") return fetcher;
  return fetcher.fetch.bind(fetcher);
};

/**
 * HTTP client for the rule oracle service.
 *
 * Posts `{ schedule, rules }` to `<baseUrl>/check`. Any non-2xx status, empty
 * body or body that does not match the response schema is thrown as a
 * {@link RuleOracleError}.
 *
 * @category Oracle
 */
export class HttpRuleOracle implements RuleOracle {
  #fetch: (input: string | URL, init?: RequestInit) => Promise<Response>;
  #baseUrl: string;

  constructor(fetcher: FetcherLike, baseUrl: string) {
    this.#fetch = normalizeFetch(fetcher);
    this.#baseUrl = baseUrl.replace(/\/$/, "");
  }

  async check(schedule: Schedule, rules: string, options?: { signal?: AbortSignal }): Promise<OracleReport> {
    const request: OracleRequest = { schedule, rules };
    const res = await this.#fetch(`${this.#baseUrl}/check`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(request),
      signal: options?.signal,
    });

    const bodyText = await res.text();
    if (!res.ok) {
      const detail = bodyText ? `: ${bodyText}` : "";
      throw new RuleOracleError(`Rule oracle returned ${res.status}${detail}`, res.status, bodyText);
    }

    if (!bodyText) {
      throw new RuleOracleError("Rule oracle returned an empty response", res.status, bodyText);
    }

    let body: unknown;
    try {
      body = JSON.parse(bodyText);
    } catch {
      throw new RuleOracleError("Rule oracle returned a response that is not JSON", res.status, bodyText);
    }

    const parsed = OracleResponseSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new RuleOracleError(
        `Rule oracle returned an unexpected response${where}: ${issue?.message ?? "invalid"}`,
        res.status,
        body,
      );
    }
    return parsed.data;
  }
}
